/**
 * Raised when the two stacks of a zipper disagree with its size. Only a bug in
 * the movement primitives can produce it.
 */
export class ZipperInvariantError extends Error {
	override readonly name = "ZipperInvariantError";

	constructor(message: string) {
		super(message);
	}
}

/** Raised when a sequence view is advanced after its zipper was mutated. */
export class StaleIteratorError extends Error {
	override readonly name = "StaleIteratorError";

	constructor(
		public readonly expectedVersion: number,
		public readonly actualVersion: number
	) {
		super(
			`zipper was modified during iteration (version ${expectedVersion} -> ${actualVersion})`
		);
	}
}
