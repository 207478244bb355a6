import type { SequenceDirection } from "./direction.ts";
import { StaleIteratorError } from "./errors.ts";
import type { Zipper } from "./zipper.ts";

/**
 * Walks every element of a zipper once, starting at the focus. Reads go through
 * `Zipper.ith`, so the zipper itself never moves. Mutating the zipper while a
 * view is live invalidates the view.
 */
export class ZipperIter<T> implements IterableIterator<T> {
	private readonly count: number;
	private readonly version: number;
	private cursor = 0;

	constructor(
		private readonly zipper: Zipper<T>,
		private readonly dir: SequenceDirection
	) {
		this.count = zipper.size();
		this.version = zipper.version;
	}

	next(): IteratorResult<T, undefined> {
		if (this.zipper.version !== this.version) {
			throw new StaleIteratorError(this.version, this.zipper.version);
		}
		if (Math.abs(this.cursor) >= this.count) {
			return { done: true, value: undefined };
		}

		const i = this.cursor;
		this.cursor += this.dir === "Original" ? 1 : -1;

		const item = this.zipper.ith(i);
		return item.isSome()
			? { done: false, value: item.value }
			: { done: true, value: undefined };
	}

	[Symbol.iterator](): this {
		return this;
	}

	toArray(): T[] {
		return Array.from(this);
	}
}

/** Consumes a zipper by taking its focus until nothing is left. */
export class ZipperDrain<T> implements IterableIterator<T> {
	constructor(private readonly zipper: Zipper<T>) {}

	next(): IteratorResult<T, undefined> {
		const item = this.zipper.takeCurrentFocus();
		return item.isSome()
			? { done: false, value: item.value }
			: { done: true, value: undefined };
	}

	[Symbol.iterator](): this {
		return this;
	}
}
