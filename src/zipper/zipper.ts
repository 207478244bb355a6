import type { HKT } from "../core/hkt.ts";
import { None, type Options } from "../instances/option.ts";
import { Deque } from "./deque.ts";
import { SequenceDirection } from "./direction.ts";
import { ZipperInvariantError } from "./errors.ts";
import { ZipperDrain, ZipperIter } from "./iter.ts";

/**
 * Moves every element of `from` onto the front of `to`, front first, so the
 * elements land in `to` in reverse order.
 */
function drainInto<T>(to: Deque<T>, from: Deque<T>): void {
	let next = from.popFront();
	while (next.isSome()) {
		to.pushFront(next.value);
		next = from.popFront();
	}
}

function sameElements<T>(
	a: Deque<T>,
	b: Deque<T>,
	eq: (x: T, y: T) => boolean
): boolean {
	if (a.length !== b.length) return false;
	for (let i = 0; i < a.length; i++) {
		const x = a.get(i);
		const y = b.get(i);
		if (!x.isSome() || !y.isSome() || !eq(x.value, y.value)) return false;
	}
	return true;
}

/**
 * A cursor over a finite sequence, closed into a ring: the successor of the
 * last element is the first, and the predecessor of the first is the last.
 *
 * The sequence is split around the focus into two stacks. `forward` holds the
 * focus and everything after it, focus first. `backward` holds everything
 * before the focus, nearest first. Reading `forward` and then `backward` back
 * to front gives the whole ring starting at the focus.
 *
 * @example
 * const zipper = Zipper.from([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
 * zipper.refocus((n) => n === 5);
 * zipper.toString(); // "[5, 6, 7, 8, 9, 0, 1, 2, 3, 4]"
 * zipper.stepBackwards().focus().get(); // 4
 */
export class Zipper<T> implements HKT<"Zipper", T>, Iterable<T> {
	declare readonly _URI: "Zipper";
	declare readonly _A: T;

	private _version = 0;

	constructor(
		private readonly forward: Deque<T> = new Deque<T>(),
		private readonly backward: Deque<T> = new Deque<T>()
	) {}

	/** Builds a zipper focused on the first element of `items`. */
	static from<T>(items: Iterable<T>): Zipper<T> {
		return new Zipper(Deque.from(items));
	}

	static of<T>(...items: T[]): Zipper<T> {
		return Zipper.from(items);
	}

	/** Bumped by every mutation. Sequence views use it to detect staleness. */
	get version(): number {
		return this._version;
	}

	size(): number {
		return this.forward.length + this.backward.length;
	}

	isEmpty(): boolean {
		return this.size() === 0;
	}

	focus(): Options<T> {
		return this.forward.front();
	}

	/**
	 * Moves the focus one element in `dir`, wrapping around the ends of the
	 * sequence. Does nothing on an empty zipper.
	 */
	step(dir: SequenceDirection): this {
		if (this.isEmpty()) return this;

		this.touch();
		switch (dir) {
			case "Original":
				return this.advanceFocus(dir).rotateStacks(dir);
			case "Reverse":
				return this.rotateStacks(dir).advanceFocus(dir);
		}
	}

	stepForwards(): this {
		return this.step(SequenceDirection.Original);
	}

	stepBackwards(): this {
		return this.step(SequenceDirection.Reverse);
	}

	/**
	 * Steps forward until the focus satisfies `p`. The starting element is
	 * tested last. When nothing matches, the zipper stops one element past
	 * where it started.
	 */
	refocus(p: (t: T) => boolean): this {
		return this.seek(SequenceDirection.Original, p);
	}

	/**
	 * Mirror of {@link refocus}. Lands on the same element whenever something
	 * matches; when nothing does, it stops one element before the start.
	 */
	refocusBackwards(p: (t: T) => boolean): this {
		return this.seek(SequenceDirection.Reverse, p);
	}

	resetStart(): this {
		this.touch();
		drainInto(this.forward, this.backward);
		return this;
	}

	resetEnd(): this {
		return this.unsafeResetEnd().step(SequenceDirection.Reverse);
	}

	/** Inserts `elem` as the new focus; the old focus becomes its successor. */
	pushFocus(elem: T): this {
		this.touch();
		this.forward.pushFront(elem);
		return this;
	}

	/** Removes the focus. Its successor becomes the new focus. */
	takeCurrentFocus(): Options<T> {
		if (this.isEmpty()) return None.of();

		this.touch();
		const taken = this.forward.popFront();
		if (this.forward.isEmpty()) {
			drainInto(this.forward, this.backward);
		}
		return taken;
	}

	/** Removes the element just before the focus. The focus is unchanged. */
	takePreviousFocus(): Options<T> {
		if (this.isEmpty()) return None.of();

		this.rotateStacks(SequenceDirection.Reverse);
		this.touch();
		const taken = this.backward.popFront();
		if (this.forward.isEmpty()) {
			drainInto(this.forward, this.backward);
		}
		return taken;
	}

	/**
	 * Element `i` places away from the focus: positive offsets count in the
	 * original direction, negative ones in reverse. Offsets wrap around the
	 * ring, so `ith(i)`, `ith(i + size)` and `ith(i - size)` agree.
	 */
	ith(i: number): Options<T> {
		const count = this.size();
		if (count === 0 || !Number.isInteger(i)) return None.of();

		const index = (((i < 0 ? i + count : i) % count) + count) % count;
		const fwLen = this.forward.length;
		return index < fwLen
			? this.forward.get(index)
			: this.backward.get(this.backward.length - (index - fwLen + 1));
	}

	/** A read-only view over every element, starting at the focus. */
	iter(): ZipperIter<T> {
		return new ZipperIter(this, SequenceDirection.Original);
	}

	reverseIter(): ZipperIter<T> {
		return new ZipperIter(this, SequenceDirection.Reverse);
	}

	[Symbol.iterator](): Iterator<T> {
		return this.iter();
	}

	/** Empties the zipper, yielding each focus as it is taken. */
	drain(): ZipperDrain<T> {
		return new ZipperDrain(this);
	}

	toArray(): T[] {
		return this.iter().toArray();
	}

	/**
	 * Compares the internal split, not just the ring: two zippers over the same
	 * elements with the same focus can still differ.
	 */
	equals(other: Zipper<T>, eq: (a: T, b: T) => boolean = Object.is): boolean {
		return (
			sameElements(this.forward, other.forward, eq) &&
			sameElements(this.backward, other.backward, eq)
		);
	}

	map<B>(f: (a: T) => B): Zipper<B> {
		return new Zipper(this.forward.map(f), this.backward.map(f));
	}

	clone(): Zipper<T> {
		return new Zipper(this.forward.clone(), this.backward.clone());
	}

	toString(): string {
		return `[${this.toArray().map(String).join(", ")}]`;
	}

	private seek(dir: SequenceDirection, p: (t: T) => boolean): this {
		let counter = 0;
		for (;;) {
			const focused = this.step(dir).focus();
			if (!focused.isSome() || p(focused.value) || counter >= this.size()) {
				return this;
			}
			counter++;
		}
	}

	// leaves no focus; the caller must step in reverse afterwards
	private unsafeResetEnd(): this {
		this.touch();
		drainInto(this.backward, this.forward);
		return this;
	}

	private advanceFocus(dir: SequenceDirection): this {
		const [from, to] =
			dir === "Original"
				? [this.forward, this.backward]
				: [this.backward, this.forward];
		const moved = from.popFront();
		if (!moved.isSome()) {
			throw new ZipperInvariantError(
				`cannot step ${dir}: source stack is empty with ${this.size()} elements left`
			);
		}
		to.pushFront(moved.value);
		return this;
	}

	// wraps the ring when the stack matching the direction has run dry
	private rotateStacks(dir: SequenceDirection): this {
		if (dir === "Original" && this.forward.isEmpty()) return this.resetStart();
		if (dir === "Reverse" && this.backward.isEmpty()) {
			return this.unsafeResetEnd();
		}
		return this;
	}

	private touch(): void {
		this._version++;
	}
}
