import { None, type Options, Some } from "../instances/option.ts";

const MIN_CAPACITY = 8;

type Slot<T> = { readonly value: T };

/**
 * Double-ended queue over a circular buffer. Push and pop at either end are
 * O(1) amortized, indexed reads are O(1). Capacity doubles when full.
 */
export class Deque<T> {
	private buffer: (Slot<T> | undefined)[];
	private head = 0;
	private _length = 0;

	constructor(capacity = MIN_CAPACITY) {
		this.buffer = new Array<Slot<T> | undefined>(
			Math.max(MIN_CAPACITY, capacity)
		);
	}

	static from<T>(items: Iterable<T>): Deque<T> {
		const deque = new Deque<T>();
		for (const item of items) deque.pushBack(item);
		return deque;
	}

	get length(): number {
		return this._length;
	}

	isEmpty(): boolean {
		return this._length === 0;
	}

	pushFront(value: T): void {
		if (this._length === this.buffer.length) this.grow();
		this.head = this.wrap(this.head - 1);
		this.buffer[this.head] = { value };
		this._length++;
	}

	pushBack(value: T): void {
		if (this._length === this.buffer.length) this.grow();
		this.buffer[this.wrap(this.head + this._length)] = { value };
		this._length++;
	}

	popFront(): Options<T> {
		const slot = this.slotAt(0);
		if (!slot) return None.of();
		this.buffer[this.head] = undefined;
		this.head = this.wrap(this.head + 1);
		this._length--;
		return new Some(slot.value);
	}

	popBack(): Options<T> {
		const slot = this.slotAt(this._length - 1);
		if (!slot) return None.of();
		this.buffer[this.wrap(this.head + this._length - 1)] = undefined;
		this._length--;
		return new Some(slot.value);
	}

	front(): Options<T> {
		return this.get(0);
	}

	back(): Options<T> {
		return this.get(this._length - 1);
	}

	get(index: number): Options<T> {
		const slot = this.slotAt(index);
		return slot ? new Some(slot.value) : None.of();
	}

	*[Symbol.iterator](): Generator<T, void, undefined> {
		for (let i = 0; i < this._length; i++) {
			const slot = this.slotAt(i);
			if (slot) yield slot.value;
		}
	}

	toArray(): T[] {
		return Array.from(this);
	}

	map<B>(f: (a: T) => B): Deque<B> {
		const out = new Deque<B>(this._length);
		for (const item of this) out.pushBack(f(item));
		return out;
	}

	clone(): Deque<T> {
		return this.map((item) => item);
	}

	private slotAt(index: number): Slot<T> | undefined {
		if (index < 0 || index >= this._length) return undefined;
		return this.buffer[this.wrap(this.head + index)];
	}

	private wrap(index: number): number {
		const capacity = this.buffer.length;
		return ((index % capacity) + capacity) % capacity;
	}

	private grow(): void {
		const next = new Array<Slot<T> | undefined>(this.buffer.length * 2);
		for (let i = 0; i < this._length; i++) {
			next[i] = this.slotAt(i);
		}
		this.buffer = next;
		this.head = 0;
	}
}
