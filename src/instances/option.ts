import type { HKT } from "../core/hkt.ts";
import type { Functor } from "../core/typeClass.ts";

/**
 * An optional value. Presence is decided by `_tag`, never by inspecting the
 * value, so `Some(null)` and `Some(undefined)` are still present.
 */
export abstract class Options<A> implements HKT<"Options", A> {
	declare readonly _URI: "Options";
	declare readonly _A: A;
	abstract readonly _tag: "Some" | "None";

	public isNone(): this is None {
		return this._tag === "None";
	}

	public isSome(): this is Some<A> {
		return this._tag === "Some";
	}

	public orElse<B>(value: B): Options<A | B> {
		return this.isSome() ? this : new Some(value);
	}

	public get(): A {
		if (this.isSome()) {
			return this.value;
		}
		throw new Error("Option.get called on None");
	}

	public getOrElse<B>(defaultValue: B): A | B {
		return this.isSome() ? this.value : defaultValue;
	}

	public toUndefined(): A | undefined {
		return this.isSome() ? this.value : undefined;
	}

	public map<B>(f: (a: A) => B): Options<B> {
		return this.isSome() ? new Some(f(this.value)) : None.of();
	}

	public flatMap<B>(f: (a: A) => Options<B>): Options<B> {
		return this.isSome() ? f(this.value) : None.of();
	}

	static some<A>(value: A): Options<A> {
		return new Some(value);
	}

	static none<A = never>(): Options<A> {
		return None.of();
	}
}

export class Some<A> extends Options<A> {
	override readonly _tag = "Some" as const;

	constructor(public readonly value: A) {
		super();
	}
}

export class None extends Options<never> {
	override readonly _tag = "None" as const;

	private static INSTANCE: None | undefined;

	private constructor() {
		super();
	}

	public static of(): None {
		if (!this.INSTANCE) {
			this.INSTANCE = new None();
		}
		return this.INSTANCE;
	}
}

export const OptionFunctor: Functor<"Options"> = {
	map: (fa, f) => fa.map(f),
};
