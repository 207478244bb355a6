import { describe, expect, it } from "vitest";
import { None, OptionFunctor, Options, Some } from "./option.ts";

describe("Options", () => {
	it("tells Some from None by tag", () => {
		expect(new Some(1).isSome()).toBe(true);
		expect(new Some(null).isSome()).toBe(true);
		expect(None.of().isNone()).toBe(true);
		expect(None.of().isSome()).toBe(false);
	});

	it("shares a single None instance", () => {
		expect(None.of()).toBe(None.of());
		expect(Options.none()).toBe(None.of());
	});

	it("throws when reading a None", () => {
		expect(() => Options.none<number>().get()).toThrow(
			"Option.get called on None"
		);
		expect(Options.some(3).get()).toBe(3);
	});

	it("falls back to defaults only for None", () => {
		expect(Options.some(1).getOrElse(2)).toBe(1);
		expect(Options.none<number>().getOrElse(2)).toBe(2);
		expect(Options.none<number>().orElse("x").get()).toBe("x");
		expect(Options.some(1).orElse("x").get()).toBe(1);
		expect(Options.none<number>().toUndefined()).toBeUndefined();
	});

	it("maps and chains present values", () => {
		const parsed = Options.some("42")
			.map(Number)
			.flatMap((n) => (n > 40 ? Options.some(n + 1) : Options.none()));

		expect(parsed.get()).toBe(43);
		expect(Options.none<string>().map(Number).isNone()).toBe(true);
		expect(OptionFunctor.map(Options.some(2), (n) => n * 3).get()).toBe(6);
	});
});
