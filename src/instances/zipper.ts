import type { Foldable, Functor } from "../core/typeClass.ts";

export const ZipperFunctor: Functor<"Zipper"> = {
	map: (fa, f) => fa.map(f),
};

/** Folds from the focus in the original direction, once around the ring. */
export const ZipperFoldable: Foldable<"Zipper"> = {
	fold: (fa, init, f) => {
		let acc = init;
		for (const a of fa.iter()) acc = f(acc, a);
		return acc;
	},
};
