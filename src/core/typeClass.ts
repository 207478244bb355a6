import type { Kind, URIS } from "./hkt.ts";

export interface Functor<F extends URIS> {
	map<A, B>(fa: Kind<F, A>, f: (a: A) => B): Kind<F, B>;
}

export interface Foldable<F extends URIS> {
	fold<A, B>(fa: Kind<F, A>, init: B, f: (acc: B, a: A) => B): B;
}
