import type { Options } from "../instances/option.ts";
import type { Zipper } from "../zipper/zipper.ts";

export interface HKT<F, A> {
	readonly _URI: F;
	readonly _A: A;
}

export interface URItoKind<A> {
	Options: Options<A>;
	Zipper: Zipper<A>;
}

export type URIS = keyof URItoKind<unknown>;

export type Kind<F extends URIS, A> = URItoKind<A>[F];
