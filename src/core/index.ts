export type { HKT, Kind, URIS, URItoKind } from "./hkt.ts";
export type { Foldable, Functor } from "./typeClass.ts";
