export type * from "./core/index.ts";
export * from "./instances/index.ts";
export { Deque } from "./zipper/deque.ts";
export { SequenceDirection } from "./zipper/direction.ts";
export { StaleIteratorError, ZipperInvariantError } from "./zipper/errors.ts";
export { ZipperDrain, ZipperIter } from "./zipper/iter.ts";
export { Zipper } from "./zipper/zipper.ts";
