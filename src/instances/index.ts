export { None, OptionFunctor, Options, Some } from "./option.ts";
export { ZipperFoldable, ZipperFunctor } from "./zipper.ts";
