/**
 * Stable ids of every error helper the library builds.
 */
export enum WeaveErrorId {
  Serial = "weave.errors.serial",
  InvalidOptions = "weave.errors.invalidOptions",
}
