/**
 * strata
 *
 * Typed, self-validating key/value containers with attribute-style access,
 * computed members with dependency-tracked caching and per-key checks.
 */

export * from "strata-types";

export { Strata, modelType, stateSymbol, type NestedPath, type StrataInit } from "./Strata";
export {
  ModelBuilder,
  type ComputedOptions,
  type FieldOptions,
  type StrataClass,
  type StrataInstance,
} from "./ModelBuilder";
export { defaultConfig, StrataConfigSchema, type StrataConfig } from "./config";
export { ALL_KEYS, DependencyGraph } from "./dependency-graph";
export type { CacheState } from "./computed-cache";
export {
  Declarations,
  type CheckDeclaration,
  type ComputedDeclaration,
  type FieldDeclaration,
} from "./declarations";
export {
  CycleError,
  DeclarationError,
  JsonCompatibilityError,
  KeyError,
  MissingFieldError,
  ReadOnlyKeyError,
  ValueError,
} from "./errors";
