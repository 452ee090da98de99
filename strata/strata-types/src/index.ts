/**
 * strata-types
 *
 * Runtime type expressions: structural matching, best-effort coercion and
 * function contracts over plain in-process values.
 */

export * from "./expressions";
export * from "./describe";
export * from "./mapping";
export * from "./errors";
export * from "./matcher";
export * from "./coercer";
export * from "./contract";
