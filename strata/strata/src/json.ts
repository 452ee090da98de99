import { isMappingLike, isPlainRecord, mappingEntries } from "strata-types";

export type JsonViolation = { path: readonly (string | number)[]; reason: string };

/**
 * Finds the first value that would not survive `JSON.stringify` followed by `JSON.parse`:
 * anything outside strings, finite numbers, booleans, null, arrays and string-keyed records
 * (containers included).
 */
export function findJsonViolation(value: unknown, path: readonly (string | number)[] = []): JsonViolation | null {
  if (typeof value === "string" || typeof value === "boolean" || value === null) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? null : { path, reason: `${value} has no JSON representation` };
  }
  if (typeof value !== "object") {
    return { path, reason: `${typeof value} has no JSON representation` };
  }
  if (Array.isArray(value)) {
    for (let index = 0; index < value.length; index++) {
      const violation = findJsonViolation(value[index], [...path, index]);
      if (violation) {
        return violation;
      }
    }
    return null;
  }
  if (isPlainRecord(value) || isMappingLike(value)) {
    for (const [key, entry] of mappingEntries(value) ?? []) {
      if (typeof key !== "string") {
        return { path, reason: "mapping keys must be strings" };
      }
      const violation = findJsonViolation(entry, [...path, key]);
      if (violation) {
        return violation;
      }
    }
    return null;
  }
  const name = value.constructor?.name || "object";
  return { path, reason: `${name} instances have no JSON representation` };
}
