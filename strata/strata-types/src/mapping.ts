import { isPlainObject } from "lodash-es";

/**
 * Objects that are not plain records or `Map`s but still behave as mappings
 * (hybrid containers) expose their entries through this symbol.
 */
export const mappingProtocol = Symbol.for("strata.mapping");

export interface MappingLike {
  [mappingProtocol](): Iterable<readonly [unknown, unknown]>;
}

export const isPlainRecord = (value: unknown): value is Record<string, unknown> => isPlainObject(value);

export const isMappingLike = (value: unknown): value is MappingLike =>
  typeof value === "object" &&
  value !== null &&
  mappingProtocol in value &&
  typeof value[mappingProtocol] === "function";

export const isMapping = (value: unknown): boolean =>
  isPlainRecord(value) || value instanceof Map || isMappingLike(value);

export const isIterable = (value: unknown): value is Iterable<unknown> =>
  typeof value === "object" && value !== null && Symbol.iterator in value && typeof value[Symbol.iterator] === "function";

export function mappingEntries(value: unknown): Iterable<readonly [unknown, unknown]> | null {
  if (isPlainRecord(value)) {
    return Object.entries(value);
  }
  if (value instanceof Map) {
    return value.entries();
  }
  if (isMappingLike(value)) {
    return value[mappingProtocol]();
  }
  return null;
}
