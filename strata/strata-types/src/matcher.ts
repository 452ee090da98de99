import type { PrimitiveKind, TypeExpr, Typed } from "./expressions";
import { describeExpr, describeValue, type Mismatch, type MismatchPath } from "./describe";
import { TypeMismatchError } from "./errors";
import { mappingEntries } from "./mapping";
import { never } from "./utils";

export type TypeCheckerOptions = {
  /**
   * Accept `true`/`false` where an integer or number is expected.
   * Off by default: booleans and numbers are disjoint primitives.
   */
  booleanAsInteger?: boolean;
};

const mismatch = (path: MismatchPath, expected: TypeExpr, actual: unknown, reason?: string): Mismatch => ({
  path,
  expected,
  actual,
  reason: reason ?? `expected ${describeExpr(expected)}, got ${describeValue(actual)}`,
});

export class TypeChecker {
  readonly booleanAsInteger: boolean;

  constructor({ booleanAsInteger = false }: TypeCheckerOptions = {}) {
    this.booleanAsInteger = booleanAsInteger;
  }

  isPrimitive(value: unknown, kind: PrimitiveKind): boolean {
    switch (kind) {
      case "string":
        return typeof value === "string";
      case "integer":
        return Number.isSafeInteger(value) || this.#booleanAsNumber(value);
      case "number":
        return typeof value === "number" || this.#booleanAsNumber(value);
      case "boolean":
        return typeof value === "boolean";
      case "bigint":
        return typeof value === "bigint";
      case "none":
        return value === null || value === undefined;
      default:
        return never(kind);
    }
  }

  #booleanAsNumber(value: unknown) {
    return this.booleanAsInteger && typeof value === "boolean";
  }

  /**
   * Returns `null` when `value` conforms to `expr`, otherwise a descriptor of the
   * first failing sub-expression. Containers are walked depth-first in iteration order.
   */
  explain(value: unknown, expr: TypeExpr, path: MismatchPath = []): Mismatch | null {
    switch (expr.kind) {
      case "any":
        return null;
      case "primitive":
        return this.isPrimitive(value, expr.primitive) ? null : mismatch(path, expr, value);
      case "literal":
        return expr.values.some((literal) => literal === value) ? null : mismatch(path, expr, value);
      case "instance":
        return value instanceof expr.ctor ? null : mismatch(path, expr, value);
      case "sequence":
        if (!Array.isArray(value)) {
          return mismatch(path, expr, value);
        }
        return this.#explainElements(value, expr.element, path);
      case "set":
        if (!(value instanceof Set)) {
          return mismatch(path, expr, value);
        }
        return this.#explainElements(value, expr.element, path);
      case "tuple": {
        if (!Array.isArray(value)) {
          return mismatch(path, expr, value);
        }
        if (value.length !== expr.elements.length) {
          return mismatch(path, expr, value, `expected ${expr.elements.length} elements, got ${value.length}`);
        }
        for (const [index, element] of expr.elements.entries()) {
          const failure = this.explain(value[index], element, [...path, index]);
          if (failure) {
            return failure;
          }
        }
        return null;
      }
      case "mapping": {
        const entries = mappingEntries(value);
        if (!entries) {
          return mismatch(path, expr, value);
        }
        for (const [key, entry] of entries) {
          const keyFailure = this.explain(key, expr.key, [...path, String(key)]);
          if (keyFailure) {
            return { ...keyFailure, reason: `key ${keyFailure.reason}` };
          }
          const valueFailure = this.explain(entry, expr.value, [...path, String(key)]);
          if (valueFailure) {
            return valueFailure;
          }
        }
        return null;
      }
      case "union":
        if (expr.alternatives.some((alternative) => this.explain(value, alternative) === null)) {
          return null;
        }
        return mismatch(path, expr, value);
      default:
        return never(expr);
    }
  }

  #explainElements(elements: Iterable<unknown>, expr: TypeExpr, path: MismatchPath): Mismatch | null {
    let index = 0;
    for (const element of elements) {
      const failure = this.explain(element, expr, [...path, index]);
      if (failure) {
        return failure;
      }
      index++;
    }
    return null;
  }

  matches<T>(value: unknown, expr: Typed<T>): value is T {
    return this.explain(value, expr) === null;
  }

  check<T>(value: unknown, expr: Typed<T>): T {
    if (this.matches(value, expr)) {
      return value;
    }
    throw new TypeMismatchError({ expected: expr, actual: value, mismatch: this.explain(value, expr) });
  }
}

export const defaultChecker = new TypeChecker();

export const explain = (value: unknown, expr: TypeExpr): Mismatch | null => defaultChecker.explain(value, expr);

export const matches = <T>(value: unknown, expr: Typed<T>): value is T => defaultChecker.matches(value, expr);

export const checkType = <T>(value: unknown, expr: Typed<T>): T => defaultChecker.check(value, expr);
