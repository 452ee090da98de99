import type {
  InstanceOfExpr,
  LiteralExpr,
  LiteralValue,
  MappingExpr,
  PrimitiveExpr,
  PrimitiveKind,
  TypeExpr,
  Typed,
  UnionExpr,
} from "./expressions";
import { CoercionError } from "./errors";
import { isIterable, mappingEntries } from "./mapping";
import { defaultChecker, type TypeChecker } from "./matcher";
import { never } from "./utils";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const TRUE_WORDS = new Set(["true", "yes", "on", "1"]);
const FALSE_WORDS = new Set(["false", "no", "off", "0"]);

const literalKind = (value: LiteralValue): PrimitiveKind => {
  switch (typeof value) {
    case "string":
      return "string";
    case "number":
      return "number";
    case "boolean":
      return "boolean";
    case "bigint":
      return "bigint";
    default:
      return "none";
  }
};

const isSafeBigInt = (value: bigint) =>
  value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER);

/**
 * Best-effort conversion of values into a {@link TypeExpr}.
 *
 * Conversions never guess: a value that already conforms is returned as is, ambiguous
 * inputs (`3.7` to integer, `2` to boolean, a string to a list) are rejected, and a
 * container is rebuilt only when every one of its elements converts.
 */
export class Coercer {
  readonly checker: TypeChecker;

  constructor(checker: TypeChecker = defaultChecker) {
    this.checker = checker;
  }

  coerce<T>(value: unknown, expr: Typed<T>): T {
    const converted = this.#coerce(value, expr);
    if (this.checker.matches(converted, expr)) {
      return converted;
    }
    throw new CoercionError({ expected: expr, actual: value, reason: "conversion produced a non-conforming value" });
  }

  #coerce(value: unknown, expr: TypeExpr): unknown {
    if (this.checker.explain(value, expr) === null) {
      return value;
    }
    switch (expr.kind) {
      case "any":
        return value;
      case "primitive":
        return this.#coercePrimitive(value, expr);
      case "literal":
        return this.#coerceLiteral(value, expr);
      case "sequence":
        return this.#elements(value, expr).map((element, index) => this.#nested(element, expr.element, index));
      case "set":
        return new Set(this.#elements(value, expr).map((element, index) => this.#nested(element, expr.element, index)));
      case "tuple": {
        const elements = this.#elements(value, expr);
        if (elements.length !== expr.elements.length) {
          throw new CoercionError({
            expected: expr,
            actual: value,
            reason: `expected ${expr.elements.length} elements, got ${elements.length}`,
          });
        }
        return expr.elements.map((element, index) => this.#nested(elements[index], element, index));
      }
      case "mapping":
        return this.#coerceMapping(value, expr);
      case "union":
        return this.#coerceUnion(value, expr);
      case "instance":
        return this.#coerceInstance(value, expr);
      default:
        return never(expr);
    }
  }

  #nested(value: unknown, expr: TypeExpr, segment: string | number): unknown {
    try {
      return this.#coerce(value, expr);
    } catch (error) {
      if (error instanceof CoercionError) {
        throw error.within(segment);
      }
      throw error;
    }
  }

  // only finite, ordered-or-deduplicated collections feed sequences; strings and mappings never do
  #elements(value: unknown, expr: TypeExpr): unknown[] {
    if (Array.isArray(value)) {
      return value;
    }
    if (value instanceof Set) {
      return [...value];
    }
    throw new CoercionError({ expected: expr, actual: value, reason: "expected an array or a set" });
  }

  #coercePrimitive(value: unknown, expr: PrimitiveExpr): unknown {
    const fail = (reason: string): never => {
      throw new CoercionError({ expected: expr, actual: value, reason });
    };
    const text = typeof value === "string" ? value.trim() : null;
    switch (expr.primitive) {
      case "integer":
        if (text !== null && INTEGER_PATTERN.test(text)) {
          const parsed = Number(text);
          return Number.isSafeInteger(parsed) ? parsed : fail("integer is outside the safe range");
        }
        if (typeof value === "bigint") {
          return isSafeBigInt(value) ? Number(value) : fail("integer is outside the safe range");
        }
        if (typeof value === "number") {
          if (Number.isInteger(value)) {
            return fail("integer is outside the safe range");
          }
          return fail(Number.isFinite(value) ? "number has a fractional part" : "number is not finite");
        }
        return fail(text === null ? "no conversion to integer" : "string is not an integer");
      case "number":
        if (text !== null && DECIMAL_PATTERN.test(text)) {
          const parsed = Number(text);
          return Number.isFinite(parsed) ? parsed : fail("number is not finite");
        }
        if (typeof value === "bigint") {
          return isSafeBigInt(value) ? Number(value) : fail("integer is outside the safe range");
        }
        return fail(text === null ? "no conversion to number" : "string is not a number");
      case "string":
        if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
          return String(value);
        }
        return fail("only numbers and booleans convert to strings");
      case "boolean":
        if (text !== null) {
          const word = text.toLowerCase();
          if (TRUE_WORDS.has(word)) {
            return true;
          }
          if (FALSE_WORDS.has(word)) {
            return false;
          }
          return fail("string is not a boolean word");
        }
        if (value === 1 || value === 0) {
          return value === 1;
        }
        return fail("only 0 and 1 convert to booleans");
      case "bigint":
        if (text !== null && INTEGER_PATTERN.test(text)) {
          return BigInt(text);
        }
        if (typeof value === "number" && Number.isInteger(value)) {
          return BigInt(value);
        }
        return fail("no conversion to bigint");
      case "none":
        return fail("nothing converts to none");
      default:
        return never(expr.primitive);
    }
  }

  #coerceLiteral(value: unknown, expr: LiteralExpr): unknown {
    const failures: CoercionError[] = [];
    for (const literal of expr.values) {
      try {
        const converted = this.#coerce(value, { kind: "primitive", primitive: literalKind(literal) });
        if (converted === literal) {
          return literal;
        }
      } catch (error) {
        if (!(error instanceof CoercionError)) {
          throw error;
        }
        failures.push(error);
      }
    }
    throw new CoercionError({ expected: expr, actual: value, reason: "matches none of the literal values", failures });
  }

  #coerceMapping(value: unknown, expr: MappingExpr): unknown {
    const source = mappingEntries(value) ?? this.#pairs(value, expr);
    const entries: [unknown, unknown][] = [];
    for (const [key, entry] of source) {
      const segment = String(key);
      entries.push([this.#nested(key, expr.key, segment), this.#nested(entry, expr.value, segment)]);
    }
    const stringEntries: [string, unknown][] = [];
    for (const [key, entry] of entries) {
      if (typeof key !== "string") {
        return new Map(entries);
      }
      stringEntries.push([key, entry]);
    }
    return value instanceof Map ? new Map(stringEntries) : Object.fromEntries(stringEntries);
  }

  #pairs(value: unknown, expr: MappingExpr): [unknown, unknown][] {
    const fail = () =>
      new CoercionError({ expected: expr, actual: value, reason: "expected a mapping or an iterable of key/value pairs" });
    if (!isIterable(value)) {
      throw fail();
    }
    const pairs: [unknown, unknown][] = [];
    for (const pair of value) {
      if (!Array.isArray(pair) || pair.length !== 2) {
        throw fail();
      }
      pairs.push([pair[0], pair[1]]);
    }
    return pairs;
  }

  #coerceUnion(value: unknown, expr: UnionExpr): unknown {
    const failures: CoercionError[] = [];
    for (const alternative of expr.alternatives) {
      try {
        return this.#coerce(value, alternative);
      } catch (error) {
        if (!(error instanceof CoercionError)) {
          throw error;
        }
        failures.push(error);
      }
    }
    throw new CoercionError({
      expected: expr,
      actual: value,
      reason: `no alternative accepted the value (${failures.map((failure) => failure.reason).join("; ")})`,
      failures,
    });
  }

  #coerceInstance(value: unknown, expr: InstanceOfExpr): unknown {
    const entries = mappingEntries(value);
    if (!entries || !expr.fromMapping) {
      throw new CoercionError({
        expected: expr,
        actual: value,
        reason: expr.fromMapping ? "expected a mapping" : "class cannot be built from a mapping",
      });
    }
    const record: [string, unknown][] = [];
    for (const [key, entry] of entries) {
      if (typeof key !== "string") {
        throw new CoercionError({ expected: expr, actual: value, reason: "mapping keys must be strings" });
      }
      record.push([key, entry]);
    }
    try {
      return expr.fromMapping(Object.fromEntries(record));
    } catch (error) {
      if (!(error instanceof Error)) {
        throw error;
      }
      throw new CoercionError({ expected: expr, actual: value, reason: error.message }, { cause: error });
    }
  }
}

export const defaultCoercer = new Coercer();

export const coerce = <T>(value: unknown, expr: Typed<T>): T => defaultCoercer.coerce(value, expr);
