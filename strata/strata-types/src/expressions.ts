import { isEqual } from "lodash-es";
import { never } from "./utils";

declare const phantom: unique symbol;

export type PrimitiveKind = "string" | "integer" | "number" | "boolean" | "bigint" | "none";
export type LiteralValue = string | number | boolean | bigint | null;
export type AnyConstructor<T = unknown> = abstract new (...args: never[]) => T;

export type PrimitiveExpr = { readonly kind: "primitive"; readonly primitive: PrimitiveKind };
export type SequenceExpr = { readonly kind: "sequence"; readonly element: TypeExpr };
export type SetExpr = { readonly kind: "set"; readonly element: TypeExpr };
export type MappingExpr = { readonly kind: "mapping"; readonly key: TypeExpr; readonly value: TypeExpr };
export type TupleExpr = { readonly kind: "tuple"; readonly elements: readonly TypeExpr[] };
export type UnionExpr = { readonly kind: "union"; readonly alternatives: readonly TypeExpr[] };
export type LiteralExpr = { readonly kind: "literal"; readonly values: readonly LiteralValue[] };
export type AnyExpr = { readonly kind: "any" };
export type InstanceOfExpr = {
  readonly kind: "instance";
  readonly ctor: AnyConstructor;
  /** lets the coercer build an instance out of a mapping */
  readonly fromMapping?: (entries: Record<string, unknown>) => unknown;
};

/**
 * Closed set of type expressions. Matcher and coercer switch over `kind` exhaustively,
 * so adding a variant is a compile error everywhere it is not handled yet.
 */
export type TypeExpr =
  | PrimitiveExpr
  | SequenceExpr
  | SetExpr
  | MappingExpr
  | TupleExpr
  | UnionExpr
  | LiteralExpr
  | AnyExpr
  | InstanceOfExpr;

/**
 * A type expression tagged with the static type of the values it accepts.
 * The tag never exists at runtime, it only feeds {@link Infer}.
 */
export type Typed<T> = TypeExpr & { readonly [phantom]?: { value: T } };

export type Infer<E> = E extends { readonly [phantom]?: { value: infer T } } ? T : never;

type InferTuple<Elements extends readonly Typed<unknown>[]> = { -readonly [K in keyof Elements]: Infer<Elements[K]> };

const freeze = <T extends TypeExpr>(expr: T): T => {
  Object.freeze(expr);
  return expr;
};

const primitive = (kind: PrimitiveKind): PrimitiveExpr => freeze({ kind: "primitive", primitive: kind });

const string: Typed<string> = primitive("string");
const integer: Typed<number> = primitive("integer");
const number: Typed<number> = primitive("number");
const boolean: Typed<boolean> = primitive("boolean");
const bigint: Typed<bigint> = primitive("bigint");
const none: Typed<null | undefined> = primitive("none");
const any: Typed<unknown> = freeze({ kind: "any" });

const list = <T>(element: Typed<T>): Typed<T[]> => freeze({ kind: "sequence", element });

const set = <T>(element: Typed<T>): Typed<Set<T>> => freeze({ kind: "set", element });

function dict<V>(value: Typed<V>): Typed<Record<string, V>>;
function dict<V, K extends PropertyKey>(value: Typed<V>, key: Typed<K>): Typed<Record<K, V>>;
function dict(value: TypeExpr, key: TypeExpr = string): TypeExpr {
  return freeze({ kind: "mapping", key, value });
}

const tuple = <Elements extends Typed<unknown>[]>(...elements: Elements): Typed<InferTuple<Elements>> =>
  freeze({ kind: "tuple", elements: Object.freeze([...elements]) });

const union = <Alternatives extends Typed<unknown>[]>(
  ...alternatives: Alternatives
): Typed<Infer<Alternatives[number]>> => freeze({ kind: "union", alternatives: Object.freeze([...alternatives]) });

const optional = <T>(inner: Typed<T>): Typed<T | null | undefined> => union(inner, none);

const literal = <Values extends LiteralValue[]>(...values: Values): Typed<Values[number]> =>
  freeze({ kind: "literal", values: Object.freeze([...values]) });

const instanceOf = <T>(
  ctor: AnyConstructor<T>,
  options: { fromMapping?: (entries: Record<string, unknown>) => T } = {}
): Typed<T> => freeze({ kind: "instance", ctor, ...options });

/**
 * Type expression constructors.
 *
 * ```ts
 * const tags = t.list(t.string);                // Typed<string[]>
 * const port = t.optional(t.integer);           // Typed<number | null | undefined>
 * const env = t.literal("dev", "prod");         // Typed<"dev" | "prod">
 * ```
 */
export const t = {
  string,
  integer,
  int: integer,
  number,
  float: number,
  boolean,
  bool: boolean,
  bigint,
  none,
  any,
  list,
  set,
  dict,
  tuple,
  union,
  optional,
  literal,
  instanceOf,
} as const;

export const isOptional = (expr: TypeExpr): boolean =>
  expr.kind === "any" ||
  (expr.kind === "primitive" && expr.primitive === "none") ||
  (expr.kind === "union" && expr.alternatives.some(isOptional));

// structural, except for instance expressions where the class identity is the structure
export function exprEquals(left: TypeExpr, right: TypeExpr): boolean {
  if (left === right) {
    return true;
  }
  switch (left.kind) {
    case "any":
      return right.kind === "any";
    case "primitive":
      return right.kind === "primitive" && right.primitive === left.primitive;
    case "literal":
      return right.kind === "literal" && isEqual(left.values, right.values);
    case "sequence":
      return right.kind === "sequence" && exprEquals(left.element, right.element);
    case "set":
      return right.kind === "set" && exprEquals(left.element, right.element);
    case "mapping":
      return right.kind === "mapping" && exprEquals(left.key, right.key) && exprEquals(left.value, right.value);
    case "tuple":
      return right.kind === "tuple" && sameMembers(left.elements, right.elements);
    case "union":
      return right.kind === "union" && sameMembers(left.alternatives, right.alternatives);
    case "instance":
      return right.kind === "instance" && right.ctor === left.ctor;
    default:
      return never(left);
  }
}

const sameMembers = (left: readonly TypeExpr[], right: readonly TypeExpr[]) =>
  left.length === right.length && left.every((member, index) => exprEquals(member, right[index]));
