import type { LiteralValue, TypeExpr } from "./expressions";
import { isPlainRecord } from "./mapping";
import { never } from "./utils";

export type MismatchPath = readonly (string | number)[];

/** first failing sub-expression found while matching a value */
export type Mismatch = {
  readonly path: MismatchPath;
  readonly expected: TypeExpr;
  readonly actual: unknown;
  readonly reason: string;
};

const renderLiteral = (value: LiteralValue) =>
  typeof value === "bigint" ? `${value}n` : JSON.stringify(value);

export function describeExpr(expr: TypeExpr): string {
  switch (expr.kind) {
    case "any":
      return "any";
    case "primitive":
      return expr.primitive;
    case "literal":
      return `literal[${expr.values.map(renderLiteral).join(", ")}]`;
    case "sequence":
      return `list[${describeExpr(expr.element)}]`;
    case "set":
      return `set[${describeExpr(expr.element)}]`;
    case "mapping":
      return `dict[${describeExpr(expr.key)}, ${describeExpr(expr.value)}]`;
    case "tuple":
      return `tuple[${expr.elements.map(describeExpr).join(", ")}]`;
    case "union":
      return expr.alternatives.map(describeExpr).join(" | ");
    case "instance":
      return expr.ctor.name || "<anonymous class>";
    default:
      return never(expr);
  }
}

export function describeValue(value: unknown): string {
  switch (typeof value) {
    case "string":
      return `string ${JSON.stringify(value.length > 40 ? `${value.slice(0, 40)}…` : value)}`;
    case "number":
    case "boolean":
      return `${typeof value} ${value}`;
    case "bigint":
      return `bigint ${value}n`;
    case "undefined":
      return "undefined";
    case "function":
      return "function";
    case "symbol":
      return "symbol";
  }
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  if (isPlainRecord(value)) {
    return "object";
  }
  return typeof value === "object" ? value.constructor?.name || "object" : String(value);
}

export const formatPath = (path: MismatchPath): string =>
  path.map((segment) => (typeof segment === "number" ? `[${segment}]` : `.${segment}`)).join("").replace(/^\./, "");
