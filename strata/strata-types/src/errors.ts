import type { TypeExpr } from "./expressions";
import { describeExpr, describeValue, formatPath, type Mismatch, type MismatchPath } from "./describe";

export type MismatchRole = "value" | "field" | "argument" | "return";

export class TypeCheckError extends TypeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type TypeMismatchDetails = {
  expected: TypeExpr;
  actual: unknown;
  role?: MismatchRole;
  /** parameter or field name */
  parameter?: string;
  mismatch?: Mismatch | null;
};

const subject = ({ role = "value", parameter }: TypeMismatchDetails) => {
  switch (role) {
    case "argument":
      return `argument "${parameter}"`;
    case "return":
      return parameter ? `return value of ${parameter}` : "return value";
    case "field":
      return `field "${parameter}"`;
    case "value":
      return "value";
  }
};

export class TypeMismatchError extends TypeCheckError {
  readonly expected: TypeExpr;
  readonly actual: unknown;
  readonly role: MismatchRole;
  readonly parameter: string | undefined;
  readonly mismatch: Mismatch | null;

  constructor(details: TypeMismatchDetails) {
    const { expected, actual, mismatch = null } = details;
    let message = `${subject(details)} expected ${describeExpr(expected)}, got ${describeValue(actual)}`;
    if (mismatch && mismatch.path.length > 0) {
      message += ` (at ${formatPath(mismatch.path)}: ${mismatch.reason})`;
    }
    super(message);
    this.expected = expected;
    this.actual = actual;
    this.role = details.role ?? "value";
    this.parameter = details.parameter;
    this.mismatch = mismatch;
  }
}

export type CoercionFailure = {
  expected: TypeExpr;
  actual: unknown;
  reason: string;
  path?: MismatchPath;
  failures?: readonly CoercionError[];
};

export class CoercionError extends TypeCheckError {
  readonly expected: TypeExpr;
  readonly actual: unknown;
  readonly reason: string;
  readonly path: MismatchPath;
  /** per-alternative failures when coercing into a union */
  readonly failures: readonly CoercionError[];

  constructor({ expected, actual, reason, path = [], failures = [] }: CoercionFailure, options?: ErrorOptions) {
    const location = path.length > 0 ? ` at ${formatPath(path)}` : "";
    super(`cannot coerce ${describeValue(actual)} to ${describeExpr(expected)}${location}: ${reason}`, options);
    this.expected = expected;
    this.actual = actual;
    this.reason = reason;
    this.path = path;
    this.failures = failures;
  }

  /** same failure, reported one container level further out */
  within(segment: string | number): CoercionError {
    return new CoercionError(
      {
        expected: this.expected,
        actual: this.actual,
        reason: this.reason,
        path: [segment, ...this.path],
        failures: this.failures,
      },
      { cause: this }
    );
  }
}
