import type { TypeExpr } from "./expressions";
import { TypeMismatchError } from "./errors";
import { defaultChecker, type TypeChecker } from "./matcher";

export type ParameterSpec = readonly [name: string, expr: TypeExpr];

export type ContractSignature = {
  /** used in error messages, defaults to the wrapped function's name */
  name?: string;
  params?: readonly ParameterSpec[];
  /** checks every argument past the declared parameters; without it extra arguments pass through */
  rest?: TypeExpr;
  returns?: TypeExpr;
  checker?: TypeChecker;
};

function enforceArguments(signature: ContractSignature, checker: TypeChecker, args: readonly unknown[]) {
  const params = signature.params ?? [];
  const count = signature.rest ? Math.max(args.length, params.length) : params.length;
  for (let index = 0; index < count; index++) {
    const [parameter, expected] = params[index] ?? [`rest[${index - params.length}]`, signature.rest];
    if (!expected) {
      continue;
    }
    const mismatch = checker.explain(args[index], expected);
    if (mismatch) {
      throw new TypeMismatchError({ expected, actual: args[index], role: "argument", parameter, mismatch });
    }
  }
}

function typecheckedFunction<This, Args extends unknown[], Return>(
  signature: ContractSignature,
  fn: (this: This, ...args: Args) => Return
): (this: This, ...args: Args) => Return {
  const checker = signature.checker ?? defaultChecker;
  const name = signature.name ?? fn.name;
  const { returns } = signature;
  const wrapper = function (this: This, ...args: Args): Return {
    // nothing runs before every argument conforms
    enforceArguments(signature, checker, args);
    const result = fn.apply(this, args);
    if (returns) {
      const mismatch = checker.explain(result, returns);
      if (mismatch) {
        throw new TypeMismatchError({ expected: returns, actual: result, role: "return", parameter: name, mismatch });
      }
    }
    return result;
  };
  Object.defineProperty(wrapper, "name", { value: name });
  return wrapper;
}

/**
 * Wraps a function with a runtime contract: arguments are matched (never coerced) against
 * their declared expressions before the call, the result against `returns` after it.
 *
 * ```ts
 * const area = typechecked(
 *   { params: [["width", t.number], ["height", t.number]], returns: t.number },
 *   (width: number, height: number) => width * height,
 * );
 * ```
 *
 * `typechecked.method(signature)` applies the same contract as a method decorator.
 */
export const typechecked = Object.assign(typecheckedFunction, {
  method:
    (signature: ContractSignature) =>
    <This, Args extends unknown[], Return>(
      target: (this: This, ...args: Args) => Return,
      context: ClassMethodDecoratorContext<This, (this: This, ...args: Args) => Return>
    ) =>
      typecheckedFunction({ name: String(context.name), ...signature }, target),
});
