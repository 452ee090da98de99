export { CoercionError, TypeCheckError, TypeMismatchError } from "strata-types";

export class KeyError extends Error {
  readonly key: string;

  constructor(key: string, message = `unknown key "${key}"`) {
    super(message);
    this.name = new.target.name;
    this.key = key;
  }
}

export class ReadOnlyKeyError extends KeyError {
  constructor(key: string, modelName: string) {
    super(key, `"${key}" is a computed member of ${modelName} and cannot be assigned or deleted`);
  }
}

export class ValueError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingFieldError extends ValueError {
  readonly fields: readonly string[];

  constructor(fields: readonly string[], modelName: string) {
    super(`${modelName} is missing required field${fields.length > 1 ? "s" : ""} ${fields.map((field) => `"${field}"`).join(", ")}`);
    this.fields = fields;
  }
}

export class JsonCompatibilityError extends ValueError {
  readonly key: string;
  readonly path: readonly (string | number)[];

  constructor(key: string, path: readonly (string | number)[], reason: string) {
    const location = [key, ...path].map((segment) => (typeof segment === "number" ? `[${segment}]` : `.${segment}`));
    super(`${location.join("").slice(1)} is not JSON-compatible: ${reason}`);
    this.key = key;
    this.path = path;
  }
}

export class DeclarationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class CycleError extends DeclarationError {
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[], modelName: string) {
    super(`computed members of ${modelName} depend on each other in a cycle: ${cycle.join(" -> ")}`);
    this.cycle = cycle;
  }
}
