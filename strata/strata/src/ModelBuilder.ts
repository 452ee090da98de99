import type { RequiredKeysOf, Simplify } from "type-fest";
import { t, type Typed } from "strata-types";
import { parseConfig, type StrataConfig } from "./config";
import type { ALL_KEYS } from "./dependency-graph";
import type {
  CheckDeclaration,
  ComputedDeclaration,
  Declarations,
  FieldDeclaration,
  FieldInitial,
  OwnDeclarations,
} from "./declarations";
import { DeclarationError } from "./errors";
import type { Strata, StrataInit } from "./Strata";

/** instance type of a declared container: the dict surface plus the declared members */
export type StrataInstance<Shape> = Strata & Shape;

// constructor input may be omitted when every declared field has a default
type ConstructorArgs<Init extends object> = [RequiredKeysOf<Init>] extends [never]
  ? [init?: Simplify<Init & Record<string, unknown>> | StrataInit]
  : [init: Simplify<Init & Record<string, unknown>> | Exclude<StrataInit, Record<string, unknown>>];

export interface StrataClass<Shape extends object, Init extends object> {
  new (...args: ConstructorArgs<Init>): StrataInstance<Shape>;
  readonly prototype: Strata;
  readonly name: string;
  readonly modelName: string;
  declarations: Declarations;
  extend(name: string): ModelBuilder<Shape, Init>;
  fromMapping(entries: Record<string, unknown>): StrataInstance<Shape>;
  convert(value: Record<string, unknown>): StrataInstance<Shape>;
  unconvert: (typeof Strata)["unconvert"];
}

export type FieldOptions<T> = { default: T; factory?: never } | { factory: () => T; default?: never };

export type ComputedOptions<Shape> = {
  /** names of fields or computed members the producer reads, or `"*"` for any key */
  deps: readonly Extract<keyof Shape, string>[] | typeof ALL_KEYS;
  cache?: boolean;
};

const emptyDeclarations: OwnDeclarations = { fields: new Map(), computed: new Map(), checks: [], config: {} };

/**
 * Declares the members of a container type. Every call returns a new builder, the
 * declarations only take effect in {@link ModelBuilder.build}:
 *
 * ```ts
 * const Person = Strata.extend("Person")
 *   .field("name", t.string)
 *   .field("age", t.integer, { default: 0 })
 *   .check("name", (self, value) => String(value).trim())
 *   .configure({ strict: true, coerce: true })
 *   .build();
 * ```
 */
export class ModelBuilder<Shape extends object, Init extends object> {
  readonly #parent: typeof Strata;
  readonly #name: string;
  readonly #own: OwnDeclarations;

  constructor(parent: typeof Strata, name: string, own: OwnDeclarations = emptyDeclarations) {
    this.#parent = parent;
    this.#name = name;
    this.#own = own;
  }

  #with<NextShape extends object, NextInit extends object>(
    own: Partial<OwnDeclarations>
  ): ModelBuilder<NextShape, NextInit> {
    return new ModelBuilder<NextShape, NextInit>(this.#parent, this.#name, { ...this.#own, ...own });
  }

  field<Name extends string>(name: Name): ModelBuilder<Simplify<Shape & Record<Name, unknown>>, Simplify<Init & Record<Name, unknown>>>;
  field<Name extends string, T>(
    name: Name,
    type: Typed<T>
  ): ModelBuilder<Simplify<Shape & Record<Name, T>>, Simplify<Init & Record<Name, unknown>>>;
  field<Name extends string, T>(
    name: Name,
    type: Typed<T>,
    options: FieldOptions<T>
  ): ModelBuilder<Simplify<Shape & Record<Name, T>>, Simplify<Init & Partial<Record<Name, unknown>>>>;
  field<NextShape extends object, NextInit extends object>(
    name: string,
    type: Typed<unknown> = t.any,
    options?: FieldOptions<unknown>
  ): ModelBuilder<NextShape, NextInit> {
    const initial = fieldInitial(`${this.#name}.${name}`, options);
    const declaration: FieldDeclaration = { name, type, initial, required: initial === null };
    return this.#with<NextShape, NextInit>({ fields: new Map(this.#own.fields).set(name, declaration) });
  }

  computed<Name extends string, R>(
    name: Name,
    produce: (self: StrataInstance<Shape>) => R,
    options: ComputedOptions<Shape>
  ): ModelBuilder<Simplify<Shape & Readonly<Record<Name, R>>>, Init> {
    const declaration: ComputedDeclaration = {
      name,
      cache: options.cache ?? true,
      deps: options.deps,
      produce,
    };
    return this.#with<Simplify<Shape & Readonly<Record<Name, R>>>, Init>({
      computed: new Map(this.#own.computed).set(name, declaration),
    });
  }

  /** `validate` receives the value after type checking and returns the value to store */
  check(key: string, validate: (self: StrataInstance<Shape>, value: unknown) => unknown): ModelBuilder<Shape, Init> {
    const declaration: CheckDeclaration = { key, run: validate };
    return this.#with<Shape, Init>({ checks: [...this.#own.checks, declaration] });
  }

  configure(options: Partial<StrataConfig>): ModelBuilder<Shape, Init> {
    return this.#with<Shape, Init>({ config: { ...this.#own.config, ...parseConfig(options, this.#name) } });
  }

  build(): StrataClass<Shape, Init> {
    const parent = this.#parent;
    const declarations = parent.declarations.derive(this.#name, this.#own, (name) => name in parent.prototype);
    const model = class extends parent {
      static declarations = declarations;
    };
    Object.defineProperty(model, "name", { value: this.#name });
    // the declared members are only known to the builder's type parameters
    return model as unknown as StrataClass<Shape, Init>;
  }
}

function fieldInitial(qualifiedName: string, options: FieldOptions<unknown> | undefined): FieldInitial | null {
  if (!options) {
    return null;
  }
  const hasDefault = "default" in options;
  const hasFactory = "factory" in options && options.factory !== undefined;
  if (hasDefault && hasFactory) {
    throw new DeclarationError(`${qualifiedName} declares both a default and a factory`);
  }
  if (options.factory) {
    return { kind: "factory", factory: options.factory };
  }
  return hasDefault ? { kind: "value", value: options.default } : null;
}
