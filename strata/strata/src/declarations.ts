import { cloneDeep } from "lodash-es";
import { isMapping, type TypeExpr } from "strata-types";
import { defaultConfig, type StrataConfig } from "./config";
import { ALL_KEYS, DependencyGraph } from "./dependency-graph";
import { DeclarationError } from "./errors";
import type { Strata } from "./Strata";

export type FieldInitial = { kind: "value"; value: unknown } | { kind: "factory"; factory: () => unknown };

export type FieldDeclaration = {
  readonly name: string;
  readonly type: TypeExpr;
  readonly initial: FieldInitial | null;
  readonly required: boolean;
};

export type ComputedDeclaration = {
  readonly name: string;
  readonly cache: boolean;
  readonly deps: readonly string[] | typeof ALL_KEYS;
  produce(instance: Strata): unknown;
};

export type CheckDeclaration = {
  readonly key: string;
  run(instance: Strata, value: unknown): unknown;
};

/** what a single builder adds on top of its parent type */
export type OwnDeclarations = {
  readonly fields: ReadonlyMap<string, FieldDeclaration>;
  readonly computed: ReadonlyMap<string, ComputedDeclaration>;
  readonly checks: readonly CheckDeclaration[];
  readonly config: Partial<StrataConfig>;
};

/** fresh value for a field absent from the constructor input */
export const initialValue = (initial: FieldInitial): unknown =>
  initial.kind === "factory"
    ? initial.factory()
    : Array.isArray(initial.value) || isMapping(initial.value) || initial.value instanceof Set
      ? cloneDeep(initial.value)
      : initial.value;

/**
 * Everything a declaring type knows about its members: fields, computed members, checks,
 * configuration and the dependency graph derived from the computed members.
 *
 * Built once per type by {@link Declarations.derive} and shared read-only by every instance.
 * Inherited declarations are copied into the child, so lookups never walk the parent chain.
 */
export class Declarations {
  private constructor(
    readonly modelName: string,
    readonly fields: ReadonlyMap<string, FieldDeclaration>,
    readonly computed: ReadonlyMap<string, ComputedDeclaration>,
    readonly checks: ReadonlyMap<string, readonly CheckDeclaration[]>,
    readonly config: Readonly<StrataConfig>,
    readonly parent: Declarations | null
  ) {
    this.graph = new DependencyGraph(computed, modelName);
    Object.freeze(this);
  }

  readonly graph: DependencyGraph;

  static root(modelName: string): Declarations {
    return new Declarations(modelName, new Map(), new Map(), new Map(), defaultConfig, null);
  }

  derive(modelName: string, own: OwnDeclarations, isReserved: (name: string) => boolean): Declarations {
    for (const name of [...own.fields.keys(), ...own.computed.keys()]) {
      if (isReserved(name)) {
        throw new DeclarationError(`${modelName}.${name} would shadow a container method`);
      }
    }
    for (const name of own.fields.keys()) {
      if (own.computed.has(name)) {
        throw new DeclarationError(`${modelName}.${name} is declared both as a field and as a computed member`);
      }
    }

    const fields = new Map(this.fields);
    const computed = new Map(this.computed);
    for (const [name, field] of own.fields) {
      if (computed.delete(name)) {
        console.warn(`${modelName}.${name} redeclares an inherited computed member as a field`);
      }
      fields.set(name, field);
    }
    for (const [name, declaration] of own.computed) {
      if (fields.delete(name)) {
        console.warn(`${modelName}.${name} redeclares an inherited field as a computed member`);
      }
      computed.set(name, declaration);
    }

    for (const declaration of computed.values()) {
      if (declaration.deps === ALL_KEYS) {
        continue;
      }
      for (const dependency of declaration.deps) {
        if (!fields.has(dependency) && !computed.has(dependency)) {
          throw new DeclarationError(
            `${modelName}.${declaration.name} depends on "${dependency}", which is neither a field nor a computed member`
          );
        }
      }
    }

    const checks = new Map<string, readonly CheckDeclaration[]>(this.checks);
    for (const check of own.checks) {
      checks.set(check.key, [...(checks.get(check.key) ?? []), check]);
    }

    return new Declarations(modelName, fields, computed, checks, { ...this.config, ...own.config }, this);
  }
}
