import { isEqual, toPath } from "lodash-es";
import invariant from "tiny-invariant";
import {
  CoercionError,
  TypeMismatchError,
  defaultChecker,
  defaultCoercer,
  describeValue,
  isMapping,
  isMappingLike,
  isPlainRecord,
  mappingEntries,
  mappingProtocol,
  t,
  type AnyConstructor,
  type MappingLike,
  type TypeExpr,
  type Typed,
} from "strata-types";
import { ComputedCache, type CacheState } from "./computed-cache";
import { Declarations, initialValue } from "./declarations";
import { JsonCompatibilityError, KeyError, MissingFieldError, ReadOnlyKeyError } from "./errors";
import { findJsonViolation } from "./json";
import { ModelBuilder } from "./ModelBuilder";
import { buildAttributeProxy } from "./proxies/attribute-proxy";

export const stateSymbol = Symbol("strata state");

export type StrataInit = Record<string, unknown> | ReadonlyMap<string, unknown> | MappingLike;
export type NestedPath = string | readonly (string | number)[];

type InstanceState = {
  readonly model: typeof Strata;
  readonly storage: Map<string, unknown>;
  readonly cache: ComputedCache;
  /** arrays whose mapping elements were already turned into containers */
  readonly realized: WeakSet<unknown[]>;
};

const missing = Symbol("missing");

const stateOf = (instance: Strata): InstanceState => instance[stateSymbol];

const declarationsOf = (instance: Strata): Declarations => stateOf(instance).model.declarations;

function entriesOf(source: unknown): [string, unknown][] {
  const entries = mappingEntries(source);
  if (!entries) {
    throw new TypeError(`expected a mapping, got ${describeValue(source)}`);
  }
  const result: [string, unknown][] = [];
  for (const [key, value] of entries) {
    if (typeof key !== "string") {
      throw new KeyError(String(key), `container keys must be strings, got ${describeValue(key)}`);
    }
    result.push([key, value]);
  }
  return result;
}

const realizeArray = (items: readonly unknown[]): unknown[] =>
  items.map((item) => (isPlainRecord(item) ? new Strata(item) : Array.isArray(item) ? realizeArray(item) : item));

/**
 * Single read path behind `get()` and attribute reads.
 *
 * Plain records and arrays are converted one level at a time, when they are first read,
 * and written back to storage: reading an unmodified slot twice returns the same object.
 */
function readKey(instance: Strata, key: string): unknown {
  const state = stateOf(instance);
  const { computed, config } = state.model.declarations;
  const declaration = computed.get(key);
  if (declaration) {
    return state.cache.read(declaration, instance);
  }
  if (!state.storage.has(key)) {
    return missing;
  }
  const value = state.storage.get(key);
  if (!config.autoConvert) {
    return value;
  }
  if (isPlainRecord(value)) {
    const converted = new Strata(value);
    state.storage.set(key, converted);
    return converted;
  }
  if (Array.isArray(value) && !state.realized.has(value)) {
    const realized = realizeArray(value);
    state.realized.add(realized);
    state.storage.set(key, realized);
    return realized;
  }
  return value;
}

function enforceType(key: string, expected: TypeExpr, value: unknown, coerce: boolean): unknown {
  const mismatch = defaultChecker.explain(value, expected);
  if (!mismatch) {
    return value;
  }
  if (!coerce) {
    throw new TypeMismatchError({ expected, actual: value, role: "field", parameter: key, mismatch });
  }
  try {
    return defaultCoercer.coerce(value, expected);
  } catch (error) {
    if (error instanceof CoercionError) {
      throw error.within(key);
    }
    throw error;
  }
}

/**
 * Single write path behind `set()`, attribute assignment and construction.
 * Every check runs before storage is touched, invalidation runs only after the store.
 */
function writeKey(instance: Strata, key: string, value: unknown, invalidate = true): void {
  const state = stateOf(instance);
  const { modelName, fields, computed, checks, config, graph } = state.model.declarations;
  if (computed.has(key)) {
    throw new ReadOnlyKeyError(key, modelName);
  }
  const field = fields.get(key);
  if (!field && config.strict && !config.allowExtra) {
    throw new KeyError(key, `${modelName} does not declare "${key}" and does not allow extra keys`);
  }
  let candidate = value;
  if (field && (config.strict || config.coerce)) {
    candidate = enforceType(key, field.type, candidate, config.coerce);
  }
  if (config.enforceJson) {
    const violation = findJsonViolation(candidate);
    if (violation) {
      throw new JsonCompatibilityError(key, violation.path, violation.reason);
    }
  }
  for (const check of checks.get(key) ?? []) {
    candidate = check.run(instance, candidate);
  }
  state.storage.set(key, candidate);
  if (invalidate) {
    state.cache.invalidate(graph.affectedBy(key));
  }
}

function removeKey(instance: Strata, key: string): void {
  const state = stateOf(instance);
  const { modelName, computed, graph } = state.model.declarations;
  if (computed.has(key)) {
    throw new ReadOnlyKeyError(key, modelName);
  }
  if (!state.storage.delete(key)) {
    throw new KeyError(key);
  }
  state.cache.invalidate(graph.affectedBy(key));
}

function populate(instance: Strata, init: StrataInit): void {
  const { modelName, fields, computed } = declarationsOf(instance);
  const provided = new Map(entriesOf(init));
  for (const key of provided.keys()) {
    if (computed.has(key)) {
      throw new ReadOnlyKeyError(key, modelName);
    }
  }
  const absent: string[] = [];
  for (const field of fields.values()) {
    if (provided.has(field.name)) {
      continue;
    }
    if (field.initial) {
      provided.set(field.name, initialValue(field.initial));
    } else {
      absent.push(field.name);
    }
  }
  if (absent.length > 0) {
    throw new MissingFieldError(absent, modelName);
  }
  // nothing is cached yet, so there is nothing to invalidate
  for (const [key, value] of provided) {
    writeKey(instance, key, value, false);
  }
}

const toSegments = (path: NestedPath): readonly (string | number)[] =>
  typeof path === "string" ? toPath(path) : path;

const renderPath = (segments: readonly (string | number)[]) =>
  segments.map((segment) => (typeof segment === "number" || /^\d+$/.test(segment) ? `[${segment}]` : `.${segment}`))
    .join("")
    .replace(/^\./, "");

function childOf(container: unknown, segment: string | number): unknown {
  const key = String(segment);
  if (container instanceof Strata) {
    return readKey(container, key);
  }
  if (Array.isArray(container)) {
    const index = Number(segment);
    return Number.isInteger(index) && index >= 0 && index < container.length ? container[index] : missing;
  }
  if (container instanceof Map) {
    return container.has(key) ? container.get(key) : missing;
  }
  if (isPlainRecord(container)) {
    return Object.hasOwn(container, key) ? container[key] : missing;
  }
  return missing;
}

function assignChild(container: unknown, segment: string | number, value: unknown, path: string): void {
  const key = String(segment);
  if (container instanceof Strata) {
    writeKey(container, key, value);
  } else if (Array.isArray(container)) {
    const index = Number(segment);
    if (!Number.isInteger(index) || index < 0 || index > container.length) {
      throw new KeyError(path, `index ${key} is out of range at "${path}"`);
    }
    container[index] = value;
  } else if (container instanceof Map) {
    container.set(key, value);
  } else if (isPlainRecord(container)) {
    Object.defineProperty(container, key, { value, writable: true, enumerable: true, configurable: true });
  } else {
    throw new KeyError(path, `cannot assign "${path}": ${describeValue(container)} is not a container`);
  }
}

function assignPath(root: unknown, segments: readonly (string | number)[], value: unknown, path: string): void {
  let container = root;
  for (const segment of segments.slice(0, -1)) {
    let next = childOf(container, segment);
    if (next === missing) {
      assignChild(container, segment, new Strata(), path);
      next = childOf(container, segment);
      invariant(next !== missing, `intermediate level "${segment}" of "${path}" vanished after assignment`);
    }
    container = next;
  }
  assignChild(container, segments[segments.length - 1], value, path);
}

/**
 * Top-level keys whose whole value the container validates on every write. Nested writes
 * under such a key go to a copy that is stored through the write path.
 */
function guardsKey(instance: Strata, key: string): boolean {
  const { fields, checks, config } = declarationsOf(instance);
  return config.enforceJson || checks.has(key) || (fields.has(key) && (config.strict || config.coerce));
}

function cloneContainer(container: Strata): Strata {
  const { model, storage } = stateOf(container);
  return new model(new Map([...storage].map(([key, entry]): [string, unknown] => [key, cloneTree(entry)])));
}

/** copy of nested containers, arrays, maps and records; anything else is shared */
function cloneTree(value: unknown): unknown {
  if (value instanceof Strata) {
    return cloneContainer(value);
  }
  if (Array.isArray(value)) {
    return value.map(cloneTree);
  }
  if (value instanceof Map) {
    return new Map([...value].map(([key, entry]): [unknown, unknown] => [key, cloneTree(entry)]));
  }
  if (isPlainRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, cloneTree(entry)]));
  }
  return value;
}

/** result of merging `incoming` into `current`, both left untouched */
function mergedValue(current: unknown, incoming: unknown): unknown {
  if (!isMapping(incoming)) {
    return incoming;
  }
  if (current instanceof Strata) {
    return cloneContainer(current).merge(new Map(entriesOf(incoming)));
  }
  if (isPlainRecord(current)) {
    const merged = new Map(Object.entries(current));
    for (const [key, value] of entriesOf(incoming)) {
      merged.set(key, mergedValue(merged.get(key), value));
    }
    return Object.fromEntries(merged);
  }
  if (current instanceof Map || isMappingLike(current)) {
    const merged = new Map<unknown, unknown>(mappingEntries(current) ?? []);
    for (const [key, value] of entriesOf(incoming)) {
      merged.set(key, mergedValue(merged.get(key), value));
    }
    return merged;
  }
  return incoming;
}

function convertNested(value: unknown): unknown {
  if (isPlainRecord(value)) {
    return new Strata(convertRecord(value));
  }
  return Array.isArray(value) ? value.map(convertNested) : value;
}

const convertRecord = (record: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(record).map(([key, value]) => [key, convertNested(value)]));

/**
 * Hybrid container: an ordered string-keyed store with attribute-style access, typed fields,
 * computed members and per-key checks.
 *
 * ```ts
 * const Calc = Strata.extend("Calc")
 *   .field("a", t.integer, { default: 1 })
 *   .field("b", t.integer, { default: 2 })
 *   .computed("total", (self) => self.a + self.b, { deps: ["a", "b"] })
 *   .build();
 *
 * const calc = new Calc({ a: 5 });
 * calc.total; // 7
 * calc.b = 10; // invalidates `total`
 * ```
 *
 * Every instance is a proxy; `instance.key` and `instance.get("key")` share one read path,
 * `instance.key = value` and `instance.set("key", value)` share one write path. Keys that
 * collide with a method name stay reachable through `get`/`set`.
 */
export class Strata implements MappingLike {
  [key: string]: unknown;

  declare readonly [stateSymbol]: InstanceState;

  static declarations: Declarations = Declarations.root("Strata");

  static get modelName(): string {
    return this.declarations.modelName;
  }

  /** starts the declaration of a subtype */
  static extend(name: string): ModelBuilder<Record<never, never>, Record<never, never>> {
    return new ModelBuilder(this, name);
  }

  static fromMapping(entries: Record<string, unknown>): Strata {
    return new this(entries);
  }

  /**
   * Eagerly rewrites a plain structure: the top-level record becomes an instance of this
   * type, nested records become plain containers, arrays are copied in order.
   */
  static convert(value: Record<string, unknown>): Strata;
  static convert(value: unknown): unknown;
  static convert(value: unknown): unknown {
    if (isPlainRecord(value)) {
      return new this(convertRecord(value));
    }
    return Array.isArray(value) ? value.map(convertNested) : value;
  }

  /** structural inverse of {@link Strata.convert}: only plain records, arrays, maps and sets remain */
  static unconvert(value: Strata): Record<string, unknown>;
  static unconvert(value: unknown): unknown;
  static unconvert(value: unknown): unknown {
    if (value instanceof Strata) {
      return Object.fromEntries([...stateOf(value).storage].map(([key, entry]) => [key, Strata.unconvert(entry)]));
    }
    if (Array.isArray(value)) {
      return value.map((item) => Strata.unconvert(item));
    }
    if (value instanceof Map) {
      return new Map([...value].map(([key, entry]): [unknown, unknown] => [key, Strata.unconvert(entry)]));
    }
    if (value instanceof Set) {
      return new Set([...value].map((item) => Strata.unconvert(item)));
    }
    if (isPlainRecord(value)) {
      return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, Strata.unconvert(entry)]));
    }
    return value;
  }

  constructor(init: StrataInit = {}) {
    const state: InstanceState = {
      model: new.target,
      storage: new Map(),
      cache: new ComputedCache(),
      realized: new WeakSet(),
    };
    // non-enumerable and configurable, so the proxy may leave it out of its own keys
    Object.defineProperty(this, stateSymbol, { value: state, configurable: true });
    const self: Strata = buildAttributeProxy<Strata>(this, {
      read: (key) => {
        const value = readKey(self, key);
        return value === missing ? undefined : value;
      },
      write: (key, value) => writeKey(self, key, value),
      remove: (key) => removeKey(self, key),
      has: (key) => self.has(key),
      isStored: (key) => state.storage.has(key),
      keys: () => state.storage.keys(),
    });
    populate(self, init);
    return self;
  }

  get size(): number {
    return stateOf(this).storage.size;
  }

  /** value stored or computed under `key`; without a fallback a missing key throws {@link KeyError} */
  get(key: string, ...fallback: [] | [unknown]): unknown {
    const value = readKey(this, key);
    if (value !== missing) {
      return value;
    }
    if (fallback.length > 0) {
      return fallback[0];
    }
    throw new KeyError(key);
  }

  set(key: string, value: unknown): this {
    writeKey(this, key, value);
    return this;
  }

  has(key: string): boolean {
    return stateOf(this).storage.has(key) || declarationsOf(this).computed.has(key);
  }

  delete(key: string): void {
    removeKey(this, key);
  }

  keys(): IterableIterator<string> {
    return stateOf(this).storage.keys();
  }

  *values(): Generator<unknown> {
    for (const key of [...this.keys()]) {
      yield this.get(key);
    }
  }

  *entries(): Generator<[string, unknown]> {
    for (const key of [...this.keys()]) {
      yield [key, this.get(key)];
    }
  }

  [Symbol.iterator](): Generator<[string, unknown]> {
    return this.entries();
  }

  [mappingProtocol](): Iterable<readonly [string, unknown]> {
    return this.entries();
  }

  update(other: StrataInit): this {
    for (const [key, value] of entriesOf(other)) {
      writeKey(this, key, value);
    }
    return this;
  }

  pop(key: string, ...fallback: [] | [unknown]): unknown {
    if (fallback.length > 0 && !this.has(key)) {
      return fallback[0];
    }
    const value = this.get(key);
    removeKey(this, key);
    return value;
  }

  setDefault(key: string, value: unknown): unknown {
    if (!this.has(key)) {
      writeKey(this, key, value);
    }
    return this.get(key);
  }

  /** new instance of the same type over the same stored values */
  copy(): Strata {
    const { model, storage } = stateOf(this);
    return new model(storage);
  }

  deepCopy(): Strata {
    return new (stateOf(this).model)(Strata.unconvert(this));
  }

  /** plain container holding only `keys` (missing ones are skipped) */
  extract(keys: readonly string[]): Strata {
    const { storage } = stateOf(this);
    return new Strata(new Map(keys.filter((key) => storage.has(key)).map((key): [string, unknown] => [key, storage.get(key)])));
  }

  exclude(keys: readonly string[]): Strata {
    const excluded = new Set(keys);
    return new Strata(new Map([...stateOf(this).storage].filter(([key]) => !excluded.has(key))));
  }

  rename(renames: Record<string, string>): this {
    const { storage } = stateOf(this);
    for (const [from, to] of Object.entries(renames)) {
      if (from === to) {
        continue;
      }
      if (!storage.has(from)) {
        throw new KeyError(from);
      }
      writeKey(this, to, storage.get(from));
      removeKey(this, from);
    }
    return this;
  }

  /** runs every stored value through the write path again and checks required fields */
  validate(): this {
    const { storage } = stateOf(this);
    const { modelName, fields } = declarationsOf(this);
    const absent = [...fields.values()].filter((field) => field.required && !storage.has(field.name));
    if (absent.length > 0) {
      throw new MissingFieldError(
        absent.map((field) => field.name),
        modelName
      );
    }
    for (const [key, value] of [...storage]) {
      writeKey(this, key, value);
    }
    return this;
  }

  cacheState(name: string): CacheState {
    if (!declarationsOf(this).computed.has(name)) {
      throw new KeyError(name, `"${name}" is not a computed member`);
    }
    return stateOf(this).cache.state(name);
  }

  getNested(path: NestedPath): unknown {
    const segments = toSegments(path);
    let current: unknown = this;
    for (const [depth, segment] of segments.entries()) {
      current = childOf(current, segment);
      if (current === missing) {
        throw new KeyError(renderPath(segments.slice(0, depth + 1)));
      }
    }
    return current;
  }

  hasNested(path: NestedPath): boolean {
    try {
      this.getNested(path);
      return true;
    } catch (error) {
      if (error instanceof KeyError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Assigns through every level, creating missing intermediate containers on the way. When the
   * top-level key carries a declared type, checks or JSON enforcement, the change is made on a
   * copy of its value and stored through the write path, so a rejected write changes nothing.
   */
  setNested(path: NestedPath, value: unknown): this {
    const segments = toSegments(path);
    const rendered = renderPath(segments);
    if (segments.length === 0) {
      throw new KeyError(rendered, "empty path");
    }
    const [head, ...rest] = segments;
    const key = String(head);
    if (rest.length === 0) {
      return this.set(key, value);
    }
    const { modelName, computed, graph } = declarationsOf(this);
    if (computed.has(key)) {
      throw new ReadOnlyKeyError(key, modelName);
    }
    const stored = readKey(this, key);
    const guarded = guardsKey(this, key);
    const top = stored === missing ? new Strata() : guarded ? cloneTree(stored) : stored;
    assignPath(top, rest, value, rendered);
    if (guarded || stored === missing) {
      writeKey(this, key, top);
    } else {
      // nested containers do not know about their parent's computed members
      stateOf(this).cache.invalidate(graph.affectedBy(key));
    }
    return this;
  }

  /**
   * Deep merge: where both sides hold mappings the merge recurses, otherwise the incoming
   * value replaces the stored one through the write path. Keys guarded as in
   * {@link Strata.setNested} are merged on a copy that is then written as a whole.
   */
  merge(other: StrataInit): this {
    const state = stateOf(this);
    for (const [key, incoming] of entriesOf(other)) {
      const current = state.storage.has(key) ? readKey(this, key) : missing;
      if (current instanceof Strata && isMapping(incoming) && !guardsKey(this, key)) {
        current.merge(new Map(entriesOf(incoming)));
        state.cache.invalidate(state.model.declarations.graph.affectedBy(key));
      } else {
        writeKey(this, key, current === missing ? incoming : mergedValue(current, incoming));
      }
    }
    return this;
  }

  deepEquals(other: unknown): boolean {
    return isEqual(Strata.unconvert(this), Strata.unconvert(other));
  }

  toJSON(): Record<string, unknown> {
    return Strata.unconvert(this);
  }
}

/**
 * Type expression accepting instances of a declared container type. When coercion is on,
 * plain records are turned into new instances of that type.
 */
export const modelType = <Instance extends Strata>(
  model: AnyConstructor<Instance> & { fromMapping(entries: Record<string, unknown>): Instance }
): Typed<Instance> => t.instanceOf(model, { fromMapping: (entries) => model.fromMapping(entries) });
