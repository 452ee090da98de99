import type { ComputedDeclaration } from "./declarations";
import { CycleError } from "./errors";
import { DefaultedMap } from "./utils/defaulted-collections";

/** dependency list of a computed member that is invalidated by any write */
export const ALL_KEYS = "*";

/**
 * Dependency graph of one declaring type.
 *
 * Edges go from a computed member to the names it declares as dependencies. Invalidation
 * walks them backwards: a write to `key` reaches every computed member that depends on `key`
 * directly, through another computed member, or through `ALL_KEYS`.
 *
 * The graph is built once when the type is declared and never changes afterwards, so
 * affected sets are memoized and shared by every instance.
 */
export class DependencyGraph {
  readonly #dependents = new DefaultedMap<string, Set<string>>(() => new Set());
  readonly #wildcards: string[] = [];
  readonly #affected = new DefaultedMap<string, readonly string[]>((key) => this.#walk(this.#dependents.get(key)));
  /** affected set of every key nothing depends on directly */
  readonly #unrelated: readonly string[];

  constructor(computed: ReadonlyMap<string, ComputedDeclaration>, modelName: string) {
    for (const declaration of computed.values()) {
      if (declaration.deps === ALL_KEYS) {
        this.#wildcards.push(declaration.name);
        continue;
      }
      for (const dependency of declaration.deps) {
        this.#dependents.get(dependency).add(declaration.name);
      }
    }
    assertAcyclic(computed, modelName);
    this.#unrelated = Object.freeze(this.#walk([]));
  }

  /**
   * Computed members whose cached values a write to `key` makes stale, each listed once.
   * Only keys with dependents are memoized, all other keys share one result.
   */
  affectedBy(key: string): readonly string[] {
    return this.#dependents.has(key) ? this.#affected.get(key) : this.#unrelated;
  }

  dependentsOf(key: string): readonly string[] {
    return this.#dependents.has(key) ? [...this.#dependents.get(key)] : [];
  }

  #walk(direct: Iterable<string>): string[] {
    const visited = new Set<string>();
    const queue = [...direct, ...this.#wildcards];
    while (queue.length > 0) {
      const name = queue.shift();
      if (name === undefined || visited.has(name)) {
        continue;
      }
      visited.add(name);
      if (this.#dependents.has(name)) {
        queue.push(...this.#dependents.get(name));
      }
    }
    return [...visited];
  }
}

/**
 * Depth-first search over computed-to-computed edges. Plain fields are leaves and wildcard
 * members have no edges, so neither can close a cycle.
 */
function assertAcyclic(computed: ReadonlyMap<string, ComputedDeclaration>, modelName: string) {
  const finished = new Set<string>();
  const stack: string[] = [];

  const visit = (name: string) => {
    const open = stack.indexOf(name);
    if (open !== -1) {
      throw new CycleError([...stack.slice(open), name], modelName);
    }
    if (finished.has(name)) {
      return;
    }
    const declaration = computed.get(name);
    if (!declaration || declaration.deps === ALL_KEYS) {
      finished.add(name);
      return;
    }
    stack.push(name);
    for (const dependency of declaration.deps) {
      visit(dependency);
    }
    stack.pop();
    finished.add(name);
  };

  for (const name of computed.keys()) {
    visit(name);
  }
}
