import type { ComputedDeclaration } from "./declarations";
import type { Strata } from "./Strata";

export type CacheState = "uncomputed" | "cached" | "invalid";

type CacheEntry = { state: "cached"; value: unknown } | { state: "invalid" };

/**
 * Per-instance cache of computed members.
 *
 * uncomputed -> cached   first read of a caching member
 * cached     -> invalid  a dependency was written
 * invalid    -> cached   next read
 *
 * Non-caching members never leave `uncomputed`. A producer that throws leaves the entry
 * exactly as it was before the read.
 */
export class ComputedCache {
  readonly #entries = new Map<string, CacheEntry>();

  read(declaration: ComputedDeclaration, instance: Strata): unknown {
    const entry = this.#entries.get(declaration.name);
    if (declaration.cache && entry?.state === "cached") {
      return entry.value;
    }
    const value = declaration.produce(instance);
    if (declaration.cache) {
      this.#entries.set(declaration.name, { state: "cached", value });
    }
    return value;
  }

  invalidate(names: Iterable<string>): void {
    for (const name of names) {
      if (this.#entries.get(name)?.state === "cached") {
        this.#entries.set(name, { state: "invalid" });
      }
    }
  }

  state(name: string): CacheState {
    return this.#entries.get(name)?.state ?? "uncomputed";
  }
}
