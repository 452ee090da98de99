// Map whose reads fill a missing entry from a factory.
// No imports: shared by modules that import each other.

export class DefaultedMap<K, V> extends Map<K, V> {
  readonly #fill: (key: K) => V;

  constructor(fill: (key: K) => V) {
    super();
    this.#fill = fill;
  }

  /** stored value, or a freshly filled one when the key is absent (or holds `undefined`) */
  get(key: K): V {
    let value = super.get(key);
    if (value === undefined) {
      value = this.#fill(key);
      super.set(key, value);
    }
    return value;
  }
}
