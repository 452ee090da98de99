export type AttributeAccess = {
  /** `undefined` for keys that are neither stored nor computed */
  read(key: string): unknown;
  write(key: string, value: unknown): void;
  remove(key: string): void;
  has(key: string): boolean;
  isStored(key: string): boolean;
  keys(): Iterable<string>;
};

/**
 * Attribute view over a container: `instance.name` and `instance.name = value` route to the
 * same read and write paths as `get("name")` and `set("name", value)`.
 *
 * Names that exist on the target or its prototype chain (container methods, symbols, the
 * internal state slot) resolve to the target itself, everything else is a key. Stored keys
 * are reported as own enumerable properties, so `Object.keys`, spreading and `in` behave as
 * they would on a plain record.
 */
export const buildAttributeProxy = <T extends object>(target: T, access: AttributeAccess): T =>
  new Proxy(target, {
    get(proxyTarget, key, receiver) {
      if (typeof key === "symbol" || key in proxyTarget) {
        return Reflect.get(proxyTarget, key, receiver);
      }
      return access.read(key);
    },
    set(proxyTarget, key, value) {
      if (typeof key === "symbol") {
        return Reflect.set(proxyTarget, key, value);
      }
      access.write(key, value);
      return true;
    },
    defineProperty(proxyTarget, key, descriptor) {
      if (typeof key === "symbol" || !("value" in descriptor)) {
        return Reflect.defineProperty(proxyTarget, key, descriptor);
      }
      access.write(key, descriptor.value);
      return true;
    },
    deleteProperty(proxyTarget, key) {
      if (typeof key === "symbol") {
        return Reflect.deleteProperty(proxyTarget, key);
      }
      // computed members reach `remove` too, which rejects them
      if (access.has(key)) {
        access.remove(key);
      }
      return true;
    },
    has(proxyTarget, key) {
      if (typeof key === "symbol") {
        return Reflect.has(proxyTarget, key);
      }
      return access.has(key) || Reflect.has(proxyTarget, key);
    },
    ownKeys(proxyTarget) {
      return [...access.keys(), ...Reflect.ownKeys(proxyTarget)];
    },
    getOwnPropertyDescriptor(proxyTarget, key) {
      if (typeof key === "string" && access.isStored(key)) {
        return { value: access.read(key), writable: true, enumerable: true, configurable: true };
      }
      return Reflect.getOwnPropertyDescriptor(proxyTarget, key);
    },
    setPrototypeOf() {
      return false;
    },
  });
