const isObjectLike = (value: unknown): value is object =>
  (typeof value === "object" && value !== null) || typeof value === "function";

const isPlain = (value: object): boolean => {
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
};

/**
 * Freezes `root` and everything reachable from it that is a plain object,
 * an array or a function. Class instances below the root are left alone.
 */
export function deepFreeze<T>(root: T): T {
  const seen = new WeakSet<object>();
  const visit = (value: unknown, nested: boolean): void => {
    if (!isObjectLike(value) || seen.has(value)) return;
    if (
      nested &&
      typeof value === "object" &&
      !Array.isArray(value) &&
      !isPlain(value)
    ) {
      return;
    }
    seen.add(value);
    for (const key of Reflect.ownKeys(value)) {
      const descriptor = Object.getOwnPropertyDescriptor(value, key);
      visit(descriptor?.value, true);
      visit(descriptor?.get, true);
      visit(descriptor?.set, true);
    }
    Object.freeze(value);
  };
  visit(root, false);
  return root;
}
