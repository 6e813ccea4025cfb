/**
 * JSON.stringify for log payloads: cycles become "[Circular]", bigint and
 * functions get readable placeholders, and nesting beyond `maxDepth` is
 * collapsed.
 */
export function safeStringify(
  value: unknown,
  space?: number,
  options?: { maxDepth?: number },
): string {
  const seen = new WeakSet<object>();
  const holderDepth = new WeakMap<object, number>();
  const maxDepth = options?.maxDepth ?? Infinity;

  function replacer(this: unknown, _key: string, val: unknown): unknown {
    if (typeof val === "function") {
      return "function()";
    }
    if (typeof val === "bigint") {
      return val.toString();
    }
    if (typeof val !== "object" || val === null) {
      return val;
    }

    const holder = Object(this);
    const currentDepth = (holderDepth.get(holder) ?? 0) + 1;
    if (seen.has(val)) return "[Circular]";
    if (currentDepth > maxDepth) {
      return Array.isArray(val) ? "[Array]" : "[Object]";
    }
    seen.add(val);
    holderDepth.set(val, currentDepth);
    if (val instanceof Map) {
      return Object.fromEntries(val);
    }
    if (val instanceof Set) {
      return Array.from(val);
    }
    return val;
  }

  try {
    return JSON.stringify(value, replacer, space) ?? String(value);
  } catch {
    return "[Unserializable]";
  }
}
