/**
 * Recursively freeze a plain object tree so generated configuration cannot
 * be mutated after construction. Already frozen branches are skipped.
 */
export function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
