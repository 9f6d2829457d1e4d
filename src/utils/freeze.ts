/**
 * Recursively freeze an object graph in place.
 *
 * Already-frozen objects are still descended into, so a shallow-frozen
 * component with mutable arrays ends up fully frozen.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object") {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}
