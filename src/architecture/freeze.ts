/**
 * Deep freeze an object and all nested objects.
 *
 * Map and Set contents are not frozen by Object.freeze; the model exposes
 * them only through ReadonlyMap / readonly array types.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  const propNames = Reflect.ownKeys(obj);

  for (const name of propNames) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return Object.freeze(obj);
}
