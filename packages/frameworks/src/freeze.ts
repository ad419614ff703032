/**
 * Deep freeze utility for making resolved definitions immutable.
 */

/**
 * Recursively freezes an object and all nested objects/arrays.
 * Map values are frozen too (the Map itself stays a Map; expose it as
 * `ReadonlyMap`). Uses a WeakSet to handle circular references safely.
 * Returns the same reference (freezes in-place, no clone).
 */
export function deepFreeze<T>(obj: T): T {
  if (obj === null || obj === undefined || typeof obj !== "object") {
    return obj;
  }

  freezeRecursive(obj, new WeakSet<object>());
  return obj;
}

function freezeRecursive(obj: object, seen: WeakSet<object>): void {
  if (seen.has(obj)) {
    return;
  }

  seen.add(obj);
  Object.freeze(obj);

  const children = obj instanceof Map ? [...obj.values()] : Object.values(obj);
  for (const value of children) {
    if (value !== null && typeof value === "object") {
      freezeRecursive(value, seen);
    }
  }
}
