/**
 * Deep freeze utility for loaded records and parsed configuration.
 */

/**
 * Recursively freezes an object and all nested objects/arrays.
 * Uses a WeakSet to handle circular references safely.
 * Returns the same reference (freezes in-place, no clone).
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    freezeRecursive(value, new WeakSet<object>());
  }
  return value;
}

function freezeRecursive(obj: object, seen: WeakSet<object>): void {
  if (seen.has(obj)) {
    return;
  }

  seen.add(obj);
  Object.freeze(obj);

  const children: unknown[] = Object.values(obj);
  for (const child of children) {
    if (typeof child === "object" && child !== null) {
      freezeRecursive(child, seen);
    }
  }
}
