/**
 * Deep freezing for built documents
 */

function rejectMutation(): never {
  throw new TypeError('Document attributes are read-only');
}

/**
 * Freeze `value` and everything reachable from it. Maps also lose
 * `set`, `delete` and `clear`, which `Object.freeze` leaves working.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return value;

  if (value instanceof Map) {
    const map: Map<unknown, unknown> = value;
    for (const method of ['set', 'delete', 'clear']) {
      Object.defineProperty(map, method, { value: rejectMutation });
    }
    for (const [key, entry] of map) {
      deepFreeze(key);
      deepFreeze(entry);
    }
  } else {
    for (const entry of Object.values(value)) deepFreeze(entry);
  }
  Object.freeze(value);
  return value;
}
