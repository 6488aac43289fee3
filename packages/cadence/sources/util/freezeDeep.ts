/**
 * Freezes a JSON-like value and everything reachable from it, children first.
 * Expects: an acyclic value. Returns the same reference.
 */
export function freezeDeep<T>(value: T): T {
    if (value === null || typeof value !== "object" || Object.isFrozen(value)) {
        return value;
    }
    for (const key of Reflect.ownKeys(value)) {
        freezeDeep(Reflect.get(value, key));
    }
    Object.freeze(value);
    return value;
}
