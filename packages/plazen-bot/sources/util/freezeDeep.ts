/**
 * Freezes an object graph so a config snapshot cannot be mutated after load.
 * Expects: value is acyclic.
 */
export function freezeDeep<T>(value: T): T {
    if (!value || typeof value !== "object" || Object.isFrozen(value)) {
        return value;
    }

    Object.freeze(value);
    for (const entry of Object.values(value)) {
        freezeDeep(entry);
    }
    return value;
}
