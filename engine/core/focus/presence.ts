/**
 * Row Focus Engine - Presence Projectors
 *
 * A presence projector maps the focused key to whatever the application
 * treats as "the focused thing", e.g. re-checking the key still exists.
 */

export type PresenceProjector<K, P> = (focusedKey: K | null) => P;

export function identityPresence<K>(focusedKey: K | null): K | null {
  return focusedKey;
}

/**
 * Presence that reports the key only while `has(key)` holds.
 * A focused row removed from the data reads as unfocused.
 */
export function createKeyPresence<K>(
  has: (key: K) => boolean
): PresenceProjector<K, K | null> {
  return (focusedKey) => (focusedKey !== null && has(focusedKey) ? focusedKey : null);
}
