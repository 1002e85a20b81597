/**
 * Outcome of reading persisted state.
 *
 * Stores never throw on a missing or unreadable backing file: they return a
 * value the caller can still use plus a variant saying how it was obtained.
 * `degraded` carries the diagnostic text that explains what was discarded.
 */
export type Loaded<T> =
  | { readonly status: 'ok'; readonly value: T }
  | { readonly status: 'missing'; readonly value: T }
  | { readonly status: 'degraded'; readonly value: T; readonly diagnostic: string };

export function loadedOk<T>(value: T): Loaded<T> {
  return { status: 'ok', value };
}

export function loadedMissing<T>(value: T): Loaded<T> {
  return { status: 'missing', value };
}

export function loadedDegraded<T>(value: T, diagnostic: string): Loaded<T> {
  return { status: 'degraded', value, diagnostic };
}
