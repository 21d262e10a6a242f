/** Load/modification state tracked per property of a generated entity. */
export const PropertyState = {
  FETCH: 'FETCH',
  LOADED: 'LOADED',
  MODIFIED: 'MODIFIED',
} as const;

export type PropertyState = (typeof PropertyState)[keyof typeof PropertyState];

/**
 * Reads and writes one property's state on an entity instance. `get` returns undefined for
 * instances that do not track state (e.g. a plain object implementing the entity interface).
 */
export type PropertyStateAccessor = {
  get(entity: unknown): PropertyState | undefined;
  set(entity: unknown, state: PropertyState): void;
};
