/**
 * Shared-ownership handle. Every handle read for the same `@id` is the same
 * `SharedRef` instance, so aliasing survives a round trip.
 */
export class SharedRef<T> {
  constructor(public readonly value: T) {}
}

export const isSharedOf = <T>(
  handle: SharedRef<unknown>,
  accepts: (value: unknown) => value is T,
): handle is SharedRef<T> => accepts(handle.value);
