/**
 * Map keys share the object syntax with `@class` and `@id`, so a key that
 * starts with "@" is written with one more "@" in front.
 */

const MARKER_PREFIX = "@";

export const isMarkerKey = (key: string): boolean =>
  key.startsWith(MARKER_PREFIX);

export const escapeMarkerKey = (key: string): string =>
  isMarkerKey(key) ? `${MARKER_PREFIX}${key}` : key;

/** Undefined when the key is an unescaped marker. */
export const unescapeMarkerKey = (key: string): string | undefined => {
  if (!isMarkerKey(key)) {
    return key;
  }
  if (key.startsWith(MARKER_PREFIX + MARKER_PREFIX)) {
    return key.slice(MARKER_PREFIX.length);
  }
  return undefined;
};
