/**
 * Raised when an attribute mapping is read through a key it does not hold.
 *
 * Thrown by:
 * - attribute syntax on a `QDict` (`dict.missing`),
 * - the explicit accessor `QDict#attr(key)`.
 *
 * Callers that expect absence should guard with `key in dict`,
 * `dict.has(key)` or `dict.get(key, fallback)` instead of catching.
 */
export class MissingAttributeError extends Error {
  readonly attribute: string;

  constructor(attribute: string) {
    super(`Attribute "${attribute}" is not set.`);
    this.name = 'MissingAttributeError';
    this.attribute = attribute;
  }
}

/**
 * Type guard for {@link MissingAttributeError}, including errors raised by a
 * different copy of this package.
 */
export function isMissingAttributeError(
  error: unknown
): error is MissingAttributeError {
  return (
    error instanceof MissingAttributeError ||
    (error instanceof Error &&
      error.name === 'MissingAttributeError' &&
      'attribute' in error &&
      typeof error.attribute === 'string')
  );
}
