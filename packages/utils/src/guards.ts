/**
 * Type Guards
 */

/**
 * Narrow an unknown thrown value to a Node system error
 */
export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  return value instanceof Error && 'code' in value;
}
