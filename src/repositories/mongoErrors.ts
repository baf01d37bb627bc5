const DUPLICATE_KEY = 11000;

/**
 * Returns the first field of a MongoDB unique-index violation, or null for any other error.
 * Used to turn the store's atomic uniqueness check into a domain error.
 */
export function duplicateKeyField(error: unknown): string | null {
  if (typeof error !== 'object' || error === null) return null;
  if (!('code' in error) || error.code !== DUPLICATE_KEY) return null;

  if ('keyPattern' in error && typeof error.keyPattern === 'object' && error.keyPattern !== null) {
    const [field] = Object.keys(error.keyPattern);
    if (field) return field;
  }
  if ('keyValue' in error && typeof error.keyValue === 'object' && error.keyValue !== null) {
    const [field] = Object.keys(error.keyValue);
    if (field) return field;
  }
  return '_id';
}
