/**
 * @file Collection Naming
 *
 * Collection names double as index names, so they are restricted to lower
 * case letters, digits and underscores.
 */

/**
 * Result of collection name validation.
 */
export interface CollectionNameValidationResult {
  valid: boolean
  errors: string[]
}

const COLLECTION_NAME_PATTERN = /^[a-z0-9_]*$/

/**
 * Validate a collection name.
 */
export function validateCollectionName(name: string): CollectionNameValidationResult {
  const errors: string[] = []

  if (!COLLECTION_NAME_PATTERN.test(name)) {
    errors.push('Collection name can only contain lower case letters, numbers and underscores')
  }

  return {
    valid: errors.length === 0,
    errors,
  }
}

/**
 * Name of the archive index paired with a collection.
 */
export function archiveIndexName(name: string): string {
  return `${name}-ma`
}
