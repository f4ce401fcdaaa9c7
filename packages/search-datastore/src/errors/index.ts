/**
 * @file Datastore Error Classes
 *
 * Errors raised by the datastore façade itself. Engine and transport errors
 * are never wrapped: they reach callers in their original shape so the
 * underlying cause stays inspectable. Only the cases below get a dedicated
 * class.
 *
 * @example
 * ```typescript
 * import { VersionConflictError } from 'search-datastore'
 *
 * try {
 *   await users.create('u1', doc)
 * } catch (error) {
 *   if (error instanceof VersionConflictError) {
 *     // another writer got there first
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base class for every error created by the datastore.
 */
export class DatastoreError extends Error {
  /** The original cause of this error, if any */
  override readonly cause?: unknown

  constructor(message: string, options?: { cause?: unknown }) {
    super(message)
    this.name = 'DatastoreError'
    this.cause = options?.cause

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

// =============================================================================
// Startup Errors
// =============================================================================

/**
 * Thrown once at startup when the engine is older than the minimum supported
 * version.
 */
export class UnsupportedVersionError extends DatastoreError {
  /** Version reported by the engine */
  readonly detected: string

  /** Minimum version the datastore works with */
  readonly minimum: string

  constructor(detected: string, minimum: string) {
    super(
      `Search engine version ${detected} is not supported. ` +
        `Upgrade to version ${minimum} at minimum.`
    )
    this.name = 'UnsupportedVersionError'
    this.detected = detected
    this.minimum = minimum
  }
}

/**
 * Thrown when the store configuration does not pass validation.
 */
export class ConfigurationError extends DatastoreError {
  /** One line per invalid setting */
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid datastore configuration:\n  - ${issues.join('\n  - ')}`)
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}

// =============================================================================
// Collection Errors
// =============================================================================

/**
 * Thrown by `register()` for names outside `[a-z0-9_]`.
 */
export class InvalidNameError extends DatastoreError {
  readonly collectionName: string

  constructor(collectionName: string) {
    super(
      `Invalid characters in collection name '${collectionName}'. ` +
        'You can only use lower case letters, numbers and underscores.'
    )
    this.name = 'InvalidNameError'
    this.collectionName = collectionName
  }
}

/**
 * Thrown by `getCollection()` for a name that was never registered.
 */
export class UnknownCollectionError extends DatastoreError {
  readonly collectionName: string

  constructor(collectionName: string) {
    super(`Collection '${collectionName}' is not registered`)
    this.name = 'UnknownCollectionError'
    this.collectionName = collectionName
  }
}

// =============================================================================
// Runtime Errors
// =============================================================================

/**
 * Raised instead of retrying when an optimistic concurrency conflict occurs
 * on an operation that asked for conflicts to be surfaced.
 */
export class VersionConflictError extends DatastoreError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'VersionConflictError'
  }
}

/**
 * Raised by any operation attempted after `close()`. The connection reference
 * is null at that point and the handle never reconnects on its own.
 */
export class ClosedConnectionError extends DatastoreError {
  constructor(message = 'Cannot use a closed datastore: the connection is null') {
    super(message)
    this.name = 'ClosedConnectionError'
  }
}
