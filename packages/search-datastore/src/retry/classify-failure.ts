/**
 * @file Failure Classification
 *
 * Maps a raw failure to one of three outcomes consumed by the retry loop:
 *
 * | Failure                                   | Condition               | Outcome                    |
 * |-------------------------------------------|-------------------------|----------------------------|
 * | 404 "No search context found"             | index given             | retry                      |
 * | 409 version conflict                      |                         | conflict                   |
 * | transport timeout                         |                         | retry + reconnect          |
 * | connection failure, 401                   |                         | retry + reconnect          |
 * | legacy 503 / 429 / 403                    | index given             | retry                      |
 * | 403 authorization                         | index given             | retry                      |
 * | 429 too many requests                     |                         | retry                      |
 * | 503 unavailable                           | index given             | retry                      |
 * | anything else                             |                         | fatal                      |
 *
 * The 404 and 409 rules match both the API and the legacy error shape.
 */

import type { ConflictCounts } from '../types/index.js'
import {
  anyStatus,
  apiStatus,
  conflictCounts,
  errorText,
  isTransportError,
  legacyStatus,
} from './error-shapes.js'

// =============================================================================
// Types
// =============================================================================

export type RetryReason =
  | 'search-context-lost'
  | 'connection-timeout'
  | 'connection-failure'
  | 'index-not-ready'
  | 'too-busy'
  | 'write-blocked'

export type FailureClassification =
  | { kind: 'retry'; reason: RetryReason; reconnect: boolean }
  | { kind: 'conflict'; counts: ConflictCounts }
  | { kind: 'fatal'; cause: unknown }

const LOST_SEARCH_CONTEXT = 'No search context found'

const LEGACY_RETRY_REASONS: Partial<Record<number, RetryReason>> = {
  503: 'index-not-ready',
  429: 'too-busy',
  403: 'write-blocked',
}

// =============================================================================
// Classification
// =============================================================================

const retry = (reason: RetryReason, reconnect = false): FailureClassification => ({
  kind: 'retry',
  reason,
  reconnect,
})

/**
 * Classify a failure thrown by an engine operation.
 *
 * @param error - The raw error, untouched
 * @param index - Index the operation targets, if any
 */
export function classifyFailure(error: unknown, index?: string): FailureClassification {
  const fatal: FailureClassification = { kind: 'fatal', cause: error }
  const status = apiStatus(error)
  const eitherStatus = anyStatus(error)

  if (eitherStatus === 404) {
    return index && errorText(error).includes(LOST_SEARCH_CONTEXT)
      ? retry('search-context-lost')
      : fatal
  }

  if (eitherStatus === 409) {
    return { kind: 'conflict', counts: conflictCounts(error) }
  }

  if (isTransportError(error, 'TimeoutError')) {
    return retry('connection-timeout', true)
  }

  if (status === 401 || isTransportError(error, 'ConnectionError', 'NoLivingConnectionsError')) {
    return retry('connection-failure', true)
  }

  const legacy = legacyStatus(error)
  if (legacy !== undefined) {
    const reason = LEGACY_RETRY_REASONS[legacy]
    return index && reason ? retry(reason) : fatal
  }

  switch (status) {
    case 403:
      return index ? retry('write-blocked') : fatal
    case 429:
      return retry('too-busy')
    case 503:
      return index ? retry('index-not-ready') : fatal
    default:
      return fatal
  }
}
