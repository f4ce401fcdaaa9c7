/**
 * @file Engine Error Shapes
 *
 * Structural readers for the errors the engine client throws. Detection goes
 * by shape rather than `instanceof` so errors from any copy of the transport
 * package (or from a proxying layer) are recognised.
 *
 * - API errors: `name === 'ResponseError'` with `meta.statusCode` and
 *   `meta.body` (the official client's `ResponseError`).
 * - Transport errors: `ConnectionError`, `NoLivingConnectionsError`,
 *   `TimeoutError`, recognised by name.
 * - Legacy transport errors: any other error carrying a `status` code
 *   (numeric or numeric string) and an optional `error` string.
 */

import type { ConflictCounts } from '../types/index.js'

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/**
 * Status code of an API error, or undefined for anything else.
 */
export function apiStatus(error: unknown): number | undefined {
  if (!isRecord(error) || error.name !== 'ResponseError') {
    return undefined
  }
  const meta = error.meta
  if (isRecord(meta) && typeof meta.statusCode === 'number') {
    return meta.statusCode
  }
  return typeof error.statusCode === 'number' ? error.statusCode : undefined
}

/**
 * Response body of an API error.
 */
export function apiBody(error: unknown): Record<string, unknown> | undefined {
  if (!isRecord(error) || !isRecord(error.meta)) {
    return undefined
  }
  return isRecord(error.meta.body) ? error.meta.body : undefined
}

/**
 * Engine error type of an API error (`body.error.type`), falling back to the
 * error message, which the official client sets to the same value.
 */
export function apiErrorType(error: unknown): string | undefined {
  const body = apiBody(error)
  if (body && isRecord(body.error) && typeof body.error.type === 'string') {
    return body.error.type
  }
  return error instanceof Error ? error.message : undefined
}

/**
 * Status code of a legacy transport error. API errors are excluded.
 */
export function legacyStatus(error: unknown): number | undefined {
  if (!isRecord(error) || error.name === 'ResponseError') {
    return undefined
  }
  const status = error.status
  if (typeof status === 'number') {
    return status
  }
  if (typeof status === 'string' && /^\d+$/.test(status)) {
    return Number(status)
  }
  return undefined
}

/**
 * Status code of an API or legacy transport error.
 */
export function anyStatus(error: unknown): number | undefined {
  return apiStatus(error) ?? legacyStatus(error)
}

/**
 * Whether the error is one of the transport's own failures with the given name.
 */
export function isTransportError(
  error: unknown,
  ...names: Array<'ConnectionError' | 'NoLivingConnectionsError' | 'TimeoutError'>
): boolean {
  if (!isRecord(error)) {
    return false
  }
  const errorName = error.name
  return typeof errorName === 'string' && names.some((name) => name === errorName)
}

/**
 * Full text of an error: its message, the legacy `error` string and the
 * serialized response body, where present. Reasons such as a lost search
 * context live in the body.
 */
export function errorText(error: unknown): string {
  let message = error instanceof Error ? error.message : String(error)
  if (isRecord(error) && typeof error.error === 'string' && !message.includes(error.error)) {
    message = `${message} ${error.error}`
  }
  const body = apiBody(error)
  if (!body) {
    return message
  }
  try {
    return `${message} ${JSON.stringify(body)}`
  } catch {
    return message
  }
}

/**
 * Partial write counts carried by a conflict error: in the response body for
 * API errors, on the error itself for legacy ones.
 */
export function conflictCounts(error: unknown): ConflictCounts {
  const source = apiBody(error) ?? (isRecord(error) ? error : undefined)
  return {
    updated: typeof source?.updated === 'number' ? source.updated : 0,
    deleted: typeof source?.deleted === 'number' ? source.deleted : 0,
  }
}

/**
 * Whether the error is the engine's "task still running" answer to a
 * task poll: a 500 whose type is `timeout_exception`, in either the API or
 * the legacy shape.
 */
export function isTaskPollTimeout(error: unknown): boolean {
  if (apiStatus(error) === 500) {
    return apiErrorType(error) === 'timeout_exception'
  }
  if (legacyStatus(error) === 500 && isRecord(error)) {
    return error.error === 'timeout_exception'
  }
  return false
}
