/**
 * @file Engine Version Guard
 *
 * Checked once, right after the first connection is made.
 */

import { UnsupportedVersionError } from '../errors/index.js'
import type { RetryFunction } from '../types/index.js'

/** Oldest engine release the datastore supports */
export const MIN_ENGINE_VERSION = '7.10'

/**
 * Numeric components of a version string. Pre-release and build suffixes are
 * dropped, missing or non-numeric components count as 0.
 */
function parseVersion(version: string): number[] {
  return version
    .split(/[-+]/)[0]
    .split('.')
    .map((part) => {
      const value = Number.parseInt(part, 10)
      return Number.isNaN(value) ? 0 : value
    })
}

/**
 * Compare two versions. Negative when `a < b`, 0 when equal, positive when
 * `a > b`.
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a)
  const right = parseVersion(b)
  const length = Math.max(left.length, right.length)
  for (let i = 0; i < length; i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0)
    if (diff !== 0) {
      return diff
    }
  }
  return 0
}

export function isSupportedVersion(detected: string, minimum: string): boolean {
  return compareVersions(detected, minimum) >= 0
}

/**
 * Query the engine version and reject anything older than `minimum`.
 *
 * @returns The detected version
 * @throws UnsupportedVersionError
 */
export async function assertSupportedVersion(
  withRetries: RetryFunction,
  minimum: string = MIN_ENGINE_VERSION
): Promise<string> {
  const info = await withRetries((connection) => connection.info(), { label: 'info' })
  const detected = info.version.number
  if (!isSupportedVersion(detected, minimum)) {
    throw new UnsupportedVersionError(detected, minimum)
  }
  return detected
}
