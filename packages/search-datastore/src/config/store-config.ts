/**
 * @file Store Configuration
 *
 * Transport settings are an explicit struct passed at construction. The
 * env helper below only maps a caller-supplied record onto that struct; it
 * never reads `process.env` itself.
 */

import { z } from 'zod'
import { ConfigurationError } from '../errors/index.js'

// =============================================================================
// Schema
// =============================================================================

/**
 * Zod schema for {@link StoreConfig}.
 */
export const storeConfigSchema = z.object({
  /** Transport request timeout, in seconds */
  transportTimeout: z.number().int().positive().default(90),
  /** Root CA certificate used to verify the engine. Ignored when missing on disk. */
  rootCaPath: z.string().min(1).default('/etc/ssl/datastore/root-ca.crt'),
  /** Verify the engine's TLS certificate */
  verifyCerts: z.boolean().default(true),
  /** Cap on the linear retry backoff, in seconds */
  maxRetryBackoff: z.number().nonnegative().default(10),
})

export type StoreConfig = z.infer<typeof storeConfigSchema>

export type StoreConfigInput = z.input<typeof storeConfigSchema>

// =============================================================================
// Parsing
// =============================================================================

/**
 * Validate a configuration and fill in defaults.
 *
 * @throws ConfigurationError listing every invalid setting
 */
export function parseStoreConfig(input: StoreConfigInput = {}): StoreConfig {
  const result = storeConfigSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    )
  }
  return result.data
}

/**
 * Build a configuration from environment-style variables.
 *
 * Recognised keys: `DATASTORE_TRANSPORT_TIMEOUT`, `DATASTORE_ROOT_CA_PATH`,
 * `DATASTORE_VERIFY_CERTS` (`'true'`, any case, enables verification).
 *
 * @example
 * ```typescript
 * const config = loadStoreConfig(process.env)
 * ```
 */
export function loadStoreConfig(env: Record<string, string | undefined>): StoreConfig {
  const input: StoreConfigInput = {}

  const timeout = env.DATASTORE_TRANSPORT_TIMEOUT
  if (timeout !== undefined) {
    input.transportTimeout = Number(timeout)
  }

  const caPath = env.DATASTORE_ROOT_CA_PATH
  if (caPath !== undefined) {
    input.rootCaPath = caPath
  }

  const verify = env.DATASTORE_VERIFY_CERTS
  if (verify !== undefined) {
    input.verifyCerts = verify.toLowerCase() === 'true'
  }

  return parseStoreConfig(input)
}
