/**
 * @file Retry Executor
 *
 * Runs engine operations until they succeed or fail with an error that is
 * not worth retrying. There is no attempt limit: callers are long-lived
 * workers that would rather block on a degraded cluster than crash. A caller
 * that needs a bounded wait wraps the call in its own timeout.
 *
 * Per attempt the loop moves through
 * `attempting -> (succeeded | classifying -> backing-off -> attempting)`.
 * Reconnection only happens for the failure classes that ask for it, after
 * the backoff sleep.
 *
 * Backoff is linear and capped: the n-th retry waits `min(n, cap)` seconds,
 * starting at 0.
 */

import type {
  ConflictCounts,
  EngineConnection,
  RetryFunction,
  RetryOptions,
  RetryableOperation,
} from '../types/index.js'
import { VersionConflictError } from '../errors/index.js'
import { silentLogger, type StoreLogger } from '../logging/logger.js'
import { classifyFailure, type RetryReason } from './classify-failure.js'

// =============================================================================
// Types
// =============================================================================

/**
 * The part of the connection lifecycle the executor drives.
 */
export interface ConnectionProvider {
  /** Current connection. Throws once the store is closed. */
  getConnection(): EngineConnection
  /** Replace the connection with a fresh one built from the same settings. */
  reset(): void
  getHosts(safe?: boolean): string[]
}

export type RetryPhase = 'attempting' | 'succeeded' | 'classifying' | 'backing-off'

/**
 * Configuration for the retry executor.
 */
export interface RetryExecutorConfig {
  connections: ConnectionProvider

  /**
   * Cap on the linear backoff, in seconds.
   * @default 10
   */
  maxBackoffSeconds?: number

  logger?: StoreLogger

  /** Sleep used between attempts. Defaults to a `setTimeout` promise. */
  sleep?: (ms: number) => Promise<void>

  /** Random source for the conflict jitter. Defaults to `Math.random`. */
  random?: () => number
}

/**
 * Call-scoped retry accounting. Never shared between invocations.
 */
interface RetryState {
  retries: number
  updated: number
  deleted: number
}

/** Upper bound of the jitter applied before surfacing a conflict, in ms */
const CONFLICT_JITTER_MS = 100

// =============================================================================
// Helpers
// =============================================================================

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Add conflict counts absorbed during retries to a successful result.
 * Results that are not objects, or calls that absorbed nothing, come back
 * unchanged.
 */
export function mergeConflictCounts<T>(result: T, counts: ConflictCounts): T {
  if (typeof result !== 'object' || result === null) {
    return result
  }
  if (counts.updated) {
    const current = 'updated' in result && typeof result.updated === 'number' ? result.updated : 0
    Object.assign(result, { updated: current + counts.updated })
  }
  if (counts.deleted) {
    const current = 'deleted' in result && typeof result.deleted === 'number' ? result.deleted : 0
    Object.assign(result, { deleted: current + counts.deleted })
  }
  return result
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * RetryExecutor wraps engine operations with classification-driven retries.
 */
export class RetryExecutor {
  private readonly _connections: ConnectionProvider
  private readonly _maxBackoffSeconds: number
  private readonly _logger: StoreLogger
  private readonly _sleep: (ms: number) => Promise<void>
  private readonly _random: () => number

  constructor(config: RetryExecutorConfig) {
    this._connections = config.connections
    this._maxBackoffSeconds = config.maxBackoffSeconds ?? 10
    this._logger = config.logger ?? silentLogger
    this._sleep = config.sleep ?? defaultSleep
    this._random = config.random ?? Math.random
  }

  /**
   * `execute` as a free-standing function, for components that take a
   * {@link RetryFunction}.
   */
  readonly run: RetryFunction = <T>(operation: RetryableOperation<T>, options?: RetryOptions) =>
    this.execute(operation, options)

  /**
   * Delay before the given retry, in ms.
   */
  calculateDelay(retries: number): number {
    return Math.min(retries, this._maxBackoffSeconds) * 1000
  }

  async execute<T>(operation: RetryableOperation<T>, options: RetryOptions = {}): Promise<T> {
    const label = options.label ?? 'operation'
    const state: RetryState = { retries: 0, updated: 0, deleted: 0 }

    for (;;) {
      this.enter('attempting', label, state)
      try {
        const result = await operation(this._connections.getConnection())

        this.enter('succeeded', label, state)
        if (state.retries) {
          this._logger.info(`Retrying datastore operation: ${label}`)
        }
        return mergeConflictCounts(result, state)
      } catch (error) {
        this.enter('classifying', label, state)
        const outcome = classifyFailure(error, options.index)

        if (outcome.kind === 'fatal') {
          throw error
        }

        if (outcome.kind === 'conflict') {
          if (options.raiseConflicts) {
            // Spread concurrent writers apart before they try again
            await this._sleep(this._random() * CONFLICT_JITTER_MS)
            throw new VersionConflictError(
              error instanceof Error ? error.message : String(error),
              { cause: error }
            )
          }
          state.updated += outcome.counts.updated
          state.deleted += outcome.counts.deleted
        } else {
          this._logger.warn(this.describe(outcome.reason, error, label, options.index))
        }

        this.enter('backing-off', label, state)
        await this._sleep(this.calculateDelay(state.retries))

        if (outcome.kind === 'retry' && outcome.reconnect) {
          this._connections.reset()
        }
        state.retries += 1
      }
    }
  }

  private enter(phase: RetryPhase, label: string, state: RetryState): void {
    this._logger.debug(`${label}: ${phase}`, { retries: state.retries })
  }

  private describe(reason: RetryReason, error: unknown, label: string, index?: string): string {
    const indexName = index?.toUpperCase()
    const hosts = this._connections.getHosts(true).join(' | ')

    switch (reason) {
      case 'search-context-lost':
        return `Index ${indexName} was removed while a query was running, retrying...`
      case 'connection-timeout':
        return `Search engine connection timeout, server(s): ${hosts}, retrying ${label}...`
      case 'connection-failure':
        return (
          `No connection to search engine server(s): ${hosts}, ` +
          `because [${error instanceof Error ? error.message : String(error)}] retrying ${label}...`
        )
      case 'index-not-ready':
        return `Looks like index ${indexName} is not ready yet, retrying...`
      case 'too-busy':
        return indexName
          ? `Search engine is too busy to perform the requested task on index ${indexName}, retrying...`
          : `Search engine is too busy to perform the requested task (${String(error)}), retrying...`
      case 'write-blocked':
        return `Search engine cluster is preventing writing operations on index ${indexName}, retrying...`
    }
  }
}
