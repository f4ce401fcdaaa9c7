/**
 * @file Credential Switcher
 *
 * Rotates the identity a datastore connects with. Only a fixed set of
 * alternate users is supported; each one is provisioned on the engine with a
 * freshly generated secret before the connection is rebuilt with the new
 * credentials.
 *
 * @example
 * ```typescript
 * // Task cleanup needs write access to the restricted task index
 * await store.switchUser('plumber')
 * await store.taskCleanup(24 * 60 * 60)
 * ```
 */

import { randomBytes } from 'node:crypto'
import { silentLogger, type StoreLogger } from '../logging/logger.js'
import type { RetryFunction } from '../types/index.js'
import { TASKS_INDEX } from '../tasks/task-cleanup.js'
import { replaceCredentials } from './hosts.js'

// =============================================================================
// Constants
// =============================================================================

/** Identities a datastore may switch to */
export const ALTERNATE_USERS = ['plumber'] as const

export type AlternateUser = (typeof ALTERNATE_USERS)[number]

/** Role granting full access to the task index */
export const TASK_MANAGER_ROLE = 'manage_tasks'

// =============================================================================
// Types
// =============================================================================

/**
 * The part of the connection lifecycle the switcher needs.
 */
export interface CredentialTarget {
  getHosts(safe?: boolean): string[]
  reset(hosts?: string[]): void
}

export interface CredentialSwitcherOptions {
  connections: CredentialTarget
  withRetries: RetryFunction
  logger?: StoreLogger
  /** Secret generator. Defaults to {@link generateRandomSecret}. */
  generateSecret?: () => string
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Random URL-safe secret.
 */
export function generateRandomSecret(length = 32): string {
  return randomBytes(length).toString('base64url').slice(0, length)
}

function findAlternateUser(username: string): AlternateUser | undefined {
  return ALTERNATE_USERS.find((user) => user === username)
}

// =============================================================================
// Implementation
// =============================================================================

export class CredentialSwitcher {
  private readonly _connections: CredentialTarget
  private readonly _withRetries: RetryFunction
  private readonly _logger: StoreLogger
  private readonly _generateSecret: () => string

  constructor(options: CredentialSwitcherOptions) {
    this._connections = options.connections
    this._withRetries = options.withRetries
    this._logger = options.logger ?? silentLogger
    this._generateSecret = options.generateSecret ?? (() => generateRandomSecret())
  }

  /**
   * Switch the connection to an alternate user.
   *
   * @returns false, without touching hosts or the connection, for an
   *   unsupported user
   */
  async switchUser(username: string): Promise<boolean> {
    const user = findAlternateUser(username)
    if (!user) {
      this._logger.warn(`Unknown alternative user '${username}' to switch to`)
      return false
    }

    const password = await this.provision(user)

    const hosts = this._connections
      .getHosts()
      .map((host) => replaceCredentials(host, user, password))
    this._connections.reset(hosts)
    this._logger.info(`Switched search engine user to '${user}'`)
    return true
  }

  /**
   * Create or update the user on the engine and return its new secret.
   */
  private async provision(user: AlternateUser): Promise<string> {
    switch (user) {
      case 'plumber': {
        await this._withRetries(
          (connection) =>
            connection.putRole({
              name: TASK_MANAGER_ROLE,
              indices: [
                { names: [TASKS_INDEX], privileges: ['all'], allowRestrictedIndices: true },
              ],
            }),
          { label: 'security.put_role' }
        )

        const password = this._generateSecret()
        await this._withRetries(
          (connection) =>
            connection.putUser({
              username: user,
              password,
              roles: [TASK_MANAGER_ROLE, 'superuser'],
            }),
          { label: 'security.put_user' }
        )
        return password
      }
    }
  }
}
