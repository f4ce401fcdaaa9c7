/**
 * @file Client Lifecycle Manager
 *
 * Owns the single physical connection of a datastore and is the only writer
 * of the connection reference and the closed flag. The connection is
 * non-null exactly while the manager is open.
 *
 * Connections are built without any retry of their own; retrying is the
 * retry executor's job.
 */

import { existsSync } from 'node:fs'
import type { StoreConfig } from '../config/store-config.js'
import { ClosedConnectionError } from '../errors/index.js'
import { silentLogger, type StoreLogger } from '../logging/logger.js'
import type { ConnectionFactory, ConnectionSettings, EngineConnection } from '../types/index.js'
import { safeHost } from '../auth/hosts.js'
import type { ConnectionProvider } from '../retry/retry-executor.js'

// =============================================================================
// Types
// =============================================================================

export interface ClientLifecycleOptions {
  /** Ordered host URIs, credentials may be embedded */
  hosts: string[]
  config: StoreConfig
  factory: ConnectionFactory
  logger?: StoreLogger
}

// =============================================================================
// Implementation
// =============================================================================

export class ClientLifecycleManager implements ConnectionProvider {
  private _hosts: string[]
  private _connection: EngineConnection | null
  private _closed = false
  private readonly _factory: ConnectionFactory
  private readonly _logger: StoreLogger
  private readonly _settings: Omit<ConnectionSettings, 'hosts'>

  constructor(options: ClientLifecycleOptions) {
    this._hosts = [...options.hosts]
    this._factory = options.factory
    this._logger = options.logger ?? silentLogger
    this._settings = {
      caPath: existsSync(options.config.rootCaPath) ? options.config.rootCaPath : null,
      verifyCerts: options.config.verifyCerts,
      timeout: options.config.transportTimeout,
    }
    this._connection = this.connect(this._hosts)
  }

  get isClosed(): boolean {
    return this._closed
  }

  /**
   * CA certificate in use, or null when none was found on disk.
   */
  get caPath(): string | null {
    return this._settings.caPath
  }

  /**
   * Build a new connection for the given hosts with this manager's settings.
   */
  connect(hosts: string[]): EngineConnection {
    return this._factory({ ...this._settings, hosts: [...hosts] })
  }

  /**
   * The live connection.
   *
   * @throws ClosedConnectionError after `close()`
   */
  getConnection(): EngineConnection {
    if (this._closed || this._connection === null) {
      throw new ClosedConnectionError()
    }
    return this._connection
  }

  /**
   * Replace the connection, optionally with a new host list. The previous
   * connection is closed in the background; callers still holding it may
   * see one more failure and will retry on the new one.
   *
   * @throws ClosedConnectionError after `close()`; a closed store never reconnects
   */
  reset(hosts?: string[]): void {
    if (this._closed) {
      throw new ClosedConnectionError('Cannot reconnect a closed datastore: the connection is null')
    }
    if (hosts) {
      this._hosts = [...hosts]
    }

    const previous = this._connection
    this._connection = this.connect(this._hosts)
    if (previous) {
      this.discard(previous)
    }
    this._logger.info('Reconnected to the search engine')
  }

  /**
   * Close the connection. Every later use of the store fails with
   * `ClosedConnectionError`.
   */
  async close(): Promise<void> {
    if (this._closed) {
      return
    }
    const previous = this._connection
    this._closed = true
    this._connection = null
    if (previous) {
      await previous.close()
    }
  }

  /**
   * Configured hosts. With `safe`, credentials are stripped and only host
   * names are returned.
   */
  getHosts(safe = false): string[] {
    return safe ? this._hosts.map(safeHost) : [...this._hosts]
  }

  private discard(connection: EngineConnection): void {
    void connection.close().catch((error: unknown) => {
      this._logger.debug('Failed to close a replaced connection', {
        error: error instanceof Error ? error.message : String(error),
      })
    })
  }
}
