/**
 * @file Core type definitions for search-datastore
 *
 * Contains the engine connection contract every component talks to, the
 * collection proxy contract, and the option bags passed between them.
 *
 * @packageDocumentation
 */

import type { ZodSchema } from 'zod'
import type { StoreLogger } from '../logging/logger.js'

// =============================================================================
// Engine Connection
// =============================================================================

/**
 * Subset of the engine's cluster info used at startup.
 */
export interface EngineInfo {
  version: {
    number: string
  }
}

/**
 * Handle to an asynchronous server-side task.
 */
export interface TaskReference {
  /** Engine-issued task id, `<node>:<number>` */
  task: string
}

/**
 * Result of polling a task.
 *
 * When the task has finished, `response` carries the operation's own result
 * (for example a delete-by-query summary). Some task types only expose
 * `task.status`.
 */
export interface TaskStatusResponse {
  completed: boolean
  task: {
    status?: Record<string, unknown>
  }
  response?: Record<string, unknown>
}

export interface DeleteByQueryParams {
  index: string
  /** Query-string syntax */
  q: string
  waitForCompletion: false
  conflicts: 'abort' | 'proceed'
  maxDocs?: number
}

export interface GetTaskParams {
  taskId: string
  waitForCompletion: boolean
  /** Server-side wait, engine duration syntax (`'5s'`) */
  timeout: string
}

export interface RoleIndexPrivileges {
  names: string[]
  privileges: string[]
  allowRestrictedIndices?: boolean
}

export interface PutRoleParams {
  name: string
  indices: RoleIndexPrivileges[]
}

export interface PutUserParams {
  username: string
  password: string
  roles: string[]
}

/**
 * Outcome of a single-document write.
 */
export interface WriteResult {
  id: string
  version?: number
  result: 'created' | 'updated' | 'deleted' | 'not_found' | 'noop'
}

export interface IndexDocumentParams {
  index: string
  id: string
  document: Record<string, unknown>
  opType: 'create' | 'index'
}

export interface UpdateDocumentParams {
  index: string
  id: string
  doc: Record<string, unknown>
}

export interface DocumentLocator {
  index: string
  id: string
}

export interface SearchParams {
  /** One index or a comma separated list */
  index: string
  q: string
  from: number
  size: number
}

export interface SearchHit {
  id: string
  index: string
  source: Record<string, unknown>
}

export interface SearchResult {
  total: number
  hits: SearchHit[]
}

/**
 * Everything the datastore needs from the engine.
 *
 * The production implementation wraps the official client
 * (`ElasticsearchConnection`). Tests provide an in-process fake.
 * Implementations must let engine and transport errors through untouched:
 * the retry classifier depends on their shape.
 */
export interface EngineConnection {
  info(): Promise<EngineInfo>
  ping(): Promise<boolean>
  close(): Promise<void>

  deleteByQuery(params: DeleteByQueryParams): Promise<TaskReference>
  getTask(params: GetTaskParams): Promise<TaskStatusResponse>

  putRole(params: PutRoleParams): Promise<{ created: boolean }>
  putUser(params: PutUserParams): Promise<{ created: boolean }>

  indexExists(index: string): Promise<boolean>
  createIndex(index: string): Promise<void>
  indexDocument(params: IndexDocumentParams): Promise<WriteResult>
  getDocument(params: DocumentLocator): Promise<Record<string, unknown> | null>
  updateDocument(params: UpdateDocumentParams): Promise<WriteResult>
  deleteDocument(params: DocumentLocator): Promise<WriteResult>
  search(params: SearchParams): Promise<SearchResult>
}

/**
 * Settings a connection is (re)built from.
 */
export interface ConnectionSettings {
  hosts: string[]
  /** CA certificate path, or null when no CA file is available */
  caPath: string | null
  verifyCerts: boolean
  /** Request timeout, in seconds */
  timeout: number
}

/**
 * Builds a connection. Must not retry on its own.
 */
export type ConnectionFactory = (settings: ConnectionSettings) => EngineConnection

// =============================================================================
// Retry
// =============================================================================

/**
 * Partial-write accounting reported by a conflicting bulk operation.
 */
export interface ConflictCounts {
  updated: number
  deleted: number
}

/**
 * Options for a single `withRetries` call.
 */
export interface RetryOptions {
  /**
   * Surface version conflicts as `VersionConflictError` instead of absorbing
   * them.
   * @default false
   */
  raiseConflicts?: boolean

  /**
   * Index the operation targets. Several failure classes only retry when the
   * failure is tied to a named index.
   */
  index?: string

  /**
   * Operation name used in log lines.
   * @default 'operation'
   */
  label?: string
}

/**
 * An operation run by the retry executor. It receives the connection that is
 * current at the time of each attempt.
 */
export type RetryableOperation<T> = (connection: EngineConnection) => Promise<T>

/**
 * Signature of `withRetries`, so helpers can be driven by a custom wrapper.
 */
export type RetryFunction = <T>(
  operation: RetryableOperation<T>,
  options?: RetryOptions
) => Promise<T>

// =============================================================================
// Collections
// =============================================================================

/**
 * Options for {@link CollectionProxy.query}.
 */
export interface QueryOptions {
  /** @default 25 */
  rows?: number
  /** @default 0 */
  offset?: number
}

/**
 * A stored document.
 */
export type StoredDocument = Record<string, unknown>

export interface QueryResult {
  total: number
  items: Array<{ id: string; document: StoredDocument }>
}

/**
 * Schema-bound access to one named collection.
 */
export interface CollectionProxy {
  readonly name: string
  ensureExists(): Promise<void>
  create(id: string, document: StoredDocument): Promise<WriteResult>
  read(id: string): Promise<StoredDocument | null>
  update(id: string, partial: StoredDocument): Promise<WriteResult>
  delete(id: string): Promise<boolean>
  query(q: string, options?: QueryOptions): Promise<QueryResult>
}

/**
 * What a collection proxy is built from.
 */
export interface CollectionContext {
  name: string
  schema: ZodSchema | undefined
  validate: boolean
  /** Search and read the collection's archive index too */
  archiveAccess: boolean
  /** Whether this collection has an archive index at all */
  archived: boolean
  /** Alternate retention applied to archived copies, in days. 0 keeps the default. */
  archiveAlternateRetention: number
  withRetries: RetryFunction
  logger: StoreLogger
}

export type CollectionFactory = (context: CollectionContext) => CollectionProxy
