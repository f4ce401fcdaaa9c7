/**
 * search-datastore
 *
 * Resilient client façade for an Elasticsearch-compatible search and index
 * engine. Keeps long-lived workers running through a degraded cluster:
 * transient failures are retried with linear capped backoff, broken
 * connections are rebuilt, and async server-side tasks are waited on
 * without tripping transport timeouts.
 *
 * @packageDocumentation
 * @module search-datastore
 */

// ============================================================================
// Type Exports
// ============================================================================

export type {
  // Engine connection
  EngineConnection,
  EngineInfo,
  ConnectionFactory,
  ConnectionSettings,
  TaskReference,
  TaskStatusResponse,
  DeleteByQueryParams,
  GetTaskParams,
  PutRoleParams,
  PutUserParams,
  RoleIndexPrivileges,
  IndexDocumentParams,
  UpdateDocumentParams,
  DocumentLocator,
  SearchParams,
  SearchHit,
  SearchResult,
  WriteResult,
  // Retry
  ConflictCounts,
  RetryOptions,
  RetryableOperation,
  RetryFunction,
  // Collections
  StoredDocument,
  CollectionProxy,
  CollectionContext,
  CollectionFactory,
  QueryOptions,
  QueryResult,
} from './types/index.js'

// ============================================================================
// Public API
// ============================================================================

export {
  DatastoreClient,
  type DatastoreClientOptions,
  type ArchiveConfig,
} from './store/datastore-client.js'

export {
  storeConfigSchema,
  parseStoreConfig,
  loadStoreConfig,
  type StoreConfig,
  type StoreConfigInput,
} from './config/store-config.js'

export {
  createConsoleLogger,
  silentLogger,
  type StoreLogger,
  type LogFn,
  type ConsoleLoggerOptions,
} from './logging/logger.js'

export {
  DatastoreError,
  UnsupportedVersionError,
  ConfigurationError,
  InvalidNameError,
  UnknownCollectionError,
  VersionConflictError,
  ClosedConnectionError,
} from './errors/index.js'

export {
  classifyFailure,
  type FailureClassification,
  type RetryReason,
} from './retry/classify-failure.js'

export {
  RetryExecutor,
  mergeConflictCounts,
  type RetryExecutorConfig,
  type ConnectionProvider,
  type RetryPhase,
} from './retry/retry-executor.js'

export { ClientLifecycleManager, type ClientLifecycleOptions } from './connection/client-lifecycle.js'

export {
  ElasticsearchConnection,
  createElasticsearchConnection,
} from './connection/elasticsearch-connection.js'

export {
  MIN_ENGINE_VERSION,
  assertSupportedVersion,
  compareVersions,
  isSupportedVersion,
} from './connection/version-guard.js'

export { AsyncTaskWaiter, TASK_POLL_TIMEOUT, type TaskResult } from './tasks/task-waiter.js'

export {
  TaskCleanup,
  TASKS_INDEX,
  buildTaskCleanupQuery,
  type TaskCleanupOptions,
} from './tasks/task-cleanup.js'

export {
  CredentialSwitcher,
  ALTERNATE_USERS,
  TASK_MANAGER_ROLE,
  generateRandomSecret,
  type AlternateUser,
  type CredentialSwitcherOptions,
  type CredentialTarget,
} from './auth/credential-switcher.js'

export { safeHost, replaceCredentials } from './auth/hosts.js'

export { CollectionRegistry, type CollectionRegistryOptions } from './collections/registry.js'

export { IndexCollection, createIndexCollection } from './collections/index-collection.js'

export {
  validateCollectionName,
  archiveIndexName,
  type CollectionNameValidationResult,
} from './collections/naming.js'

export { DATE_FORMAT, DATEMATH_MAP, toNativeDateMath, type DateMathSymbol } from './datemath/datemath.js'
