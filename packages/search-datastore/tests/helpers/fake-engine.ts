/**
 * @file In-process engine stand-in shared by the test suites.
 */

import { vi } from 'vitest'
import type {
  DeleteByQueryParams,
  DocumentLocator,
  EngineConnection,
  EngineInfo,
  GetTaskParams,
  IndexDocumentParams,
  PutRoleParams,
  PutUserParams,
  SearchParams,
  SearchResult,
  StoredDocument,
  TaskReference,
  TaskStatusResponse,
  UpdateDocumentParams,
  WriteResult,
} from '../../src/types/index.js'

// =============================================================================
// Error builders
// =============================================================================

/**
 * Error shaped like the official client's `ResponseError`.
 */
export function apiError(
  statusCode: number,
  body: Record<string, unknown> = {},
  message = 'Response Error'
): Error {
  return Object.assign(new Error(message), { name: 'ResponseError', meta: { statusCode, body } })
}

/**
 * Transport-level failure, recognised by name.
 */
export function transportError(
  name: 'ConnectionError' | 'NoLivingConnectionsError' | 'TimeoutError',
  message = 'transport failure'
): Error {
  return Object.assign(new Error(message), { name })
}

/**
 * Error in the legacy transport shape: a status code plus an error string.
 */
export function legacyError(status: number | string, error = 'legacy failure'): Error {
  return Object.assign(new Error(error), { name: 'TransportError', status, error })
}

// =============================================================================
// Fake connection
// =============================================================================

export class FakeEngineConnection implements EngineConnection {
  readonly indices = new Map<string, Map<string, StoredDocument>>()

  info = vi.fn(async (): Promise<EngineInfo> => ({ version: { number: '8.11.3' } }))

  ping = vi.fn(async (): Promise<boolean> => true)

  close = vi.fn(async (): Promise<void> => {})

  deleteByQuery = vi.fn(
    async (_params: DeleteByQueryParams): Promise<TaskReference> => ({ task: 'node-1:42' })
  )

  getTask = vi.fn(
    async (_params: GetTaskParams): Promise<TaskStatusResponse> => ({
      completed: true,
      task: {},
      response: { deleted: 0 },
    })
  )

  putRole = vi.fn(async (_params: PutRoleParams): Promise<{ created: boolean }> => ({ created: true }))

  putUser = vi.fn(async (_params: PutUserParams): Promise<{ created: boolean }> => ({ created: true }))

  indexExists = vi.fn(async (index: string): Promise<boolean> => this.indices.has(index))

  createIndex = vi.fn(async (index: string): Promise<void> => {
    this.indices.set(index, new Map())
  })

  indexDocument = vi.fn(async (params: IndexDocumentParams): Promise<WriteResult> => {
    const docs = this.index(params.index)
    const existed = docs.has(params.id)
    if (existed && params.opType === 'create') {
      throw apiError(409, {}, 'version_conflict_engine_exception')
    }
    docs.set(params.id, { ...params.document })
    return { id: params.id, version: 1, result: existed ? 'updated' : 'created' }
  })

  getDocument = vi.fn(async (params: DocumentLocator): Promise<StoredDocument | null> => {
    return this.indices.get(params.index)?.get(params.id) ?? null
  })

  updateDocument = vi.fn(async (params: UpdateDocumentParams): Promise<WriteResult> => {
    const docs = this.index(params.index)
    const current = docs.get(params.id)
    if (!current) {
      throw apiError(404, {}, 'document_missing_exception')
    }
    docs.set(params.id, { ...current, ...params.doc })
    return { id: params.id, version: 2, result: 'updated' }
  })

  deleteDocument = vi.fn(async (params: DocumentLocator): Promise<WriteResult> => {
    const removed = this.indices.get(params.index)?.delete(params.id) ?? false
    return { id: params.id, result: removed ? 'deleted' : 'not_found' }
  })

  search = vi.fn(async (params: SearchParams): Promise<SearchResult> => {
    const hits = params.index.split(',').flatMap((index) =>
      [...(this.indices.get(index)?.entries() ?? [])].map(([id, source]) => ({ id, index, source }))
    )
    return { total: hits.length, hits: hits.slice(params.from, params.from + params.size) }
  })

  private index(name: string): Map<string, StoredDocument> {
    let docs = this.indices.get(name)
    if (!docs) {
      docs = new Map()
      this.indices.set(name, docs)
    }
    return docs
  }
}

/**
 * Sleep stand-in that resolves immediately and records requested delays.
 */
export function createSleepRecorder() {
  const delays: number[] = []
  const sleep = vi.fn(async (ms: number): Promise<void> => {
    delays.push(ms)
  })
  return { delays, sleep }
}
