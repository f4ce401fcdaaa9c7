/**
 * @file Elasticsearch Connection
 *
 * `EngineConnection` backed by the official `@elastic/elasticsearch` client.
 * The client is created with `maxRetries: 0`; its errors
 * (`ResponseError`, `ConnectionError`, `TimeoutError`, ...) are passed
 * through as thrown.
 */

import { readFileSync } from 'node:fs'
import { Client, type ClientOptions } from '@elastic/elasticsearch'
import type {
  ConnectionFactory,
  ConnectionSettings,
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
  TaskReference,
  TaskStatusResponse,
  UpdateDocumentParams,
  WriteResult,
} from '../types/index.js'
import { isRecord } from '../retry/error-shapes.js'

function toRecord(value: unknown): Record<string, unknown> | undefined {
  return isRecord(value) ? value : undefined
}

export class ElasticsearchConnection implements EngineConnection {
  readonly client: Client

  /**
   * @param clientOptions - Extra client options, such as a custom transport
   *   `Connection` class. Settings derived from `settings` take precedence.
   */
  constructor(settings: ConnectionSettings, clientOptions: ClientOptions = {}) {
    this.client = new Client({
      ...clientOptions,
      nodes: settings.hosts,
      maxRetries: 0,
      requestTimeout: settings.timeout * 1000,
      tls: {
        ...(settings.caPath ? { ca: readFileSync(settings.caPath) } : {}),
        rejectUnauthorized: settings.verifyCerts,
      },
    })
  }

  async info(): Promise<EngineInfo> {
    const info = await this.client.info()
    return { version: { number: info.version.number } }
  }

  ping(): Promise<boolean> {
    return this.client.ping()
  }

  close(): Promise<void> {
    return this.client.close()
  }

  async deleteByQuery(params: DeleteByQueryParams): Promise<TaskReference> {
    const response = await this.client.deleteByQuery({
      index: params.index,
      q: params.q,
      wait_for_completion: params.waitForCompletion,
      conflicts: params.conflicts,
      max_docs: params.maxDocs,
    })
    if (response.task === undefined) {
      throw new Error(`delete_by_query on ${params.index} did not return a task id`)
    }
    return { task: String(response.task) }
  }

  async getTask(params: GetTaskParams): Promise<TaskStatusResponse> {
    const response = await this.client.tasks.get({
      task_id: params.taskId,
      wait_for_completion: params.waitForCompletion,
      timeout: params.timeout,
    })
    return {
      completed: response.completed,
      task: { status: toRecord(response.task.status) },
      response: toRecord(response.response),
    }
  }

  async putRole(params: PutRoleParams): Promise<{ created: boolean }> {
    const response = await this.client.security.putRole({
      name: params.name,
      indices: params.indices.map((entry) => ({
        names: entry.names,
        privileges: entry.privileges,
        allow_restricted_indices: entry.allowRestrictedIndices,
      })),
    })
    return { created: response.role.created }
  }

  async putUser(params: PutUserParams): Promise<{ created: boolean }> {
    const response = await this.client.security.putUser({
      username: params.username,
      password: params.password,
      roles: params.roles,
    })
    return { created: response.created }
  }

  indexExists(index: string): Promise<boolean> {
    return this.client.indices.exists({ index })
  }

  async createIndex(index: string): Promise<void> {
    await this.client.indices.create({ index })
  }

  async indexDocument(params: IndexDocumentParams): Promise<WriteResult> {
    const response = await this.client.index({
      index: params.index,
      id: params.id,
      document: params.document,
      op_type: params.opType,
    })
    return { id: response._id, version: response._version, result: response.result }
  }

  async getDocument(params: DocumentLocator): Promise<Record<string, unknown> | null> {
    const response = await this.client.get<Record<string, unknown>>(
      { index: params.index, id: params.id },
      { ignore: [404] }
    )
    return response.found && response._source ? response._source : null
  }

  async updateDocument(params: UpdateDocumentParams): Promise<WriteResult> {
    const response = await this.client.update({
      index: params.index,
      id: params.id,
      doc: params.doc,
    })
    return { id: response._id, version: response._version, result: response.result }
  }

  async deleteDocument(params: DocumentLocator): Promise<WriteResult> {
    const response = await this.client.delete(
      { index: params.index, id: params.id },
      { ignore: [404] }
    )
    return { id: response._id, version: response._version, result: response.result }
  }

  async search(params: SearchParams): Promise<SearchResult> {
    const response = await this.client.search<Record<string, unknown>>({
      index: params.index,
      q: params.q,
      from: params.from,
      size: params.size,
    })
    const total = response.hits.total
    return {
      total: typeof total === 'number' ? total : total?.value ?? 0,
      hits: response.hits.hits.map((hit) => ({
        id: hit._id ?? '',
        index: hit._index,
        source: hit._source ?? {},
      })),
    }
  }
}

/**
 * Default connection factory.
 */
export const createElasticsearchConnection: ConnectionFactory = (settings) =>
  new ElasticsearchConnection(settings)
