/**
 * @file Index Collection
 *
 * Default collection proxy: one engine index per collection, plus an
 * `<name>-ma` archive index for collections configured as archived. Every
 * engine call goes through the store's `withRetries` with the index named,
 * so index-bound failures (not ready, blocked writes, lost search contexts)
 * are retried.
 */

import { ZodObject } from 'zod'
import { DatastoreError } from '../errors/index.js'
import type {
  CollectionContext,
  CollectionProxy,
  QueryOptions,
  QueryResult,
  StoredDocument,
  WriteResult,
} from '../types/index.js'
import { archiveIndexName } from './naming.js'

const DAY_MS = 24 * 60 * 60 * 1000

export class IndexCollection implements CollectionProxy {
  readonly name: string
  private readonly _context: CollectionContext
  private readonly _now: () => number

  constructor(context: CollectionContext, now: () => number = Date.now) {
    this.name = context.name
    this._context = context
    this._now = now
  }

  get archiveName(): string {
    return archiveIndexName(this.name)
  }

  /**
   * Indices searched by {@link query}.
   */
  get searchIndices(): string[] {
    return this.archiveReadable ? [this.name, this.archiveName] : [this.name]
  }

  private get archiveReadable(): boolean {
    return this._context.archived && this._context.archiveAccess
  }

  async ensureExists(): Promise<void> {
    const indices = this._context.archived ? [this.name, this.archiveName] : [this.name]
    for (const index of indices) {
      const exists = await this._context.withRetries(
        (connection) => connection.indexExists(index),
        { index, label: 'indices.exists' }
      )
      if (!exists) {
        await this._context.withRetries(
          (connection) => connection.createIndex(index),
          { index, label: 'indices.create' }
        )
        this._context.logger.info(`Created index ${index.toUpperCase()}`)
      }
    }
  }

  /**
   * Create a document. Fails with `VersionConflictError` when the id exists.
   */
  create(id: string, document: StoredDocument): Promise<WriteResult> {
    if (this._context.validate && this._context.schema) {
      this._context.schema.parse(document)
    }
    return this._context.withRetries(
      (connection) =>
        connection.indexDocument({ index: this.name, id, document, opType: 'create' }),
      { index: this.name, label: 'index', raiseConflicts: true }
    )
  }

  async read(id: string): Promise<StoredDocument | null> {
    const found = await this._context.withRetries(
      (connection) => connection.getDocument({ index: this.name, id }),
      { index: this.name, label: 'get' }
    )
    if (found || !this.archiveReadable) {
      return found
    }
    return this._context.withRetries(
      (connection) => connection.getDocument({ index: this.archiveName, id }),
      { index: this.archiveName, label: 'get' }
    )
  }

  update(id: string, partial: StoredDocument): Promise<WriteResult> {
    const schema = this._context.schema
    if (this._context.validate && schema instanceof ZodObject) {
      schema.partial().parse(partial)
    }
    return this._context.withRetries(
      (connection) => connection.updateDocument({ index: this.name, id, doc: partial }),
      { index: this.name, label: 'update' }
    )
  }

  async delete(id: string): Promise<boolean> {
    const result = await this._context.withRetries(
      (connection) => connection.deleteDocument({ index: this.name, id }),
      { index: this.name, label: 'delete' }
    )
    return result.result === 'deleted'
  }

  async query(q: string, options: QueryOptions = {}): Promise<QueryResult> {
    const index = this.searchIndices.join(',')
    const result = await this._context.withRetries(
      (connection) =>
        connection.search({
          index,
          q,
          from: options.offset ?? 0,
          size: options.rows ?? 25,
        }),
      { index, label: 'search' }
    )
    return {
      total: result.total,
      items: result.hits.map((hit) => ({ id: hit.id, document: hit.source })),
    }
  }

  /**
   * Copy a document into the archive index. With an alternate retention
   * configured, the copy is stamped with `archive_expiry_ts` that many days
   * out.
   *
   * @returns false when the document does not exist
   */
  async archive(id: string): Promise<boolean> {
    if (!this._context.archived) {
      throw new DatastoreError(`Collection '${this.name}' has no archive index`)
    }

    const document = await this._context.withRetries(
      (connection) => connection.getDocument({ index: this.name, id }),
      { index: this.name, label: 'get' }
    )
    if (!document) {
      return false
    }

    const retention = this._context.archiveAlternateRetention
    const archived =
      retention > 0
        ? {
            ...document,
            archive_expiry_ts: new Date(this._now() + retention * DAY_MS).toISOString(),
          }
        : document

    await this._context.withRetries(
      (connection) =>
        connection.indexDocument({
          index: this.archiveName,
          id,
          document: archived,
          opType: 'index',
        }),
      { index: this.archiveName, label: 'index' }
    )
    return true
  }
}

/**
 * Default collection factory.
 */
export function createIndexCollection(context: CollectionContext): CollectionProxy {
  return new IndexCollection(context)
}
