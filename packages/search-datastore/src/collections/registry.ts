/**
 * @file Collection Registry
 *
 * Maps collection names to schemas and hands out collection proxies.
 *
 * With validation on, proxies are built lazily and cached, one per name.
 * With validation off (administrative and migration access) the cache is
 * bypassed and every call builds a fresh proxy, so no stale configuration is
 * ever reused.
 */

import type { ZodSchema } from 'zod'
import { InvalidNameError, UnknownCollectionError } from '../errors/index.js'
import type { CollectionContext, CollectionFactory, CollectionProxy } from '../types/index.js'
import { validateCollectionName } from './naming.js'

export interface CollectionRegistryOptions {
  factory: CollectionFactory
  /** Settings shared by every proxy built by this registry */
  shared: Omit<CollectionContext, 'name' | 'schema' | 'validate' | 'archived'>
  /** Collections that have an archive index */
  archiveIndices: string[]
  /** @default true */
  validate?: boolean
}

export class CollectionRegistry {
  private readonly _models = new Map<string, ZodSchema | undefined>()
  private readonly _cache = new Map<string, CollectionProxy>()
  private readonly _factory: CollectionFactory
  private readonly _shared: CollectionRegistryOptions['shared']
  private readonly _archiveIndices: ReadonlySet<string>
  private _validate: boolean

  constructor(options: CollectionRegistryOptions) {
    this._factory = options.factory
    this._shared = options.shared
    this._archiveIndices = new Set(options.archiveIndices)
    this._validate = options.validate ?? true
  }

  get validate(): boolean {
    return this._validate
  }

  /**
   * Turn validation mode on or off. Turning it off drops cached proxies.
   */
  setValidation(enabled: boolean): void {
    this._validate = enabled
    if (!enabled) {
      this._cache.clear()
    }
  }

  /**
   * Register a schema under a collection name.
   *
   * @throws InvalidNameError for names outside `[a-z0-9_]`
   */
  register(name: string, schema?: ZodSchema): void {
    if (!validateCollectionName(name).valid) {
      throw new InvalidNameError(name)
    }
    this._models.set(name, schema)
    this._cache.delete(name)
  }

  /**
   * Snapshot of the registered schemas. Changes to it do not reach the
   * registry; use {@link register}.
   */
  getModels(): ReadonlyMap<string, ZodSchema | undefined> {
    return new Map(this._models)
  }

  /**
   * Proxy for a registered collection.
   *
   * @throws UnknownCollectionError for unregistered names
   */
  getCollection(name: string): CollectionProxy {
    if (!this._models.has(name)) {
      throw new UnknownCollectionError(name)
    }

    if (!this._validate) {
      return this.build(name)
    }

    let collection = this._cache.get(name)
    if (!collection) {
      collection = this.build(name)
      this._cache.set(name, collection)
    }
    return collection
  }

  private build(name: string): CollectionProxy {
    return this._factory({
      ...this._shared,
      name,
      schema: this._models.get(name),
      validate: this._validate,
      archived: this._archiveIndices.has(name),
    })
  }
}
