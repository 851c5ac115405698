/**
 * Catalog Service
 *
 * Ingestion side of the resource catalog. Every write that changes an
 * entry's searchable text recomputes its embedding from
 * `title description category`, so the index never drifts from the content.
 */

import { buildCatalogText, type CatalogEntry, type CatalogRepository } from '@resource-guide/db'
import type { ILogger } from '@resource-guide/logger'
import { isAbortError } from '../assistant/errors'
import type { TextVectorizer } from '../assistant/text-vectorizer'
import type { CallOptions } from '../assistant/types'
import { magnitude } from '../assistant/vector-math'

export type CatalogStore = Pick<
  CatalogRepository,
  'findPage' | 'findById' | 'insert' | 'update' | 'delete' | 'countStatus' | 'findMissingEmbeddings' | 'setEmbedding'
>

/** Public shape of a catalog entry; the vector itself stays server-side */
export interface CatalogResource {
  id: string
  title: string
  description: string
  category: string
  url: string
  hasEmbedding: boolean
}

export interface CreateResourceInput {
  title: string
  description?: string
  category?: string
  url: string
}

export type UpdateResourceInput = Partial<CreateResourceInput>

export interface ListResourcesQuery {
  category?: string
  skip?: number
  limit?: number
}

export interface BatchCreateResult {
  createdCount: number
  totalCount: number
  resources: CatalogResource[]
  /** One message per failed item, numbered from 1 */
  errors: string[]
}

export interface CategoryImportResult {
  category: string
  processed: number
  successful: number
  failed: number
  errors: string[]
}

export interface ImportResult {
  totalProcessed: number
  totalCategories: number
  successful: number
  failed: number
  details: CategoryImportResult[]
}

export interface CatalogReadiness {
  totalDocuments: number
  documentsWithEmbeddings: number
  ready: boolean
  message: string
}

export interface BackfillResult {
  processed: number
  skipped: number
  failed: number
}

export interface BackfillOptions extends CallOptions {
  batchSize?: number
  onProgress?: (done: number, total: number) => void
}

const DEFAULT_PAGE_SIZE = 100

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key]
  return typeof value === 'string' ? value.trim() : ''
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function toResource(entry: CatalogEntry): CatalogResource {
  return {
    id: entry.id,
    title: entry.title,
    description: entry.description,
    category: entry.category,
    url: entry.url,
    hasEmbedding: entry.embedding.length > 0,
  }
}

export class CatalogService {
  constructor(
    private readonly store: CatalogStore,
    private readonly vectorizer: TextVectorizer,
    private readonly log: ILogger
  ) {}

  async list(query: ListResourcesQuery = {}): Promise<CatalogResource[]> {
    const entries = await this.store.findPage({
      category: query.category,
      offset: query.skip ?? 0,
      limit: query.limit ?? DEFAULT_PAGE_SIZE,
    })
    return entries.map(toResource)
  }

  async get(id: string): Promise<CatalogResource | null> {
    const entry = await this.store.findById(id)
    return entry ? toResource(entry) : null
  }

  async create(input: CreateResourceInput): Promise<CatalogResource> {
    const content = {
      title: input.title,
      description: input.description ?? '',
      category: input.category ?? '',
      url: input.url,
    }
    const embedding = await this.embedForStorage(buildCatalogText(content))
    const entry = await this.store.insert({ ...content, embedding })

    this.log.info('Resource created', { id: entry.id, title: entry.title })
    return toResource(entry)
  }

  /**
   * Apply a partial update. Returns null when the entry does not exist.
   */
  async update(id: string, patch: UpdateResourceInput): Promise<CatalogResource | null> {
    const existing = await this.store.findById(id)
    if (!existing) return null

    const next: CatalogEntry = {
      ...existing,
      title: patch.title ?? existing.title,
      description: patch.description ?? existing.description,
      category: patch.category ?? existing.category,
      url: patch.url ?? existing.url,
    }

    if (buildCatalogText(next) !== buildCatalogText(existing) || existing.embedding.length === 0) {
      next.embedding = await this.embedForStorage(buildCatalogText(next), id)
      this.log.debug('Resource re-embedded', { id, embedded: next.embedding.length > 0 })
    }

    const updated = await this.store.update(next)
    if (!updated) return null

    this.log.info('Resource updated', { id })
    return toResource(updated)
  }

  /**
   * Create each item independently. A failed item is reported and does not
   * stop the rest.
   */
  async createBatch(items: CreateResourceInput[], options: CallOptions = {}): Promise<BatchCreateResult> {
    const resources: CatalogResource[] = []
    const errors: string[] = []

    for (const [i, item] of items.entries()) {
      options.signal?.throwIfAborted()
      try {
        resources.push(await this.create(item))
      } catch (error) {
        if (isAbortError(error, options.signal)) throw error
        this.log.warn('Batch item failed', { index: i }, error)
        errors.push(`Resource ${i + 1}: ${errorMessage(error)}`)
      }
    }

    this.log.info('Resource batch created', { created: resources.length, total: items.length })
    return { createdCount: resources.length, totalCount: items.length, resources, errors }
  }

  /**
   * Import a category-keyed collection: `{ "<category>": [{ title, text, url }, ...] }`.
   * Keys whose value is not a list, and list items that are not objects, are
   * ignored. Items without a title or url count as failed.
   */
  async importCollection(data: Record<string, unknown>, options: CallOptions = {}): Promise<ImportResult> {
    const result: ImportResult = { totalProcessed: 0, totalCategories: 0, successful: 0, failed: 0, details: [] }

    for (const [categoryName, items] of Object.entries(data)) {
      if (!Array.isArray(items)) continue

      const category = categoryName.trim()
      const detail: CategoryImportResult = { category, processed: 0, successful: 0, failed: 0, errors: [] }
      result.totalCategories++

      for (const item of items) {
        if (!isRecord(item)) continue
        options.signal?.throwIfAborted()

        result.totalProcessed++
        detail.processed++

        const title = stringField(item, 'title')
        const url = stringField(item, 'url')
        if (!title || !url) {
          detail.failed++
          detail.errors.push(`Missing required fields: ${title.slice(0, 50)}...`)
          continue
        }

        try {
          await this.create({ title, description: stringField(item, 'text'), category, url })
          detail.successful++
        } catch (error) {
          if (isAbortError(error, options.signal)) throw error
          detail.failed++
          detail.errors.push(`Error processing ${title.slice(0, 50)}: ${errorMessage(error)}`)
        }
      }

      result.successful += detail.successful
      result.failed += detail.failed
      result.details.push(detail)
    }

    this.log.info('Catalog import finished', {
      categories: result.totalCategories,
      successful: result.successful,
      failed: result.failed,
    })
    return result
  }

  async remove(id: string): Promise<boolean> {
    const deleted = await this.store.delete(id)
    if (deleted) {
      this.log.info('Resource deleted', { id })
    }
    return deleted
  }

  async status(): Promise<CatalogReadiness> {
    const { totalDocuments, documentsWithEmbeddings } = await this.store.countStatus()
    const ready = documentsWithEmbeddings > 0

    return {
      totalDocuments,
      documentsWithEmbeddings,
      ready,
      message: ready
        ? `${documentsWithEmbeddings} of ${totalDocuments} resources are searchable`
        : 'No resources have embeddings yet. Run the embedding backfill.',
    }
  }

  /**
   * Embed every entry that has no stored vector. Per-entry failures are
   * logged and counted and leave the entry without a vector for the next
   * run; cancellation stops the run.
   */
  async backfillEmbeddings(options: BackfillOptions = {}): Promise<BackfillResult> {
    const batchSize = Math.max(1, options.batchSize ?? 25)
    const pending = await this.store.findMissingEmbeddings()
    const result: BackfillResult = { processed: 0, skipped: 0, failed: 0 }
    const callOptions = { signal: options.signal, strict: true }

    this.log.info('Embedding backfill started', { pending: pending.length, batchSize })

    for (let start = 0; start < pending.length; start += batchSize) {
      const batch = pending.slice(start, start + batchSize)
      options.signal?.throwIfAborted()

      let vectors: Array<number[] | null>
      try {
        vectors = await this.vectorizer.embedBatch(batch.map(buildCatalogText), callOptions)
      } catch (error) {
        if (isAbortError(error, options.signal)) throw error
        this.log.warn('Batch embedding failed, embedding entries one by one', { size: batch.length }, error)
        vectors = await this.embedEach(batch, options)
      }

      for (const [i, entry] of batch.entries()) {
        const vector = vectors[i]
        if (vector === null) {
          result.failed++
          continue
        }
        if (!vector || magnitude(vector) === 0) {
          this.log.warn('Resource has no embeddable text', { id: entry.id })
          result.skipped++
          continue
        }

        try {
          await this.store.setEmbedding(entry.id, vector)
          result.processed++
        } catch (error) {
          if (isAbortError(error, options.signal)) throw error
          this.log.error('Failed to store embedding', { id: entry.id }, error)
          result.failed++
        }
      }

      options.onProgress?.(Math.min(start + batch.length, pending.length), pending.length)
    }

    this.log.info('Embedding backfill finished', { ...result })
    return result
  }

  /**
   * Embed for persistence. Never stores a degraded vector: when the backend
   * fails the entry is saved without one and the backfill retries it.
   */
  private async embedForStorage(text: string, id?: string): Promise<number[]> {
    try {
      return await this.vectorizer.embed(text, { strict: true })
    } catch (error) {
      if (isAbortError(error)) throw error
      this.log.warn('Embedding failed, saving resource without a vector', { id }, error)
      return []
    }
  }

  /** Per-entry strict embedding; null marks an entry that failed */
  private async embedEach(batch: CatalogEntry[], options: CallOptions): Promise<Array<number[] | null>> {
    const vectors: Array<number[] | null> = []
    for (const entry of batch) {
      try {
        vectors.push(await this.vectorizer.embed(buildCatalogText(entry), { signal: options.signal, strict: true }))
      } catch (error) {
        if (isAbortError(error, options.signal)) throw error
        this.log.error('Failed to embed resource', { id: entry.id }, error)
        vectors.push(null)
      }
    }
    return vectors
  }
}
