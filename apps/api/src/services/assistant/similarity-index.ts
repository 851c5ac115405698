/**
 * Similarity Index
 *
 * Two implementations behind one interface:
 * - PgVectorIndex: approximate nearest-neighbour query against the pgvector
 *   HNSW index (primary)
 * - CatalogScanIndex: exact cosine scan over the full catalog snapshot
 *   (fallback)
 *
 * `withFallback` composes them: the scan runs only when the primary throws
 * or comes back empty. Callers never see a primary failure.
 */

import { buildCatalogText, type CatalogMatch, type NearestNeighbourOptions } from '@resource-guide/db'
import type { ILogger } from '@resource-guide/logger'
import { MalformedResponseError, isAbortError } from './errors'
import type { TextVectorizer } from './text-vectorizer'
import { DEFAULT_RESULT_LIMIT, type CallOptions, type CatalogEntry, type ScoredEntry } from './types'
import { cosineSimilarity } from './vector-math'

export interface SimilarityIndex {
  readonly name: string
  /**
   * Entries most similar to `queryVector`, sorted by descending score and
   * capped at `limit`.
   */
  search(queryVector: number[], limit?: number, options?: CallOptions): Promise<ScoredEntry[]>
}

/** Minimum candidate pool for the approximate query */
export const DEFAULT_CANDIDATE_POOL = 100

/** Fallback scan drops entries at or below this similarity */
export const MIN_FALLBACK_SIMILARITY = 0.1

export function rankEntries(scored: ScoredEntry[], limit: number): ScoredEntry[] {
  return [...scored].sort((a, b) => b.score - a.score).slice(0, Math.max(0, limit))
}

// ============================================================================
// Primary: pgvector
// ============================================================================

export interface NearestNeighbourSource {
  nearestNeighbours(queryVector: number[], options: NearestNeighbourOptions): Promise<CatalogMatch[]>
}

export class PgVectorIndex implements SimilarityIndex {
  readonly name: string

  constructor(
    private readonly source: NearestNeighbourSource,
    private readonly options: { indexName: string; candidates?: number }
  ) {
    this.name = `pgvector:${options.indexName}`
  }

  async search(
    queryVector: number[],
    limit: number = DEFAULT_RESULT_LIMIT,
    options: CallOptions = {}
  ): Promise<ScoredEntry[]> {
    options.signal?.throwIfAborted()

    // Candidate pool is at least 10x the result limit
    const candidates = Math.max(this.options.candidates ?? DEFAULT_CANDIDATE_POOL, limit * 10)
    const matches = await this.source.nearestNeighbours(queryVector, { limit, candidates })

    options.signal?.throwIfAborted()

    const scored = matches.map(match => {
      if (!Number.isFinite(match.similarity)) {
        throw new MalformedResponseError(`Index returned a non-numeric score for ${match.entry.id}`)
      }
      return { entry: match.entry, score: match.similarity }
    })

    return rankEntries(scored, limit)
  }
}

// ============================================================================
// Fallback: brute-force scan
// ============================================================================

export interface CatalogSnapshotSource {
  findAll(): Promise<CatalogEntry[]>
}

export interface CatalogScanOptions {
  logger: ILogger
  minSimilarity?: number
}

export class CatalogScanIndex implements SimilarityIndex {
  readonly name = 'catalog-scan'
  private readonly minSimilarity: number
  private readonly log: ILogger

  constructor(
    private readonly source: CatalogSnapshotSource,
    private readonly vectorizer: TextVectorizer,
    options: CatalogScanOptions
  ) {
    this.minSimilarity = options.minSimilarity ?? MIN_FALLBACK_SIMILARITY
    this.log = options.logger
  }

  /**
   * Never rejects except on cancellation: a failed snapshot load yields an
   * empty result.
   */
  async search(
    queryVector: number[],
    limit: number = DEFAULT_RESULT_LIMIT,
    options: CallOptions = {}
  ): Promise<ScoredEntry[]> {
    try {
      const entries = await this.source.findAll()
      const scored: ScoredEntry[] = []

      for (const entry of entries) {
        options.signal?.throwIfAborted()
        const score = cosineSimilarity(queryVector, await this.embeddingFor(entry, queryVector.length, options))
        if (score > this.minSimilarity) {
          scored.push({ entry, score })
        }
      }

      this.log.debug('Catalog scan complete', {
        scanned: entries.length,
        matched: scored.length,
        limit,
      })

      return rankEntries(scored, limit)
    } catch (error) {
      if (isAbortError(error, options.signal)) throw error

      this.log.error('Catalog scan failed', { limit }, error)
      return []
    }
  }

  /**
   * Stored embedding when it is usable, otherwise one computed from the
   * entry's composite text.
   */
  private async embeddingFor(entry: CatalogEntry, dimensions: number, options: CallOptions): Promise<number[]> {
    if (entry.embedding.length === dimensions) {
      return entry.embedding
    }
    return this.vectorizer.embed(buildCatalogText(entry), options)
  }
}

// ============================================================================
// Combinator
// ============================================================================

export function withFallback(
  primary: SimilarityIndex,
  fallback: SimilarityIndex,
  logger: ILogger
): SimilarityIndex {
  return {
    name: `${primary.name}|${fallback.name}`,

    async search(
      queryVector: number[],
      limit: number = DEFAULT_RESULT_LIMIT,
      options: CallOptions = {}
    ): Promise<ScoredEntry[]> {
      try {
        const results = await primary.search(queryVector, limit, options)
        if (results.length > 0) {
          logger.debug('Primary index answered', { index: primary.name, count: results.length })
          return results
        }
        logger.warn('Primary index returned no results, falling back', {
          index: primary.name,
          fallback: fallback.name,
        })
      } catch (error) {
        if (isAbortError(error, options.signal)) throw error

        logger.warn('Primary index failed, falling back', { index: primary.name, fallback: fallback.name }, error)
      }

      return fallback.search(queryVector, limit, options)
    },
  }
}
