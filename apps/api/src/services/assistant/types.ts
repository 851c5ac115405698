import type { CatalogEntry } from '@resource-guide/db'

export type { CatalogEntry }

/** Dimension of every vector the assistant produces or compares */
export const EMBEDDING_DIMENSIONS = 384

/** Default number of catalog entries cited in an answer */
export const DEFAULT_RESULT_LIMIT = 3

/**
 * Classified purpose of a user query. Produced once per request by the
 * intent classifier and never re-derived downstream.
 */
export type Intent =
  | { kind: 'search'; searchPhrase: string; draftMessage: string }
  | { kind: 'casual'; message: string }

/**
 * A catalog entry ranked against a query. Lists of these are sorted by
 * descending score and capped at the requested limit.
 */
export interface ScoredEntry {
  entry: CatalogEntry
  score: number
}

/**
 * Options shared by every stage that may call out to a backend.
 */
export interface CallOptions {
  signal?: AbortSignal
}

export interface EmbedOptions extends CallOptions {
  /**
   * Raise instead of degrading to the local vectorizer. Ingestion sets this
   * so a vector from another embedding space is never stored.
   */
  strict?: boolean
}
