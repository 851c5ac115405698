/**
 * Text Vectorizer
 *
 * Maps text to a fixed-dimension unit vector. The local implementation is a
 * deterministic placeholder, not a trained model: hash-seeded noise plus a
 * bias toward a small set of anchor terms, so texts that mention the same
 * topics point in similar directions and the same text always yields the
 * same vector.
 */

import { createHash } from 'crypto'
import { EMBEDDING_DIMENSIONS, type EmbedOptions } from './types'
import { l2Normalize } from './vector-math'

export interface TextVectorizer {
  readonly dimensions: number
  embed(text: string, options?: EmbedOptions): Promise<number[]>
  embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]>
}

export const ANCHOR_TERMS = [
  'academic',
  'research',
  'library',
  'gym',
  'fitness',
  'dining',
  'food',
  'hours',
  'time',
  'schedule',
  'location',
  'building',
  'center',
  'facility',
  'service',
] as const

/** Dimensions reserved per anchor term, wrapping modulo the vector size */
const ANCHOR_SPAN = 20
const ANCHOR_WEIGHT = 0.1
const NOISE_AMPLITUDE = 0.05
const TOKEN_SIMILARITY_THRESHOLD = 0.7

export function zeroVector(dimensions: number = EMBEDDING_DIMENSIONS): number[] {
  return new Array<number>(dimensions).fill(0)
}

export function isBlank(text: string): boolean {
  return text.trim().length === 0
}

/**
 * Lower-cased whitespace tokens longer than two characters
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .filter(token => token.length > 2)
}

export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0
  if (a.length === 0) return b.length
  if (b.length === 0) return a.length

  let previous = Array.from({ length: b.length + 1 }, (_, j) => j)

  for (let i = 1; i <= a.length; i++) {
    const current = [i]
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost
      )
    }
    previous = current
  }

  return previous[b.length] ?? 0
}

/**
 * 1 - editDistance / max(len1, len2)
 */
export function tokenSimilarity(a: string, b: string): number {
  if (a === b) return 1
  const longest = Math.max(a.length, b.length)
  if (a.length === 0 || b.length === 0) return 0
  return 1 - levenshteinDistance(a, b) / longest
}

/**
 * Seeded random number generator (mulberry32). Returns values in [0, 1).
 */
function createSeededRandom(seed: number): () => number {
  let t = seed
  return () => {
    t = (t + 0x6d2b79f5) | 0
    let r = t
    r = Math.imul(r ^ (r >>> 15), r | 1)
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61)
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296
  }
}

function seedFromText(text: string): number {
  return createHash('sha256').update(text, 'utf8').digest().readUInt32LE(0)
}

/**
 * Count, per anchor term, the tokens that contain it or are spelled close
 * to it.
 */
export function anchorCounts(tokens: string[]): number[] {
  return ANCHOR_TERMS.map(anchor =>
    tokens.reduce(
      (count, token) =>
        token.includes(anchor) || tokenSimilarity(token, anchor) > TOKEN_SIMILARITY_THRESHOLD
          ? count + 1
          : count,
      0
    )
  )
}

/**
 * Deterministic embedding of `text`. Blank text yields the zero vector;
 * anything else yields a unit vector.
 */
export function localEmbedding(text: string, dimensions: number = EMBEDDING_DIMENSIONS): number[] {
  if (isBlank(text)) return zeroVector(dimensions)

  const random = createSeededRandom(seedFromText(text))
  const vector = Array.from({ length: dimensions }, () => (random() * 2 - 1) * NOISE_AMPLITUDE)

  anchorCounts(tokenize(text)).forEach((count, anchorIndex) => {
    if (count <= 0) return
    for (let i = 0; i < ANCHOR_SPAN; i++) {
      const dimension = (anchorIndex * ANCHOR_SPAN + i) % dimensions
      vector[dimension] = (vector[dimension] ?? 0) + count * ANCHOR_WEIGHT
    }
  })

  return l2Normalize(vector)
}

export class LocalTextVectorizer implements TextVectorizer {
  constructor(readonly dimensions: number = EMBEDDING_DIMENSIONS) {}

  async embed(text: string): Promise<number[]> {
    return localEmbedding(text, this.dimensions)
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = []
    for (const text of texts) {
      vectors.push(await this.embed(text))
    }
    return vectors
  }
}
