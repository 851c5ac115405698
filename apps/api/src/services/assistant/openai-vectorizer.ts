import OpenAI from 'openai'
import type { ILogger } from '@resource-guide/logger'
import { BackendUnavailableError, isAbortError, upstreamStatus } from './errors'
import { LocalTextVectorizer, isBlank, zeroVector, type TextVectorizer } from './text-vectorizer'
import { EMBEDDING_DIMENSIONS, type EmbedOptions } from './types'
import { l2Normalize } from './vector-math'

/**
 * Subset of the OpenAI client the vectorizer calls
 */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: { model: string; input: string; dimensions?: number },
      options?: { signal?: AbortSignal }
    ): Promise<{ data: Array<{ embedding: number[] }> }>
  }
}

export interface OpenAIVectorizerOptions {
  model: string
  dimensions?: number
  logger: ILogger
}

export function createOpenAIClient(apiKey: string): OpenAI {
  // Single-shot calls: retries belong to the caller
  return new OpenAI({ apiKey, maxRetries: 0 })
}

/**
 * Hosted embeddings, requested at the catalog's dimension and re-normalized.
 * A failed call degrades to the local vectorizer so `embed` never raises,
 * unless the caller asks for `strict`, in which case it raises
 * BackendUnavailableError.
 */
export class OpenAITextVectorizer implements TextVectorizer {
  readonly dimensions: number
  private readonly model: string
  private readonly log: ILogger
  private readonly fallback: LocalTextVectorizer

  constructor(
    private readonly client: EmbeddingsClient,
    options: OpenAIVectorizerOptions
  ) {
    this.model = options.model
    this.dimensions = options.dimensions ?? EMBEDDING_DIMENSIONS
    this.log = options.logger
    this.fallback = new LocalTextVectorizer(this.dimensions)
  }

  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    if (isBlank(text)) return zeroVector(this.dimensions)

    try {
      const response = await this.client.embeddings.create(
        { model: this.model, input: text, dimensions: this.dimensions },
        { signal: options.signal }
      )
      const embedding = response.data[0]?.embedding
      if (!embedding || embedding.length !== this.dimensions) {
        throw new Error(
          `Expected a ${this.dimensions}-dimension embedding, got ${embedding?.length ?? 'none'}`
        )
      }
      return l2Normalize(embedding)
    } catch (error) {
      if (isAbortError(error, options.signal)) throw error

      if (options.strict) {
        throw new BackendUnavailableError(
          'embedding backend',
          error instanceof Error ? error.message : String(error),
          upstreamStatus(error),
          { cause: error }
        )
      }

      this.log.warn('Hosted embedding failed, using local vectorizer', { model: this.model }, error)
      return this.fallback.embed(text)
    }
  }

  async embedBatch(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    const vectors: number[][] = []
    for (const text of texts) {
      vectors.push(await this.embed(text, options))
    }
    return vectors
  }
}
