/**
 * Assistant service
 *
 * Wires the pipeline components from configuration. Clients and the catalog
 * source are created once at startup and shared across requests.
 */

import type { CatalogRepository } from '@resource-guide/db'
import type { AppConfig } from '../../config/env'
import { loggers } from '../../config/logger'
import { AnthropicBackend, createAnthropicClient, type MessagesClient } from './generative-backend'
import { IntentClassifier } from './intent-classifier'
import { OpenAITextVectorizer, createOpenAIClient, type EmbeddingsClient } from './openai-vectorizer'
import { QueryOrchestrator } from './query-orchestrator'
import { ResultSynthesizer } from './result-synthesizer'
import { CatalogScanIndex, PgVectorIndex, withFallback } from './similarity-index'
import { LocalTextVectorizer, type TextVectorizer } from './text-vectorizer'

export * from './errors'
export * from './types'
export type { AssistantAnswer } from './query-orchestrator'
export { QueryOrchestrator } from './query-orchestrator'
export type { TextVectorizer } from './text-vectorizer'
export type { SimilarityIndex } from './similarity-index'
export type { GenerativeBackend } from './generative-backend'

export interface AssistantOverrides {
  messagesClient?: MessagesClient
  embeddingsClient?: EmbeddingsClient
}

export interface Assistant {
  orchestrator: QueryOrchestrator
  vectorizer: TextVectorizer
}

export function createVectorizer(config: AppConfig, overrides: AssistantOverrides = {}): TextVectorizer {
  if (config.embedding.provider === 'openai') {
    return new OpenAITextVectorizer(overrides.embeddingsClient ?? createOpenAIClient(config.embedding.apiKey), {
      model: config.embedding.model,
      logger: loggers.assistant.child('vectorizer'),
    })
  }
  return new LocalTextVectorizer()
}

export function createAssistant(
  config: AppConfig,
  catalog: Pick<CatalogRepository, 'findAll' | 'nearestNeighbours'>,
  overrides: AssistantOverrides = {}
): Assistant {
  const log = loggers.assistant

  const backend = new AnthropicBackend(overrides.messagesClient ?? createAnthropicClient(config.generation.apiKey), {
    model: config.generation.model,
    maxTokens: config.generation.maxTokens,
    logger: log.child('backend'),
  })

  const vectorizer = createVectorizer(config, overrides)

  const index = withFallback(
    new PgVectorIndex(catalog, {
      indexName: `${config.vectorIndex.table}.${config.vectorIndex.vectorField}`,
      candidates: config.vectorIndex.candidates,
    }),
    new CatalogScanIndex(catalog, vectorizer, { logger: loggers.search }),
    loggers.search
  )

  const orchestrator = new QueryOrchestrator({
    classifier: new IntentClassifier(backend, log.child('classifier')),
    vectorizer,
    index,
    synthesizer: new ResultSynthesizer(backend, log.child('synthesizer')),
    logger: log,
    resultLimit: config.searchResultLimit,
  })

  return { orchestrator, vectorizer }
}
