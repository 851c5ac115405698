/**
 * Query Orchestrator
 *
 * Runs one request through the pipeline:
 *
 *   classify -> casual: done
 *            -> search: vectorize -> search -> synthesize -> done
 *
 * Each stage runs at most once. Classification errors are the only ones that
 * reach the caller; the later stages absorb their own failures. The abort
 * signal is checked before every stage and forwarded to every backend call.
 */

import type { ILogger } from '@resource-guide/logger'
import type { IntentClassifier } from './intent-classifier'
import type { ResultSynthesizer } from './result-synthesizer'
import type { SimilarityIndex } from './similarity-index'
import { isBlank, type TextVectorizer } from './text-vectorizer'
import { DEFAULT_RESULT_LIMIT, type CallOptions, type Intent, type ScoredEntry } from './types'

export interface AssistantAnswer {
  text: string
  intent: Intent
  resources: ScoredEntry[]
  processingTimeMs: number
}

export interface QueryOrchestratorDeps {
  classifier: Pick<IntentClassifier, 'classify'>
  vectorizer: TextVectorizer
  index: SimilarityIndex
  synthesizer: Pick<ResultSynthesizer, 'synthesize'>
  logger: ILogger
  resultLimit?: number
}

export class QueryOrchestrator {
  private readonly resultLimit: number

  constructor(private readonly deps: QueryOrchestratorDeps) {
    this.resultLimit = deps.resultLimit ?? DEFAULT_RESULT_LIMIT
  }

  async answer(userText: string, options: CallOptions = {}): Promise<AssistantAnswer> {
    const { classifier, synthesizer, logger } = this.deps
    const { signal } = options
    const started = Date.now()

    signal?.throwIfAborted()
    const intent = await classifier.classify(userText, options)

    if (intent.kind === 'casual') {
      logger.info('Casual reply', { processingTimeMs: Date.now() - started })
      return {
        text: intent.message,
        intent,
        resources: [],
        processingTimeMs: Date.now() - started,
      }
    }

    const resources = await this.findResources(intent.searchPhrase, this.resultLimit, options)

    signal?.throwIfAborted()
    const text = await synthesizer.synthesize(intent.draftMessage, resources, userText, options)

    const processingTimeMs = Date.now() - started
    logger.info('Search answer', {
      searchPhrase: intent.searchPhrase,
      resultCount: resources.length,
      processingTimeMs,
    })

    return { text, intent, resources, processingTimeMs }
  }

  /**
   * Ranked catalog entries for a search phrase. A blank phrase matches
   * nothing.
   */
  async findResources(
    searchPhrase: string,
    limit: number = this.resultLimit,
    options: CallOptions = {}
  ): Promise<ScoredEntry[]> {
    const { vectorizer, index, logger } = this.deps

    if (isBlank(searchPhrase)) {
      logger.debug('Blank search phrase, skipping search')
      return []
    }

    options.signal?.throwIfAborted()
    const queryVector = await vectorizer.embed(searchPhrase, options)

    options.signal?.throwIfAborted()
    return index.search(queryVector, limit, options)
  }
}
