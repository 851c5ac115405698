/**
 * Result Synthesizer
 *
 * Turns the classifier's draft message and the ranked entries into the final
 * answer. The generative path is preferred; any failure falls back to a
 * deterministic numbered list so a search always produces text.
 */

import type { ILogger } from '@resource-guide/logger'
import { EmptyResultError, isAbortError } from './errors'
import type { GenerativeBackend } from './generative-backend'
import type { CallOptions, ScoredEntry } from './types'

export const NO_RESULTS_NOTICE =
  "\n\nI couldn't find any specific resources for your search. Please try different keywords or ask me something else!"

export const RESULTS_HEADER = '\n\nHere are the best resources I found:\n\n'

export const SYNTHESIS_INSTRUCTION = `You are a helpful campus assistant with access to the organization's resource catalog.
Use the resources below to answer the user's question in a concise, conversational tone.
Link every resource you mention as [Title](URL).
If the resources don't fully answer the question, say so and suggest where the user might look next.`

/**
 * Deterministic answer: the draft followed by a numbered list of
 * `[title](url)` links with descriptions, in input order.
 */
export function formatTemplatedAnswer(draftMessage: string, entries: ScoredEntry[]): string {
  const items = entries.map(
    ({ entry }, index) => `${index + 1}. [${entry.title}](${entry.url})\n${entry.description}`
  )
  return draftMessage + RESULTS_HEADER + items.join('\n\n')
}

export function buildResultSummary(entries: ScoredEntry[]): string {
  return entries
    .map(({ entry, score }, index) =>
      [
        `${index + 1}. ${entry.title}`,
        `   Description: ${entry.description}`,
        `   Category: ${entry.category}`,
        `   URL: ${entry.url}`,
        `   Score: ${score.toFixed(3)}`,
      ].join('\n')
    )
    .join('\n\n')
}

export class ResultSynthesizer {
  constructor(
    private readonly backend: GenerativeBackend,
    private readonly log: ILogger
  ) {}

  async synthesize(
    draftMessage: string,
    entries: ScoredEntry[],
    question: string = '',
    options: CallOptions = {}
  ): Promise<string> {
    if (entries.length === 0) {
      return draftMessage + NO_RESULTS_NOTICE
    }

    try {
      const answer = await this.backend.generate(
        [
          SYNTHESIS_INSTRUCTION,
          `Available resources:\n${buildResultSummary(entries)}`,
          `Draft reply: ${draftMessage}`,
          `User question: ${question}`,
        ],
        options
      )
      if (answer.trim().length === 0) {
        throw new EmptyResultError('Synthesized answer was empty')
      }
      return answer
    } catch (error) {
      if (isAbortError(error, options.signal)) throw error

      this.log.warn('Answer synthesis failed, using template', { resources: entries.length }, error)
      return formatTemplatedAnswer(draftMessage, entries)
    }
  }
}
