import Anthropic from '@anthropic-ai/sdk'
import type { ILogger } from '@resource-guide/logger'
import { BackendUnavailableError, MalformedResponseError, isAbortError, upstreamStatus } from './errors'
import type { CallOptions } from './types'

export const NO_VALID_RESPONSE = 'No valid response received from generative backend'

/**
 * Hosted generative-language endpoint: ordered text segments in, the first
 * text block of the first completion out.
 */
export interface GenerativeBackend {
  generate(segments: string[], options?: CallOptions): Promise<string>
}

/**
 * Subset of the Anthropic client the backend calls
 */
export interface MessagesClient {
  messages: {
    create(
      body: {
        model: string
        max_tokens: number
        messages: Array<{ role: 'user'; content: Array<{ type: 'text'; text: string }> }>
      },
      options?: { signal?: AbortSignal }
    ): Promise<{ content: Array<{ type: string; text?: string }> }>
  }
}

export interface AnthropicBackendOptions {
  model: string
  maxTokens: number
  logger: ILogger
}

export function createAnthropicClient(apiKey: string): Anthropic {
  return new Anthropic({ apiKey, maxRetries: 0 })
}

export class AnthropicBackend implements GenerativeBackend {
  constructor(
    private readonly client: MessagesClient,
    private readonly options: AnthropicBackendOptions
  ) {}

  async generate(segments: string[], options: CallOptions = {}): Promise<string> {
    const { model, maxTokens, logger } = this.options
    const started = Date.now()

    let response: Awaited<ReturnType<MessagesClient['messages']['create']>>
    try {
      response = await this.client.messages.create(
        {
          model,
          max_tokens: maxTokens,
          messages: [
            {
              role: 'user',
              content: segments.map(text => ({ type: 'text' as const, text })),
            },
          ],
        },
        { signal: options.signal }
      )
    } catch (error) {
      if (isAbortError(error, options.signal)) throw error

      const status = upstreamStatus(error)
      const message = error instanceof Error ? error.message : String(error)
      logger.warn('Generative backend call failed', { model, status }, error)
      throw new BackendUnavailableError('generative backend', message, status, { cause: error })
    }

    const block = response.content.find(candidate => candidate.type === 'text')
    const text = block?.text
    if (text === undefined || text.trim().length === 0) {
      throw new MalformedResponseError(NO_VALID_RESPONSE)
    }

    logger.debug('Generative backend answered', { model, durationMs: Date.now() - started })
    return text
  }
}
