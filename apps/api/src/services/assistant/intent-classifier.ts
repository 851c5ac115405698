/**
 * Intent Classifier
 *
 * Asks the generative backend whether a query needs catalog retrieval and
 * parses its JSON verdict into an Intent. Backend failures propagate; an
 * unparseable verdict degrades to casual conversation carrying the raw reply.
 */

import { z } from 'zod'
import type { ILogger } from '@resource-guide/logger'
import type { GenerativeBackend } from './generative-backend'
import type { CallOptions, Intent } from './types'

export const CLASSIFIER_INSTRUCTION = `You are a campus resource assistant that helps students, faculty, and staff find resources and information in the organization's resource catalog.

When the user wants to find resources, services, facilities, departments, schedules, or anything else the catalog could answer, reply with a JSON object in exactly this format:
{
  "isSearching": true,
  "searchQuery": "...",
  "userMessage": "..."
}

When the user is just chatting or asking a general question, reply with:
{
  "isSearching": false,
  "userMessage": "..."
}

"searchQuery" is a short keyword phrase for the catalog search.
"userMessage" is your reply to the user. Keep it helpful and focused on campus resources.
If the user is searching, say that you'll help them find the relevant information.

Do not include any text outside the JSON object.`

const ClassifierReplySchema = z.record(z.unknown())

const optionalText = (value: unknown): string => (typeof value === 'string' ? value : '')

/**
 * Remove every markdown code fence marker and surrounding whitespace.
 */
export function stripCodeFences(reply: string): string {
  return reply.replaceAll('```json', '').replaceAll('```', '').trim()
}

/**
 * Map a backend reply to an Intent. Never throws.
 */
export function parseClassifierReply(reply: string): Intent {
  let parsed: unknown
  try {
    parsed = JSON.parse(stripCodeFences(reply))
  } catch {
    return { kind: 'casual', message: reply }
  }

  const result = ClassifierReplySchema.safeParse(parsed)
  if (!result.success) {
    return { kind: 'casual', message: reply }
  }

  const fields = result.data
  if (fields.isSearching === true) {
    return {
      kind: 'search',
      searchPhrase: optionalText(fields.searchQuery),
      draftMessage: optionalText(fields.userMessage),
    }
  }

  return {
    kind: 'casual',
    message: typeof fields.userMessage === 'string' ? fields.userMessage : reply,
  }
}

export class IntentClassifier {
  constructor(
    private readonly backend: GenerativeBackend,
    private readonly log: ILogger
  ) {}

  async classify(userText: string, options: CallOptions = {}): Promise<Intent> {
    const reply = await this.backend.generate([CLASSIFIER_INSTRUCTION, `User query: ${userText}`], options)
    const intent = parseClassifierReply(reply)

    this.log.debug('Query classified', {
      kind: intent.kind,
      searchPhrase: intent.kind === 'search' ? intent.searchPhrase : undefined,
    })

    return intent
  }
}
