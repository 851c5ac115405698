// ============================================================================
// Assistant error taxonomy
// ============================================================================

export type AssistantErrorCode = 'BACKEND_UNAVAILABLE' | 'MALFORMED_RESPONSE' | 'EMPTY_RESULT'

export abstract class AssistantError extends Error {
  abstract readonly code: AssistantErrorCode

  /**
   * Convert to API error response format.
   */
  toApiError(): { error: string; message: string } {
    return {
      error: this.code,
      message: this.message,
    }
  }
}

/**
 * A generative or index backend could not be reached or answered with a
 * non-success status.
 */
export class BackendUnavailableError extends AssistantError {
  readonly code = 'BACKEND_UNAVAILABLE'

  constructor(
    public readonly backend: string,
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(`${backend} unavailable: ${message}`, options)
    this.name = 'BackendUnavailableError'
  }
}

/**
 * A backend answered, but not with the shape the caller expects.
 */
export class MalformedResponseError extends AssistantError {
  readonly code = 'MALFORMED_RESPONSE'

  constructor(message: string) {
    super(message)
    this.name = 'MalformedResponseError'
  }
}

/**
 * A search or classification yielded no usable content.
 */
export class EmptyResultError extends AssistantError {
  readonly code = 'EMPTY_RESULT'

  constructor(message: string) {
    super(message)
    this.name = 'EmptyResultError'
  }
}

/**
 * True when the caller cancelled the request. Cancellation is never
 * absorbed by a fallback.
 */
export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError')
}

/**
 * HTTP status carried by an SDK error, if any.
 */
export function upstreamStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status
  }
  return undefined
}
