import type { Response } from 'express'

export class RequestTimeoutError extends Error {
  readonly code = 'REQUEST_TIMEOUT'

  constructor(public readonly timeoutMs: number) {
    super(`Request exceeded ${timeoutMs}ms`)
    this.name = 'RequestTimeoutError'
  }
}

export interface Deadline {
  signal: AbortSignal
  /** True once the deadline, rather than the client, aborted the request */
  timedOut(): boolean
  dispose(): void
}

/**
 * Abort signal for one request: fires after `timeoutMs` with a
 * RequestTimeoutError, or when the client goes away before the response is
 * written.
 */
export function startDeadline(res: Response, timeoutMs: number): Deadline {
  const controller = new AbortController()

  const timer = setTimeout(() => {
    controller.abort(new RequestTimeoutError(timeoutMs))
  }, timeoutMs)

  const onClose = () => {
    if (!res.writableFinished) {
      controller.abort()
    }
  }
  res.on('close', onClose)

  return {
    signal: controller.signal,
    timedOut: () => controller.signal.reason instanceof RequestTimeoutError,
    dispose: () => {
      clearTimeout(timer)
      res.off('close', onClose)
    },
  }
}
