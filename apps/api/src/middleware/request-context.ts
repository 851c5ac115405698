/**
 * Request Context Middleware
 *
 * Provides request correlation via AsyncLocalStorage.
 * All log entries within a request will include the requestId.
 *
 * - X-Request-ID header is used if present
 * - Otherwise, a new UUID is generated
 * - The requestId is echoed in the response header
 */

import type { Request, Response, NextFunction } from 'express'
import { randomUUID } from 'crypto'
import { withRequestContext } from '@resource-guide/logger'

function incomingRequestId(req: Request): string | undefined {
  const header = req.headers['x-request-id']
  const value = Array.isArray(header) ? header[0] : header
  return value && value.trim().length > 0 ? value : undefined
}

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = incomingRequestId(req) ?? randomUUID()

  res.setHeader('X-Request-ID', requestId)

  withRequestContext({ requestId }, () => {
    next()
  })
}
