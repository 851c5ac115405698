import type { Request, Response, NextFunction } from 'express'
import { loggers } from '../config/logger'

const log = loggers.server

/**
 * Log each request once, when the response finishes.
 */
export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  const started = Date.now()

  res.on('finish', () => {
    const meta = {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - started,
    }

    if (res.statusCode >= 500) {
      log.error('Request failed', meta)
    } else if (res.statusCode >= 400) {
      log.warn('Request rejected', meta)
    } else {
      log.info('Request completed', meta)
    }
  })

  next()
}

/**
 * Log errors that reach Express before the final handler responds.
 */
export function errorLoggerMiddleware(err: unknown, req: Request, _res: Response, next: NextFunction): void {
  log.error('Unhandled error', { method: req.method, path: req.originalUrl }, err)
  next(err)
}
