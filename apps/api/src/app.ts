/**
 * Express App Configuration (without server startup)
 *
 * `createApp` builds the configured Express app from already-constructed
 * services, for use in:
 * - Route tests (via supertest, with fake services)
 * - index.ts (actual server startup)
 *
 * The server.listen() call is in index.ts, not here.
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import type { QueryOrchestrator } from './services/assistant'
import type { CatalogService } from './services/catalog/catalog-service'
import type { AnalyticsService } from './services/analytics/analytics-service'
import { requestContextMiddleware } from './middleware/request-context'
import { requestLoggerMiddleware, errorLoggerMiddleware } from './middleware/request-logger'
import { createAskRouter } from './routes/ask'
import { createSearchRouter } from './routes/search'
import { createResourcesRouter } from './routes/resources'
import { createAnalyticsRouter } from './routes/analytics'

export interface AppDeps {
  orchestrator: Pick<QueryOrchestrator, 'answer' | 'findResources'>
  catalog: Pick<
    CatalogService,
    'list' | 'get' | 'create' | 'update' | 'remove' | 'status' | 'createBatch' | 'importCollection'
  >
  analytics: Pick<AnalyticsService, 'record' | 'searchStats' | 'overview'>
  settings: {
    env: 'development' | 'production' | 'test'
    frontendUrl?: string
    requestTimeoutMs: number
    searchResultLimit: number
  }
}

const DEFAULT_ALLOWED_ORIGINS = ['http://localhost:3000', 'http://localhost:5173']

function errorStatus(err: unknown): number {
  if (typeof err === 'object' && err !== null) {
    if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode
    if ('status' in err && typeof err.status === 'number') return err.status
  }
  return 500
}

export function createApp({ orchestrator, catalog, analytics, settings }: AppDeps): Express {
  const app = express()

  app.use(helmet())

  // Request context middleware - provides requestId correlation for logging
  // Must be early in the chain to capture all request processing
  app.use(requestContextMiddleware)

  // One log entry per request at response finish
  app.use(requestLoggerMiddleware)

  const allowedOrigins = [...DEFAULT_ALLOWED_ORIGINS, settings.frontendUrl].filter(
    (origin): origin is string => Boolean(origin)
  )

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (like curl requests)
      if (!origin) return callback(null, true)

      if (allowedOrigins.includes(origin)) {
        callback(null, true)
      } else {
        callback(new Error('Not allowed by CORS'))
      }
    },
    credentials: true,
  }))

  // Bulk imports carry the whole collection in one body
  app.use(express.json({ limit: '1mb' }))

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() })
  })

  app.use('/api/ask', createAskRouter({ orchestrator, analytics, requestTimeoutMs: settings.requestTimeoutMs }))
  app.use('/api/search', createSearchRouter({
    orchestrator,
    catalog,
    analytics,
    defaultLimit: settings.searchResultLimit,
    requestTimeoutMs: settings.requestTimeoutMs,
  }))
  app.use('/api/resources', createResourcesRouter(catalog))
  app.use('/api/analytics', createAnalyticsRouter(analytics))

  app.use(errorLoggerMiddleware)

  // Final error handler - sends response to client
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const statusCode = errorStatus(err)
    const message = err instanceof Error ? err.message : 'Unknown error'
    res.status(statusCode).json({
      error: statusCode >= 500 ? 'Something went wrong!' : message,
      ...(settings.env !== 'production' && err instanceof Error && { stack: err.stack }),
    })
  })

  return app
}
