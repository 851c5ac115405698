import { Router, type Request, type Response } from 'express'
import { z } from 'zod'
import type { QueryOrchestrator } from '../services/assistant'
import type { CatalogService } from '../services/catalog/catalog-service'
import type { AnalyticsService } from '../services/analytics/analytics-service'
import { startDeadline } from '../lib/deadline'
import { loggers } from '../config/logger'
import { toRankedResource } from './serialize'

const log = loggers.search

export interface SearchRouterDeps {
  orchestrator: Pick<QueryOrchestrator, 'findResources'>
  catalog: Pick<CatalogService, 'status'>
  analytics: Pick<AnalyticsService, 'record'>
  defaultLimit: number
  requestTimeoutMs: number
}

/**
 * Ranked catalog search without answer synthesis
 * POST /api/search
 */
export function createSearchRouter({
  orchestrator,
  catalog,
  analytics,
  defaultLimit,
  requestTimeoutMs,
}: SearchRouterDeps): Router {
  const router = Router()

  const searchSchema = z.object({
    query: z.string().trim().min(1).max(500),
    limit: z.number().int().min(1).max(20).default(defaultLimit),
  })

  router.post('/', async (req: Request, res: Response) => {
    const deadline = startDeadline(res, requestTimeoutMs)
    const startTime = Date.now()
    let query: string | undefined

    try {
      const params = searchSchema.parse(req.body)
      query = params.query
      log.debug('Search request', { query, limit: params.limit })

      const results = await orchestrator.findResources(query, params.limit, { signal: deadline.signal })

      await analytics.record({
        query,
        resultsCount: results.length,
        searchType: 'search',
        responseTimeMs: Date.now() - startTime,
        succeeded: true,
      })

      res.json({
        query,
        results: results.map(toRankedResource),
        count: results.length,
      })
    } catch (error) {
      if (error instanceof z.ZodError) {
        res.status(400).json({ error: 'Invalid request parameters', details: error.issues })
        return
      }

      if (query !== undefined) {
        await analytics.record({
          query,
          resultsCount: 0,
          searchType: 'search',
          responseTimeMs: Date.now() - startTime,
          succeeded: false,
        })
      }

      if (deadline.timedOut()) {
        res.status(504).json({ error: 'REQUEST_TIMEOUT', message: `No results within ${requestTimeoutMs}ms` })
        return
      }

      if (deadline.signal.aborted) return

      log.error('Search failed', {}, error)
      res.status(500).json({ error: 'Search failed' })
    } finally {
      deadline.dispose()
    }
  })

  /**
   * Catalog embedding readiness
   * GET /api/search/status
   */
  router.get('/status', async (_req: Request, res: Response) => {
    try {
      res.json(await catalog.status())
    } catch (error) {
      log.error('Status check failed', {}, error)
      res.status(500).json({ error: 'Status check failed' })
    }
  })

  return router
}
