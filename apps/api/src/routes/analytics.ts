import { Router, type Request, type Response } from 'express'
import { z } from 'zod'
import type { AnalyticsService } from '../services/analytics/analytics-service'
import { loggers } from '../config/logger'

const log = loggers.analytics

const searchStatsQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(7),
})

/**
 * Usage analytics
 * /api/analytics
 */
export function createAnalyticsRouter(analytics: Pick<AnalyticsService, 'searchStats'>): Router {
  const router = Router()

  /**
   * GET /api/analytics/search-stats?days=7
   */
  router.get('/search-stats', async (req: Request, res: Response) => {
    try {
      const { days } = searchStatsQuerySchema.parse(req.query)
      res.json(await analytics.searchStats(days))
    } catch (error) {
      if (error instanceof z.ZodError) {
        res.status(400).json({ error: 'Invalid request parameters', details: error.issues })
        return
      }
      log.error('Failed to load search stats', {}, error)
      res.status(500).json({ error: 'Failed to load search stats' })
    }
  })

  return router
}
