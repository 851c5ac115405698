import { Router, type Request, type Response } from 'express'
import { z } from 'zod'
import { AssistantError, type QueryOrchestrator } from '../services/assistant'
import type { AnalyticsService } from '../services/analytics/analytics-service'
import { startDeadline } from '../lib/deadline'
import { loggers } from '../config/logger'
import { toRankedResource } from './serialize'

const log = loggers.assistant

export const askSchema = z.object({
  query: z.string().trim().min(1).max(1000),
})

export interface AskRouterDeps {
  orchestrator: Pick<QueryOrchestrator, 'answer'>
  analytics: Pick<AnalyticsService, 'record' | 'overview'>
  requestTimeoutMs: number
}

/**
 * Answer a free-text question
 * POST /api/ask
 */
export function createAskRouter({ orchestrator, analytics, requestTimeoutMs }: AskRouterDeps): Router {
  const router = Router()

  router.post('/', async (req: Request, res: Response) => {
    const deadline = startDeadline(res, requestTimeoutMs)
    const startTime = Date.now()
    let query: string | undefined

    try {
      query = askSchema.parse(req.body).query
      const answer = await orchestrator.answer(query, { signal: deadline.signal })

      await analytics.record({
        query,
        resultsCount: answer.resources.length,
        searchType: 'ask',
        responseTimeMs: answer.processingTimeMs,
        succeeded: true,
      })

      res.json({
        text: answer.text,
        intent: answer.intent,
        resources: answer.resources.map(toRankedResource),
        processingTimeMs: answer.processingTimeMs,
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
          searchType: 'ask',
          responseTimeMs: Date.now() - startTime,
          succeeded: false,
        })
      }

      if (deadline.timedOut()) {
        log.warn('Ask request timed out', { timeoutMs: requestTimeoutMs })
        res.status(504).json({
          error: 'REQUEST_TIMEOUT',
          message: `No answer within ${requestTimeoutMs}ms`,
        })
        return
      }

      if (deadline.signal.aborted) {
        log.info('Ask request cancelled by client')
        return
      }

      if (error instanceof AssistantError) {
        log.error('Query classification failed', { code: error.code }, error)
        res.status(502).json(error.toApiError())
        return
      }

      log.error('Ask failed', {}, error)
      res.status(500).json({ error: 'Ask failed' })
    } finally {
      deadline.dispose()
    }
  })

  /**
   * Question and search totals
   * GET /api/ask/stats/overview
   */
  router.get('/stats/overview', async (_req: Request, res: Response) => {
    try {
      res.json(await analytics.overview())
    } catch (error) {
      log.error('Failed to load question stats', {}, error)
      res.status(500).json({ error: 'Failed to load question stats' })
    }
  })

  return router
}
