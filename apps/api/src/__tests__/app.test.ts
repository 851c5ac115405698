/**
 * HTTP surface tests
 *
 * Drives the Express app through supertest with fake services, so no
 * database or model backend is involved.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest'
import request from 'supertest'
import type { Express } from 'express'
import { createApp } from '../app'
import { BackendUnavailableError } from '../services/assistant/errors'
import type { QueryOrchestrator } from '../services/assistant/query-orchestrator'
import type { CatalogService } from '../services/catalog/catalog-service'
import type { AnalyticsService } from '../services/analytics/analytics-service'
import { scored } from './helpers/fakes'

const REC = scored('rec', 0.91, {
  title: 'Recreation Center',
  description: 'Weights and pool',
  category: 'Fitness',
  url: 'https://resources.example.edu/rec',
  embedding: [0.6, 0.8],
})

const REC_RESOURCE = {
  id: 'rec',
  title: 'Recreation Center',
  description: 'Weights and pool',
  category: 'Fitness',
  url: 'https://resources.example.edu/rec',
  hasEmbedding: true,
}

function createFakes() {
  return {
    orchestrator: {
      answer: vi.fn<QueryOrchestrator['answer']>(),
      findResources: vi.fn<QueryOrchestrator['findResources']>(async () => []),
    },
    catalog: {
      list: vi.fn<CatalogService['list']>(async () => []),
      get: vi.fn<CatalogService['get']>(async () => null),
      create: vi.fn<CatalogService['create']>(async () => REC_RESOURCE),
      update: vi.fn<CatalogService['update']>(async () => null),
      remove: vi.fn<CatalogService['remove']>(async () => false),
      status: vi.fn<CatalogService['status']>(),
      createBatch: vi.fn<CatalogService['createBatch']>(),
      importCollection: vi.fn<CatalogService['importCollection']>(),
    },
    analytics: {
      record: vi.fn<AnalyticsService['record']>(async () => undefined),
      searchStats: vi.fn<AnalyticsService['searchStats']>(),
      overview: vi.fn<AnalyticsService['overview']>(),
    },
  }
}

describe('API', () => {
  let fakes: ReturnType<typeof createFakes>
  let app: Express

  beforeEach(() => {
    fakes = createFakes()
    app = createApp({
      ...fakes,
      settings: {
        env: 'test',
        frontendUrl: 'https://guide.example.edu',
        requestTimeoutMs: 50,
        searchResultLimit: 3,
      },
    })
  })

  describe('GET /health', () => {
    it('reports ok', async () => {
      const res = await request(app).get('/health')

      expect(res.status).toBe(200)
      expect(res.body.status).toBe('ok')
      expect(typeof res.body.timestamp).toBe('string')
    })

    it('echoes an incoming request id', async () => {
      const res = await request(app).get('/health').set('X-Request-ID', 'req-123')
      expect(res.headers['x-request-id']).toBe('req-123')
    })

    it('generates a request id when none is sent', async () => {
      const res = await request(app).get('/health')
      expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/)
    })
  })

  describe('CORS', () => {
    it('allows the configured frontend origin', async () => {
      const res = await request(app).get('/health').set('Origin', 'https://guide.example.edu')
      expect(res.headers['access-control-allow-origin']).toBe('https://guide.example.edu')
    })

    it('rejects unknown origins', async () => {
      const res = await request(app).get('/health').set('Origin', 'https://elsewhere.example.com')
      expect(res.status).toBe(500)
      expect(res.body.error).toBe('Something went wrong!')
    })
  })

  describe('POST /api/ask', () => {
    it('returns the answer with ranked resources', async () => {
      fakes.orchestrator.answer.mockResolvedValue({
        text: 'Try the Recreation Center.',
        intent: { kind: 'search', searchPhrase: 'gym', draftMessage: 'Looking.' },
        resources: [REC],
        processingTimeMs: 12,
      })

      const res = await request(app).post('/api/ask').send({ query: '  where is the gym?  ' })

      expect(res.status).toBe(200)
      expect(res.body).toEqual({
        text: 'Try the Recreation Center.',
        intent: { kind: 'search', searchPhrase: 'gym', draftMessage: 'Looking.' },
        resources: [
          {
            id: 'rec',
            title: 'Recreation Center',
            description: 'Weights and pool',
            category: 'Fitness',
            url: 'https://resources.example.edu/rec',
            score: 0.91,
          },
        ],
        processingTimeMs: 12,
      })
      expect(fakes.orchestrator.answer).toHaveBeenCalledWith('where is the gym?', {
        signal: expect.any(AbortSignal),
      })
      expect(fakes.analytics.record).toHaveBeenCalledWith({
        query: 'where is the gym?',
        resultsCount: 1,
        searchType: 'ask',
        responseTimeMs: 12,
        succeeded: true,
      })
    })

    it('logs a failed question with no results', async () => {
      fakes.orchestrator.answer.mockRejectedValue(new Error('boom'))

      await request(app).post('/api/ask').send({ query: 'gym hours' })

      expect(fakes.analytics.record).toHaveBeenCalledTimes(1)
      expect(fakes.analytics.record).toHaveBeenCalledWith({
        query: 'gym hours',
        resultsCount: 0,
        searchType: 'ask',
        responseTimeMs: expect.any(Number),
        succeeded: false,
      })
    })

    it('rejects a missing or blank query', async () => {
      const missing = await request(app).post('/api/ask').send({})
      const blank = await request(app).post('/api/ask').send({ query: '   ' })

      expect(missing.status).toBe(400)
      expect(missing.body.error).toBe('Invalid request parameters')
      expect(blank.status).toBe(400)
      expect(fakes.orchestrator.answer).not.toHaveBeenCalled()
      expect(fakes.analytics.record).not.toHaveBeenCalled()
    })

    it('maps a classification failure to 502', async () => {
      fakes.orchestrator.answer.mockRejectedValue(new BackendUnavailableError('generative backend', 'Overloaded', 529))

      const res = await request(app).post('/api/ask').send({ query: 'gym hours' })

      expect(res.status).toBe(502)
      expect(res.body).toEqual({
        error: 'BACKEND_UNAVAILABLE',
        message: 'generative backend unavailable: Overloaded',
      })
    })

    it('answers 504 when the deadline passes', async () => {
      fakes.orchestrator.answer.mockImplementation(
        (_query, options) =>
          new Promise((_resolve, reject) => {
            options?.signal?.addEventListener('abort', () => reject(options.signal?.reason))
          })
      )

      const res = await request(app).post('/api/ask').send({ query: 'gym hours' })

      expect(res.status).toBe(504)
      expect(res.body).toEqual({ error: 'REQUEST_TIMEOUT', message: 'No answer within 50ms' })
    })

    it('hides unexpected failures', async () => {
      fakes.orchestrator.answer.mockRejectedValue(new Error('undefined is not a function'))

      const res = await request(app).post('/api/ask').send({ query: 'gym hours' })

      expect(res.status).toBe(500)
      expect(res.body).toEqual({ error: 'Ask failed' })
    })
  })

  describe('POST /api/search', () => {
    it('returns ranked resources using the default limit', async () => {
      fakes.orchestrator.findResources.mockResolvedValue([REC])

      const res = await request(app).post('/api/search').send({ query: 'gym' })

      expect(res.status).toBe(200)
      expect(res.body.query).toBe('gym')
      expect(res.body.count).toBe(1)
      expect(res.body.results[0]).toEqual({
        id: 'rec',
        title: 'Recreation Center',
        description: 'Weights and pool',
        category: 'Fitness',
        url: 'https://resources.example.edu/rec',
        score: 0.91,
      })
      expect(fakes.orchestrator.findResources).toHaveBeenCalledWith('gym', 3, { signal: expect.any(AbortSignal) })
      expect(fakes.analytics.record).toHaveBeenCalledWith({
        query: 'gym',
        resultsCount: 1,
        searchType: 'search',
        responseTimeMs: expect.any(Number),
        succeeded: true,
      })
    })

    it('accepts an explicit limit', async () => {
      await request(app).post('/api/search').send({ query: 'gym', limit: 5 })
      expect(fakes.orchestrator.findResources).toHaveBeenCalledWith('gym', 5, expect.anything())
    })

    it('rejects an out-of-range limit', async () => {
      const res = await request(app).post('/api/search').send({ query: 'gym', limit: 50 })
      expect(res.status).toBe(400)
    })
  })

  describe('GET /api/search/status', () => {
    it('returns catalog readiness', async () => {
      const readiness = {
        totalDocuments: 12,
        documentsWithEmbeddings: 10,
        ready: true,
        message: '10 of 12 resources are searchable',
      }
      fakes.catalog.status.mockResolvedValue(readiness)

      const res = await request(app).get('/api/search/status')

      expect(res.status).toBe(200)
      expect(res.body).toEqual(readiness)
    })

    it('reports a failed status check', async () => {
      fakes.catalog.status.mockRejectedValue(new Error('connection refused'))

      const res = await request(app).get('/api/search/status')

      expect(res.status).toBe(500)
      expect(res.body).toEqual({ error: 'Status check failed' })
    })
  })

  describe('GET /api/ask/stats/overview', () => {
    it('returns question totals', async () => {
      const overview = { totalQuestions: 8, totalSearches: 11, averageResponseTimeMs: 120.5, recentQuestions24h: 2 }
      fakes.analytics.overview.mockResolvedValue(overview)

      const res = await request(app).get('/api/ask/stats/overview')

      expect(res.status).toBe(200)
      expect(res.body).toEqual(overview)
    })

    it('reports a failed lookup', async () => {
      fakes.analytics.overview.mockRejectedValue(new Error('connection refused'))

      const res = await request(app).get('/api/ask/stats/overview')

      expect(res.status).toBe(500)
      expect(res.body).toEqual({ error: 'Failed to load question stats' })
    })
  })

  describe('GET /api/analytics/search-stats', () => {
    const stats = {
      periodDays: 30,
      totalSearches: 4,
      averageResponseTimeMs: 210,
      searchTypes: [{ type: 'ask', count: 4 }],
      topQueries: [{ query: 'library', count: 3 }],
    }

    it('returns stats for the requested window', async () => {
      fakes.analytics.searchStats.mockResolvedValue(stats)

      const res = await request(app).get('/api/analytics/search-stats?days=30')

      expect(res.status).toBe(200)
      expect(res.body).toEqual(stats)
      expect(fakes.analytics.searchStats).toHaveBeenCalledWith(30)
    })

    it('defaults to the last seven days', async () => {
      fakes.analytics.searchStats.mockResolvedValue({ ...stats, periodDays: 7 })

      await request(app).get('/api/analytics/search-stats')

      expect(fakes.analytics.searchStats).toHaveBeenCalledWith(7)
    })

    it('rejects a non-numeric window', async () => {
      const res = await request(app).get('/api/analytics/search-stats?days=week')

      expect(res.status).toBe(400)
      expect(fakes.analytics.searchStats).not.toHaveBeenCalled()
    })
  })

  describe('/api/resources', () => {
    it('lists resources', async () => {
      fakes.catalog.list.mockResolvedValue([REC_RESOURCE])

      const res = await request(app).get('/api/resources')

      expect(res.body).toEqual({ resources: [REC_RESOURCE], count: 1 })
      expect(fakes.catalog.list).toHaveBeenCalledWith({ skip: 0, limit: 100 })
    })

    it('passes category and paging filters through', async () => {
      await request(app).get('/api/resources?category=Fitness&skip=20&limit=10')

      expect(fakes.catalog.list).toHaveBeenCalledWith({ category: 'Fitness', skip: 20, limit: 10 })
    })

    it('rejects a negative skip', async () => {
      const res = await request(app).get('/api/resources?skip=-1')
      expect(res.status).toBe(400)
    })

    it('creates a batch and reports per-item errors', async () => {
      const result = {
        createdCount: 1,
        totalCount: 2,
        resources: [REC_RESOURCE],
        errors: ['Resource 2: duplicate key value violates unique constraint'],
      }
      fakes.catalog.createBatch.mockResolvedValue(result)

      const res = await request(app)
        .post('/api/resources/batch')
        .send({
          resources: [
            { title: 'Recreation Center', url: 'https://resources.example.edu/rec' },
            { title: 'Recreation Center', url: 'https://resources.example.edu/rec' },
          ],
        })

      expect(res.status).toBe(201)
      expect(res.body).toEqual(result)
      expect(fakes.catalog.createBatch).toHaveBeenCalledWith([
        { title: 'Recreation Center', url: 'https://resources.example.edu/rec' },
        { title: 'Recreation Center', url: 'https://resources.example.edu/rec' },
      ])
    })

    it('rejects an empty batch', async () => {
      const res = await request(app).post('/api/resources/batch').send({ resources: [] })

      expect(res.status).toBe(400)
      expect(fakes.catalog.createBatch).not.toHaveBeenCalled()
    })

    it('imports a category-keyed collection', async () => {
      const result = {
        totalProcessed: 1,
        totalCategories: 1,
        successful: 1,
        failed: 0,
        details: [{ category: 'Fitness', processed: 1, successful: 1, failed: 0, errors: [] }],
      }
      fakes.catalog.importCollection.mockResolvedValue(result)
      const body = { Fitness: [{ title: 'Recreation Center', text: 'Weights', url: 'https://resources.example.edu/rec' }] }

      const res = await request(app).post('/api/resources/import').send(body)

      expect(res.status).toBe(200)
      expect(res.body).toEqual({ message: 'Resources imported', ...result })
      expect(fakes.catalog.importCollection).toHaveBeenCalledWith(body)
    })

    it('rejects an import that is not an object', async () => {
      const res = await request(app).post('/api/resources/import').send([{ title: 'x' }])

      expect(res.status).toBe(400)
      expect(fakes.catalog.importCollection).not.toHaveBeenCalled()
    })

    it('returns 404 for an unknown resource', async () => {
      const res = await request(app).get('/api/resources/missing')

      expect(res.status).toBe(404)
      expect(res.body).toEqual({ error: 'Resource not found' })
    })

    it('creates a resource', async () => {
      const res = await request(app).post('/api/resources').send({
        title: 'Recreation Center',
        description: 'Weights and pool',
        category: 'Fitness',
        url: 'https://resources.example.edu/rec',
      })

      expect(res.status).toBe(201)
      expect(res.body).toEqual(REC_RESOURCE)
      expect(fakes.catalog.create).toHaveBeenCalledWith({
        title: 'Recreation Center',
        description: 'Weights and pool',
        category: 'Fitness',
        url: 'https://resources.example.edu/rec',
      })
    })

    it('validates new resources', async () => {
      const res = await request(app).post('/api/resources').send({ title: 'No link', url: 'not a url' })

      expect(res.status).toBe(400)
      expect(fakes.catalog.create).not.toHaveBeenCalled()
    })

    it('updates a resource', async () => {
      fakes.catalog.update.mockResolvedValue({ ...REC_RESOURCE, description: 'Now with sauna' })

      const res = await request(app).put('/api/resources/rec').send({ description: 'Now with sauna' })

      expect(res.status).toBe(200)
      expect(res.body.description).toBe('Now with sauna')
      expect(fakes.catalog.update).toHaveBeenCalledWith('rec', { description: 'Now with sauna' })
    })

    it('rejects an empty update', async () => {
      const res = await request(app).put('/api/resources/rec').send({})
      expect(res.status).toBe(400)
    })

    it('returns 404 when updating an unknown resource', async () => {
      const res = await request(app).put('/api/resources/missing').send({ title: 'x' })
      expect(res.status).toBe(404)
    })

    it('deletes a resource', async () => {
      fakes.catalog.remove.mockResolvedValue(true)

      const res = await request(app).delete('/api/resources/rec')

      expect(res.status).toBe(204)
      expect(fakes.catalog.remove).toHaveBeenCalledWith('rec')
    })

    it('returns 404 when deleting an unknown resource', async () => {
      const res = await request(app).delete('/api/resources/missing')
      expect(res.status).toBe(404)
    })
  })

  it('answers malformed JSON with 400', async () => {
    const res = await request(app)
      .post('/api/ask')
      .set('Content-Type', 'application/json')
      .send('{"query": ')

    expect(res.status).toBe(400)
  })
})
