import { Router, type Request, type Response } from 'express'
import { z } from 'zod'
import type { CatalogService } from '../services/catalog/catalog-service'
import { loggers } from '../config/logger'

const log = loggers.catalog

const createResourceSchema = z.object({
  title: z.string().trim().min(1).max(300),
  description: z.string().max(5000).optional(),
  category: z.string().max(100).optional(),
  url: z.string().url(),
})

const updateResourceSchema = createResourceSchema
  .partial()
  .refine(patch => Object.keys(patch).length > 0, { message: 'At least one field is required' })

const idSchema = z.string().min(1).max(100)

const listQuerySchema = z.object({
  category: z.string().trim().min(1).max(100).optional(),
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(500).default(100),
})

const batchSchema = z.object({
  resources: z.array(createResourceSchema).min(1).max(100),
})

/** `{ "<category>": [{ title, text, url }, ...] }` */
const importSchema = z.record(z.string(), z.unknown())

export type ResourceCatalog = Pick<
  CatalogService,
  'list' | 'get' | 'create' | 'update' | 'remove' | 'createBatch' | 'importCollection'
>

function sendError(res: Response, error: unknown, action: string): void {
  if (error instanceof z.ZodError) {
    res.status(400).json({ error: 'Invalid request parameters', details: error.issues })
    return
  }
  log.error(`Failed to ${action} resource`, {}, error)
  res.status(500).json({ error: `Failed to ${action} resource` })
}

/**
 * Catalog ingestion
 * /api/resources
 */
export function createResourcesRouter(catalog: ResourceCatalog): Router {
  const router = Router()

  router.get('/', async (req: Request, res: Response) => {
    try {
      const query = listQuerySchema.parse(req.query)
      const resources = await catalog.list(query)
      res.json({ resources, count: resources.length })
    } catch (error) {
      sendError(res, error, 'list')
    }
  })

  /**
   * Create many resources; each item succeeds or fails on its own
   * POST /api/resources/batch
   */
  router.post('/batch', async (req: Request, res: Response) => {
    try {
      const { resources } = batchSchema.parse(req.body)
      res.status(201).json(await catalog.createBatch(resources))
    } catch (error) {
      sendError(res, error, 'create')
    }
  })

  /**
   * Bulk import of a category-keyed collection
   * POST /api/resources/import
   */
  router.post('/import', async (req: Request, res: Response) => {
    try {
      const result = await catalog.importCollection(importSchema.parse(req.body))
      res.json({ message: 'Resources imported', ...result })
    } catch (error) {
      sendError(res, error, 'import')
    }
  })

  router.get('/:id', async (req: Request, res: Response) => {
    try {
      const resource = await catalog.get(idSchema.parse(req.params.id))
      if (!resource) {
        res.status(404).json({ error: 'Resource not found' })
        return
      }
      res.json(resource)
    } catch (error) {
      sendError(res, error, 'load')
    }
  })

  router.post('/', async (req: Request, res: Response) => {
    try {
      const input = createResourceSchema.parse(req.body)
      const resource = await catalog.create(input)
      res.status(201).json(resource)
    } catch (error) {
      sendError(res, error, 'create')
    }
  })

  router.put('/:id', async (req: Request, res: Response) => {
    try {
      const id = idSchema.parse(req.params.id)
      const patch = updateResourceSchema.parse(req.body)
      const resource = await catalog.update(id, patch)
      if (!resource) {
        res.status(404).json({ error: 'Resource not found' })
        return
      }
      res.json(resource)
    } catch (error) {
      sendError(res, error, 'update')
    }
  })

  router.delete('/:id', async (req: Request, res: Response) => {
    try {
      const deleted = await catalog.remove(idSchema.parse(req.params.id))
      if (!deleted) {
        res.status(404).json({ error: 'Resource not found' })
        return
      }
      res.status(204).end()
    } catch (error) {
      sendError(res, error, 'delete')
    }
  })

  return router
}
