/**
 * CatalogRepository Tests
 *
 * Runs against an in-process stand-in for pg, asserting on the SQL the
 * repository issues and on how rows are mapped back to catalog entries.
 */

import { describe, it, expect } from 'vitest'
import { CatalogRepository } from '../catalog-repository'
import { FakeDb } from './helpers/fake-db'

const OPTIONS = { table: 'catalog_entries', vectorColumn: 'embedding' }

function row(overrides: Record<string, unknown> = {}) {
  return {
    id: 'res-1',
    title: 'Main Library',
    description: 'Quiet study floors',
    category: 'Academic',
    url: 'https://example.edu/library',
    embedding: '[0.6,0.8]',
    ...overrides,
  }
}

describe('CatalogRepository', () => {
  it('rejects unsafe table names', () => {
    expect(() => new CatalogRepository(new FakeDb(), { table: 'x; DROP', vectorColumn: 'embedding' })).toThrow(
      'Invalid SQL identifier'
    )
  })

  describe('findAll', () => {
    it('maps rows to entries and parses stored embeddings', async () => {
      const db = new FakeDb(() => ({ rows: [row(), row({ id: 'res-2', description: null, embedding: null })] }))
      const repo = new CatalogRepository(db, OPTIONS)

      const entries = await repo.findAll()

      expect(entries).toEqual([
        {
          id: 'res-1',
          title: 'Main Library',
          description: 'Quiet study floors',
          category: 'Academic',
          url: 'https://example.edu/library',
          embedding: [0.6, 0.8],
        },
        {
          id: 'res-2',
          title: 'Main Library',
          description: '',
          category: 'Academic',
          url: 'https://example.edu/library',
          embedding: [],
        },
      ])
      expect(db.statements()[0]).toBe(
        'SELECT id, title, description, category, url, "embedding"::text AS embedding FROM "catalog_entries" ORDER BY title'
      )
    })
  })

  describe('findPage', () => {
    it('filters by category and pages with limit and offset', async () => {
      const db = new FakeDb(() => ({ rows: [row()] }))
      const repo = new CatalogRepository(db, OPTIONS)

      const entries = await repo.findPage({ category: 'Academic', offset: 20, limit: 10 })

      expect(entries.map(e => e.id)).toEqual(['res-1'])
      expect(db.statements()[0]).toBe(
        'SELECT id, title, description, category, url, "embedding"::text AS embedding FROM "catalog_entries" WHERE category = $1 ORDER BY title, id LIMIT $2 OFFSET $3'
      )
      expect(db.calls[0]?.values).toEqual(['Academic', 10, 20])
    })

    it('omits the filter when no category is given', async () => {
      const db = new FakeDb(() => ({ rows: [] }))
      const repo = new CatalogRepository(db, OPTIONS)

      await repo.findPage({ offset: 0, limit: 100 })

      expect(db.statements()[0]).toBe(
        'SELECT id, title, description, category, url, "embedding"::text AS embedding FROM "catalog_entries" ORDER BY title, id LIMIT $1 OFFSET $2'
      )
      expect(db.calls[0]?.values).toEqual([100, 0])
    })
  })

  describe('findById', () => {
    it('returns null when no row matches', async () => {
      const repo = new CatalogRepository(new FakeDb(() => ({ rows: [] })), OPTIONS)
      expect(await repo.findById('missing')).toBeNull()
    })
  })

  describe('insert', () => {
    it('writes the embedding as a vector literal and a generated id', async () => {
      const db = new FakeDb(() => ({ rows: [row()] }))
      const repo = new CatalogRepository(db, OPTIONS)

      const created = await repo.insert({
        title: 'Main Library',
        description: 'Quiet study floors',
        category: 'Academic',
        url: 'https://example.edu/library',
        embedding: [0.6, 0.8],
      })

      const values = db.calls[0]?.values ?? []
      expect(typeof values[0]).toBe('string')
      expect(values.slice(1)).toEqual([
        'Main Library',
        'Quiet study floors',
        'Academic',
        'https://example.edu/library',
        '[0.6,0.8]',
      ])
      expect(created.id).toBe('res-1')
    })

    it('stores NULL when the entry has no embedding', async () => {
      const db = new FakeDb(() => ({ rows: [row({ embedding: null })] }))
      const repo = new CatalogRepository(db, OPTIONS)

      await repo.insert({ title: 'Gym', description: '', category: '', url: 'https://example.edu/gym', embedding: [] })

      expect(db.calls[0]?.values?.[5]).toBeNull()
    })
  })

  describe('delete', () => {
    it('reports whether a row was removed', async () => {
      const removed = new CatalogRepository(new FakeDb(() => ({ rowCount: 1 })), OPTIONS)
      const missing = new CatalogRepository(new FakeDb(() => ({ rowCount: 0 })), OPTIONS)

      expect(await removed.delete('res-1')).toBe(true)
      expect(await missing.delete('res-9')).toBe(false)
    })
  })

  describe('countStatus', () => {
    it('converts bigint counts to numbers', async () => {
      const db = new FakeDb(() => ({ rows: [{ total: '12', with_embeddings: '9' }] }))
      const repo = new CatalogRepository(db, OPTIONS)

      expect(await repo.countStatus()).toEqual({ totalDocuments: 12, documentsWithEmbeddings: 9 })
    })
  })

  describe('nearestNeighbours', () => {
    it('scopes ef_search to a transaction and maps similarity', async () => {
      const db = new FakeDb(text =>
        text.includes('<=>') ? { rows: [row({ similarity: '0.91' })] } : {}
      )
      const repo = new CatalogRepository(db, OPTIONS)

      const matches = await repo.nearestNeighbours([1, 0], { limit: 3, candidates: 100 })

      const statements = db.statements()
      expect(statements[0]).toBe('BEGIN')
      expect(statements[1]).toBe('SET LOCAL hnsw.ef_search = 100')
      expect(statements[2]).toContain('1 - ("embedding" <=> $1::vector) AS similarity')
      expect(statements[2]).toContain('ORDER BY "embedding" <=> $1::vector LIMIT $2')
      expect(statements[3]).toBe('COMMIT')
      expect(db.calls[2]?.values).toEqual(['[1,0]', 3])
      expect(db.released).toBe(1)

      expect(matches).toHaveLength(1)
      expect(matches[0]?.similarity).toBe(0.91)
      expect(matches[0]?.entry.title).toBe('Main Library')
    })

    it('rolls back, releases the client and rethrows on failure', async () => {
      const db = new FakeDb(text =>
        text.includes('<=>') ? new Error('relation "catalog_entries" does not exist') : {}
      )
      const repo = new CatalogRepository(db, OPTIONS)

      await expect(repo.nearestNeighbours([1, 0], { limit: 3, candidates: 100 })).rejects.toThrow(
        'relation "catalog_entries" does not exist'
      )
      expect(db.statements()).toContain('ROLLBACK')
      expect(db.released).toBe(1)
    })
  })
})
