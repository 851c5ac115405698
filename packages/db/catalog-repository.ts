/**
 * Catalog Repository
 *
 * Read/write access to the resource catalog table. The table name and the
 * vector column come from configuration so the same code serves any
 * catalog/index pair:
 *
 *   id text primary key, title text, description text, category text,
 *   url text, <vector column> vector(384), created_at, updated_at
 */

import { randomUUID } from 'crypto'
import type { QueryResult, QueryResultRow } from 'pg'
import { parseVectorLiteral, quoteIdentifier, toVectorLiteral } from './vector'

/**
 * Anything that runs a parameterized query: a pg Pool, a PoolClient, or a
 * test stand-in.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>
}

export interface PooledQueryable extends Queryable {
  connect(): Promise<Queryable & { release(err?: Error | boolean): void }>
}

export interface CatalogEntry {
  id: string
  title: string
  description: string
  category: string
  url: string
  /** Empty when the entry has not been embedded yet */
  embedding: number[]
}

export type CatalogEntryInput = Omit<CatalogEntry, 'id'>

export interface CatalogMatch {
  entry: CatalogEntry
  similarity: number
}

export interface CatalogStatus {
  totalDocuments: number
  documentsWithEmbeddings: number
}

export interface CatalogRepositoryOptions {
  /** Catalog table, which doubles as the vector index name */
  table: string
  /** Column holding the pgvector embedding */
  vectorColumn: string
}

export interface CatalogPageQuery {
  category?: string
  offset: number
  limit: number
}

export interface NearestNeighbourOptions {
  limit: number
  /** HNSW candidate pool (`hnsw.ef_search`) */
  candidates: number
}

interface CatalogRow {
  id: string
  title: string | null
  description: string | null
  category: string | null
  url: string | null
  embedding: unknown
}

interface ScoredCatalogRow extends CatalogRow {
  similarity: number | string
}

function toEntry(row: CatalogRow): CatalogEntry {
  return {
    id: String(row.id),
    title: row.title ?? '',
    description: row.description ?? '',
    category: row.category ?? '',
    url: row.url ?? '',
    embedding: parseVectorLiteral(row.embedding),
  }
}

function toNullableVector(embedding: number[]): string | null {
  return embedding.length > 0 ? toVectorLiteral(embedding) : null
}

export class CatalogRepository {
  private readonly table: string
  private readonly column: string

  constructor(
    private readonly db: PooledQueryable,
    options: CatalogRepositoryOptions
  ) {
    this.table = quoteIdentifier(options.table)
    this.column = quoteIdentifier(options.vectorColumn)
  }

  private get selectColumns(): string {
    return `id, title, description, category, url, ${this.column}::text AS embedding`
  }

  /**
   * Full catalog snapshot, used by the brute-force fallback scan.
   */
  async findAll(): Promise<CatalogEntry[]> {
    const result = await this.db.query<CatalogRow>(
      `SELECT ${this.selectColumns} FROM ${this.table} ORDER BY title`
    )
    return result.rows.map(toEntry)
  }

  /**
   * One page of the catalog, optionally restricted to an exact category.
   */
  async findPage(query: CatalogPageQuery): Promise<CatalogEntry[]> {
    const values: unknown[] = []
    let where = ''
    if (query.category !== undefined) {
      values.push(query.category)
      where = ` WHERE category = $${values.length}`
    }
    values.push(query.limit, query.offset)

    const result = await this.db.query<CatalogRow>(
      `SELECT ${this.selectColumns} FROM ${this.table}${where} ORDER BY title, id LIMIT $${values.length - 1} OFFSET $${values.length}`,
      values
    )
    return result.rows.map(toEntry)
  }

  async findById(id: string): Promise<CatalogEntry | null> {
    const result = await this.db.query<CatalogRow>(
      `SELECT ${this.selectColumns} FROM ${this.table} WHERE id = $1`,
      [id]
    )
    const row = result.rows[0]
    return row ? toEntry(row) : null
  }

  async insert(input: CatalogEntryInput): Promise<CatalogEntry> {
    const result = await this.db.query<CatalogRow>(
      `INSERT INTO ${this.table} (id, title, description, category, url, ${this.column}, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6::vector, now(), now())
       RETURNING ${this.selectColumns}`,
      [randomUUID(), input.title, input.description, input.category, input.url, toNullableVector(input.embedding)]
    )
    const row = result.rows[0]
    if (!row) {
      throw new Error('Catalog insert returned no row')
    }
    return toEntry(row)
  }

  async update(entry: CatalogEntry): Promise<CatalogEntry | null> {
    const result = await this.db.query<CatalogRow>(
      `UPDATE ${this.table}
       SET title = $2, description = $3, category = $4, url = $5, ${this.column} = $6::vector, updated_at = now()
       WHERE id = $1
       RETURNING ${this.selectColumns}`,
      [entry.id, entry.title, entry.description, entry.category, entry.url, toNullableVector(entry.embedding)]
    )
    const row = result.rows[0]
    return row ? toEntry(row) : null
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.db.query(`DELETE FROM ${this.table} WHERE id = $1`, [id])
    return (result.rowCount ?? 0) > 0
  }

  async countStatus(): Promise<CatalogStatus> {
    const result = await this.db.query<{ total: number | string; with_embeddings: number | string }>(
      `SELECT count(*) AS total, count(${this.column}) AS with_embeddings FROM ${this.table}`
    )
    const row = result.rows[0]
    return {
      totalDocuments: Number(row?.total ?? 0),
      documentsWithEmbeddings: Number(row?.with_embeddings ?? 0),
    }
  }

  async findMissingEmbeddings(): Promise<CatalogEntry[]> {
    const result = await this.db.query<CatalogRow>(
      `SELECT ${this.selectColumns} FROM ${this.table} WHERE ${this.column} IS NULL ORDER BY id`
    )
    return result.rows.map(toEntry)
  }

  async setEmbedding(id: string, embedding: number[]): Promise<void> {
    await this.db.query(
      `UPDATE ${this.table} SET ${this.column} = $2::vector, updated_at = now() WHERE id = $1`,
      [id, toVectorLiteral(embedding)]
    )
  }

  /**
   * Approximate nearest-neighbour query through the HNSW index.
   * `hnsw.ef_search` is scoped to the transaction with SET LOCAL.
   */
  async nearestNeighbours(
    queryVector: number[],
    options: NearestNeighbourOptions
  ): Promise<CatalogMatch[]> {
    const client = await this.db.connect()
    const vector = toVectorLiteral(queryVector)
    const candidates = Math.max(1, Math.trunc(options.candidates))

    try {
      await client.query('BEGIN')
      // SET does not take bind parameters; candidates is an integer
      await client.query(`SET LOCAL hnsw.ef_search = ${candidates}`)
      const result = await client.query<ScoredCatalogRow>(
        `SELECT ${this.selectColumns}, 1 - (${this.column} <=> $1::vector) AS similarity
         FROM ${this.table}
         WHERE ${this.column} IS NOT NULL
         ORDER BY ${this.column} <=> $1::vector
         LIMIT $2`,
        [vector, options.limit]
      )
      await client.query('COMMIT')

      return result.rows.map(row => ({
        entry: toEntry(row),
        similarity: Number(row.similarity),
      }))
    } catch (error) {
      await client.query('ROLLBACK').catch(() => undefined)
      throw error
    } finally {
      client.release()
    }
  }
}
