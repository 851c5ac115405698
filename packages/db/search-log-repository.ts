/**
 * Search Log Repository
 *
 * Append-only record of every question and search the API served:
 *
 *   id bigserial primary key, query text not null, results_count integer,
 *   search_type text, response_time_ms integer, succeeded boolean,
 *   created_at timestamptz default now()
 */

import type { Queryable } from './catalog-repository'
import { quoteIdentifier } from './vector'

export type SearchType = 'ask' | 'search'

export interface SearchLogInput {
  query: string
  resultsCount: number
  searchType: SearchType
  responseTimeMs: number
  succeeded: boolean
}

export interface SearchWindowStats {
  totalSearches: number
  /** null when no logged request in the window has a response time */
  averageResponseTimeMs: number | null
  searchTypes: Array<{ type: string; count: number }>
  topQueries: Array<{ query: string; count: number }>
}

export interface SearchLogTotals {
  totalQuestions: number
  totalSearches: number
  averageResponseTimeMs: number | null
  recentQuestions: number
}

interface CountRow {
  count: number | string
}

interface AverageRow {
  total: number | string
  average: number | string | null
}

function toNumberOrNull(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined) return null
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : null
}

export class SearchLogRepository {
  private readonly table: string

  constructor(
    private readonly db: Queryable,
    options: { table?: string } = {}
  ) {
    this.table = quoteIdentifier(options.table ?? 'search_logs')
  }

  async record(entry: SearchLogInput): Promise<void> {
    await this.db.query(
      `INSERT INTO ${this.table} (query, results_count, search_type, response_time_ms, succeeded, created_at)
       VALUES ($1, $2, $3, $4, $5, now())`,
      [entry.query, entry.resultsCount, entry.searchType, Math.round(entry.responseTimeMs), entry.succeeded]
    )
  }

  /**
   * Volume, latency, type mix and most frequent queries over the last `days` days.
   */
  async windowStats(days: number, topQueryLimit = 10): Promise<SearchWindowStats> {
    const since = `created_at >= now() - make_interval(days => $1)`

    const totals = await this.db.query<AverageRow>(
      `SELECT count(*) AS total, avg(response_time_ms) AS average FROM ${this.table} WHERE ${since}`,
      [days]
    )
    const types = await this.db.query<CountRow & { search_type: string | null }>(
      `SELECT search_type, count(*) AS count FROM ${this.table} WHERE ${since}
       GROUP BY search_type ORDER BY count DESC, search_type`,
      [days]
    )
    const queries = await this.db.query<CountRow & { query: string }>(
      `SELECT query, count(*) AS count FROM ${this.table} WHERE ${since}
       GROUP BY query ORDER BY count DESC, query LIMIT $2`,
      [days, topQueryLimit]
    )

    const row = totals.rows[0]
    return {
      totalSearches: Number(row?.total ?? 0),
      averageResponseTimeMs: toNumberOrNull(row?.average),
      searchTypes: types.rows.map(r => ({ type: r.search_type ?? 'unknown', count: Number(r.count) })),
      topQueries: queries.rows.map(r => ({ query: r.query, count: Number(r.count) })),
    }
  }

  /**
   * All-time totals. A question is a successfully answered `ask`.
   */
  async totals(): Promise<SearchLogTotals> {
    const result = await this.db.query<{
      total_questions: number | string
      total_searches: number | string
      average: number | string | null
      recent_questions: number | string
    }>(
      `SELECT
         count(*) FILTER (WHERE search_type = 'ask' AND succeeded) AS total_questions,
         count(*) AS total_searches,
         avg(response_time_ms) AS average,
         count(*) FILTER (WHERE search_type = 'ask' AND succeeded AND created_at >= now() - interval '24 hours') AS recent_questions
       FROM ${this.table}`
    )
    const row = result.rows[0]
    return {
      totalQuestions: Number(row?.total_questions ?? 0),
      totalSearches: Number(row?.total_searches ?? 0),
      averageResponseTimeMs: toNumberOrNull(row?.average),
      recentQuestions: Number(row?.recent_questions ?? 0),
    }
  }
}
