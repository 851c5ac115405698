import type { SearchLogInput, SearchLogRepository } from '@resource-guide/db'
import type { ILogger } from '@resource-guide/logger'

export type SearchLogStore = Pick<SearchLogRepository, 'record' | 'windowStats' | 'totals'>

export interface SearchStats {
  periodDays: number
  totalSearches: number
  averageResponseTimeMs: number
  searchTypes: Array<{ type: string; count: number }>
  topQueries: Array<{ query: string; count: number }>
}

export interface QuestionOverview {
  totalQuestions: number
  totalSearches: number
  averageResponseTimeMs: number
  recentQuestions24h: number
}

function roundMs(value: number | null): number {
  return value === null ? 0 : Math.round(value * 100) / 100
}

/**
 * Usage analytics over the search log.
 */
export class AnalyticsService {
  constructor(
    private readonly store: SearchLogStore,
    private readonly log: ILogger
  ) {}

  /**
   * Append one log row. A failed write is logged and does not fail the
   * request being logged.
   */
  async record(entry: SearchLogInput): Promise<void> {
    try {
      await this.store.record(entry)
    } catch (error) {
      this.log.warn('Failed to record search log', { searchType: entry.searchType }, error)
    }
  }

  async searchStats(days: number): Promise<SearchStats> {
    const stats = await this.store.windowStats(days)
    return {
      periodDays: days,
      totalSearches: stats.totalSearches,
      averageResponseTimeMs: roundMs(stats.averageResponseTimeMs),
      searchTypes: stats.searchTypes,
      topQueries: stats.topQueries,
    }
  }

  async overview(): Promise<QuestionOverview> {
    const totals = await this.store.totals()
    return {
      totalQuestions: totals.totalQuestions,
      totalSearches: totals.totalSearches,
      averageResponseTimeMs: roundMs(totals.averageResponseTimeMs),
      recentQuestions24h: totals.recentQuestions,
    }
  }
}
