export { createPool } from './pool'
export type { PoolOptions } from './pool'
export { CatalogRepository } from './catalog-repository'
export type {
  CatalogEntry,
  CatalogEntryInput,
  CatalogMatch,
  CatalogStatus,
  CatalogRepositoryOptions,
  CatalogPageQuery,
  NearestNeighbourOptions,
  Queryable,
  PooledQueryable,
} from './catalog-repository'
export { SearchLogRepository } from './search-log-repository'
export type { SearchLogInput, SearchLogTotals, SearchType, SearchWindowStats } from './search-log-repository'
export { buildCatalogText } from './embedding-text'
export { toVectorLiteral, parseVectorLiteral, quoteIdentifier, isSafeIdentifier } from './vector'
