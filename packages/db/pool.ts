import pg from 'pg'
import type { Pool } from 'pg'

export interface PoolOptions {
  connectionString: string
  max?: number
  idleTimeoutMillis?: number
}

/**
 * Create the process-wide connection pool. Callers own its lifetime and
 * must `end()` it on shutdown.
 */
export function createPool(options: PoolOptions): Pool {
  return new pg.Pool({
    connectionString: options.connectionString,
    max: options.max ?? 10,
    idleTimeoutMillis: options.idleTimeoutMillis ?? 30000,
  })
}
