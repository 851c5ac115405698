/**
 * Script to backfill embeddings for catalog entries that have none
 *
 * Usage:
 *   npx tsx backfill-embeddings.ts
 *
 * Environment variables:
 *   DATABASE_URL - PostgreSQL connection string
 *   EMBEDDING_PROVIDER - 'local' (default) or 'openai'
 *   OPENAI_API_KEY - Required when EMBEDDING_PROVIDER=openai
 *   LOG_FORMAT - Set to 'pretty' for colored output (default in dev)
 */

// Load environment variables first, before any other imports
import 'dotenv/config'

import { createLogger } from '@resource-guide/logger'
import { CatalogRepository, createPool } from '@resource-guide/db'
import { loadConfig } from './src/config/env'
import { createVectorizer } from './src/services/assistant'
import { CatalogService } from './src/services/catalog/catalog-service'

const log = createLogger('api:backfill-embeddings')

async function main() {
  log.info('Starting embedding backfill')

  const config = loadConfig()
  const pool = createPool({ connectionString: config.databaseUrl, max: 2 })
  const repository = new CatalogRepository(pool, {
    table: config.vectorIndex.table,
    vectorColumn: config.vectorIndex.vectorField,
  })
  const catalog = new CatalogService(repository, createVectorizer(config), log.child('catalog'))

  const startTime = Date.now()

  try {
    const result = await catalog.backfillEmbeddings({
      batchSize: 50,
      onProgress: (processed, total) => {
        const percent = Math.round((processed / total) * 100)
        const elapsed = ((Date.now() - startTime) / 1000).toFixed(1)
        log.info('Progress update', { processed, total, percent, elapsedSeconds: elapsed })
      },
    })

    const duration = ((Date.now() - startTime) / 1000).toFixed(1)

    log.info('Backfill complete', {
      processed: result.processed,
      skipped: result.skipped,
      failed: result.failed,
      durationSeconds: duration,
    })

    if (result.failed > 0) {
      log.warn('Some entries could not be updated', { failed: result.failed })
    }
  } finally {
    await pool.end()
  }
}

main()
  .then(() => process.exit(0))
  .catch(error => {
    log.fatal('Backfill failed', {}, error)
    process.exit(1)
  })
