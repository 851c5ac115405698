// Load environment variables first, before any other imports
import 'dotenv/config'

import { CatalogRepository, SearchLogRepository, createPool } from '@resource-guide/db'
import { createApp } from './app'
import { ConfigError, loadConfig } from './config/env'
import { loggers } from './config/logger'
import { createAssistant } from './services/assistant'
import { CatalogService } from './services/catalog/catalog-service'
import { AnalyticsService } from './services/analytics/analytics-service'

const log = loggers.server

function readConfig() {
  try {
    return loadConfig()
  } catch (error) {
    if (error instanceof ConfigError) {
      loggers.config.fatal('Invalid configuration', { issues: error.issues.length }, error)
      process.exit(1)
    }
    throw error
  }
}

const config = readConfig()

const pool = createPool({ connectionString: config.databaseUrl })
pool.on('error', error => {
  loggers.database.error('Idle database client error', {}, error)
})

const repository = new CatalogRepository(pool, {
  table: config.vectorIndex.table,
  vectorColumn: config.vectorIndex.vectorField,
})

const assistant = createAssistant(config, repository)
const catalog = new CatalogService(repository, assistant.vectorizer, loggers.catalog)
const analytics = new AnalyticsService(
  new SearchLogRepository(pool, { table: config.searchLogTable }),
  loggers.analytics
)

const app = createApp({
  orchestrator: assistant.orchestrator,
  catalog,
  analytics,
  settings: {
    env: config.env,
    frontendUrl: config.frontendUrl,
    requestTimeoutMs: config.requestTimeoutMs,
    searchResultLimit: config.searchResultLimit,
  },
})

const server = app.listen(config.port, () => {
  log.info('API server started', {
    port: config.port,
    index: `${config.vectorIndex.table}.${config.vectorIndex.vectorField}`,
    embeddingProvider: config.embedding.provider,
  })
})

// Track if shutdown is in progress
let isShuttingDown = false

// Graceful shutdown
const shutdown = async (signal: string) => {
  if (isShuttingDown) {
    log.warn('Shutdown already in progress')
    return
  }
  isShuttingDown = true

  const shutdownStart = Date.now()
  log.info('Starting graceful shutdown', { signal })

  try {
    // 1. Stop accepting new connections
    log.info('Closing HTTP server')
    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err)
        else resolve()
      })
    })
    log.info('HTTP server closed')

    // 2. Drain the connection pool
    log.info('Closing database pool')
    await pool.end()

    const durationMs = Date.now() - shutdownStart
    log.info('Graceful shutdown complete', { durationMs })
    process.exit(0)
  } catch (error) {
    log.error('Error during shutdown', {}, error)
    process.exit(1)
  }
}

process.on('SIGTERM', () => void shutdown('SIGTERM'))
process.on('SIGINT', () => void shutdown('SIGINT'))
