/**
 * API Logger Configuration
 *
 * Pre-configured loggers for API components
 */

import { createLogger } from '@resource-guide/logger'

// Root logger for the API service
export const logger = createLogger('api')

export const loggers = {
  server: logger.child('server'),
  config: logger.child('config'),
  database: logger.child('database'),
  assistant: logger.child('assistant'),
  search: logger.child('search'),
  catalog: logger.child('catalog'),
  analytics: logger.child('analytics'),
}
