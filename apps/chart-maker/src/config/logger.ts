/**
 * Chart Maker Logger Configuration
 *
 * Pre-configured loggers for chart-maker components
 */

import { createLogger } from '@stream-metrics/logger'

export const logger = createLogger('chart-maker')

export const loggers = {
  cli: logger.child('cli'),
  ingest: logger.child('ingest'),
  render: logger.child('render'),
  output: logger.child('output'),
}
