import { createLogger } from '@stream-metrics/logger'

export const logger = createLogger('series')
