/**
 * Inspector Logger Configuration
 *
 * Pre-configured loggers for inspector components
 */

import { createLogger } from '@quotawatch/logger'

export const logger = createLogger('inspector')

export const loggers = {
  run: logger.child('run'),
  credentials: logger.child('credentials'),
  session: logger.child('session'),
  network: logger.child('network'),
  providers: logger.child('providers'),
  orchestrator: logger.child('orchestrator'),
  emitter: logger.child('emitter'),
}
