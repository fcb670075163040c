#!/usr/bin/env node

import { install } from 'source-map-support'
install()

import createApp from './app'
import { create as createLogger, formatError } from './common/log'

const log = createLogger('app')

export { createApp }

if (require.main === module) {
  const validator = createApp()
  validator.listen()
    .catch((err: unknown) => {
      log.error(formatError(err))
    })

  let shuttingDown = false
  process.on('SIGINT', async () => {
    try {
      if (shuttingDown) {
        log.warn('received second SIGINT during graceful shutdown, exiting forcefully.')
        process.exit(1)
        return
      }

      shuttingDown = true

      // Graceful shutdown
      log.debug('shutting down.')
      await validator.shutdown()
      log.debug('completed graceful shutdown.')
      process.exit(0)
    } catch (err) {
      log.error('error while shutting down. error=%s', formatError(err))
      process.exit(1)
    }
  })
}
