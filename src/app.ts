import reduct, { Injector } from 'reduct'
import { create as createLogger } from './common/log'
const log = createLogger('app')

import Config from './services/config'
import SessionPool from './services/session-pool'
import VrpStore from './services/vrp-store'
import EventSink, { SnapshotSubscriber } from './services/event-sink'
import Validator from './services/validator'
import AdminApi from './services/admin-api'
import Stats from './services/stats'
import InvalidConfigError from './errors/invalid-config-error'

const listen = (
  config: Config,
  pool: SessionPool,
  stats: Stats,
  adminApi: AdminApi
) => async () => {
  adminApi.listen()

  if (config.collectDefaultMetrics) {
    stats.collectDefaultMetrics()
  }

  pool.start()

  log.info('validator started. caches=%s', config.caches.map(cache => cache.id).join(','))
}

const shutdown = (
  pool: SessionPool,
  adminApi: AdminApi
) => async () => {
  pool.stop()
  await adminApi.close()
}

export default function createApp (opts?: object, container?: Injector) {
  const deps = container || reduct()

  const config = deps(Config)

  try {
    if (opts) {
      config.loadFromOpts(opts)
    } else {
      config.loadFromEnv()
    }
  } catch (err) {
    if (err instanceof InvalidConfigError) {
      log.warn('config validation error. error=%s', err.message)
      err.debugPrint(log.warn.bind(log))
      log.error('invalid configuration, shutting down.')
      throw new Error('failed to initialize due to invalid configuration.')
    }

    throw err
  }

  const pool = deps(SessionPool)
  const store = deps(VrpStore)
  const sink = deps(EventSink)
  const validator = deps(Validator)
  const adminApi = deps(AdminApi)
  const stats = deps(Stats)

  return {
    config,
    listen: listen(config, pool, stats, adminApi),
    shutdown: shutdown(pool, adminApi),
    validate: (prefix: string, prefixLength: number, originAsn: number) =>
      validator.validate(prefix, prefixLength, originAsn),
    subscribe: (subscriber: SnapshotSubscriber) => sink.subscribe(subscriber),
    getStatus: () => pool.getStatus(),
    getSnapshot: () => store.current()
  }
}
