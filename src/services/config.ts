import Ajv, { ValidateFunction } from 'ajv'
import { constantCase } from 'change-case'
import InvalidConfigError from '../errors/invalid-config-error'
import { extractDefaultsFromSchema } from '../lib/utils'
import { BackoffConfig, CacheConfig, CacheOptions, SessionTimers } from '../types/config'
import { create as createLogger } from '../common/log'
import configSchema from '../schemas/Config.json'
const log = createLogger('config')

const ajv = new Ajv({ allErrors: true })

const ENV_PREFIX = 'RTR_'

const BOOLEAN_VALUES: { [key: string]: boolean } = {
  '1': true,
  'true': true,
  '0': false,
  'false': false,
  '': false
}

export const DEFAULT_PORT = 323
export const DEFAULT_PREFERENCE = 100

export default class Config {
  // Every property below has a default in the config schema and is assigned
  // when the config is loaded, so they are never actually undefined.
  public caches!: CacheConfig[]
  public refreshInterval!: number
  public honorCacheTimers!: boolean
  public connectTimeout!: number
  public responseTimeout!: number
  public endOfDataTimeout!: number
  public syncTimeout!: number
  public backoff!: BackoffConfig
  public stalenessCeiling!: number
  public adminApi!: boolean
  public adminApiHost!: string
  public adminApiPort!: number
  public collectDefaultMetrics!: boolean

  protected _validate: ValidateFunction

  constructor () {
    this._validate = ajv.compile(configSchema)
    this.apply({})
  }

  loadFromEnv (env?: NodeJS.ProcessEnv) {
    if (!env) {
      env = process.env
    }

    // Copy all env vars starting with ENV_PREFIX into a set so we can check off
    // the ones we recognize and warn the user about any we don't recognize.
    const unrecognizedEnvKeys = new Set(
      Object.keys(env).filter(key => key.startsWith(ENV_PREFIX))
    )

    const config: { [key: string]: unknown } = {}
    for (const [key, property] of Object.entries(configSchema.properties)) {
      const envKey = ENV_PREFIX + constantCase(key)
      const envValue = env[envKey]

      unrecognizedEnvKeys.delete(envKey)

      if (typeof envValue === 'string') {
        switch (property.type) {
          case 'string':
            config[key] = envValue
            break
          case 'object':
          case 'array':
            try {
              config[key] = JSON.parse(envValue)
            } catch (err) {
              throw new InvalidConfigError('unable to parse config. key=' + envKey, [])
            }
            break
          case 'boolean':
            config[key] = BOOLEAN_VALUES[envValue] || false
            break
          case 'integer':
          case 'number':
            config[key] = Number(envValue)
            break
          default:
            throw new TypeError('Unknown JSON schema type: ' + property.type)
        }
      }
    }

    for (const key of unrecognizedEnvKeys) {
      log.warn('unrecognized environment variable. key=%s', key)
    }

    this.loadFromOpts(config)
  }

  loadFromOpts (opts: object) {
    this.validate(opts)
    this.apply(opts)
  }

  validate (config: object) {
    if (!this._validate(config)) {
      const errors = this._validate.errors || []
      const firstError = errors[0]
        ? errors[0]
        : { message: 'unknown validation error', instancePath: '' }
      throw new InvalidConfigError('config failed to validate. error=' + firstError.message + ' instancePath=' + firstError.instancePath, errors)
    }
  }

  getSessionTimers (): SessionTimers {
    return {
      refreshInterval: this.refreshInterval,
      honorCacheTimers: this.honorCacheTimers,
      connectTimeout: this.connectTimeout,
      responseTimeout: this.responseTimeout,
      endOfDataTimeout: this.endOfDataTimeout,
      syncTimeout: this.syncTimeout
    }
  }

  private apply (opts: object) {
    Object.assign(this, extractDefaultsFromSchema(configSchema), opts)
    // The schema has validated the entries, only their defaults are missing.
    const entries: CacheOptions[] = this.caches
    this.caches = entries.map(cache => this.resolveCache(cache))

    const seen = new Set<string>()
    for (const cache of this.caches) {
      if (seen.has(cache.id)) {
        throw new InvalidConfigError('duplicate cache id. id=' + cache.id, [])
      }
      seen.add(cache.id)
    }
  }

  private resolveCache (cache: CacheOptions): CacheConfig {
    const port = cache.port || DEFAULT_PORT
    return {
      id: cache.id || `${cache.host}:${port}`,
      host: cache.host,
      port,
      transport: cache.transport || 'tcp',
      tls: cache.tls,
      preference: typeof cache.preference === 'number' ? cache.preference : DEFAULT_PREFERENCE,
      protocolVersion: typeof cache.protocolVersion === 'number' ? cache.protocolVersion : 2,
      backoff: { ...this.backoff, ...cache.backoff }
    }
  }
}
