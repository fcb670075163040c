import { ProtocolVersion } from './pdu'

export interface BackoffConfig {
  /** Delay before the first retry (ms) */
  base: number
  /** Ceiling for the doubling delay (ms) */
  max: number
  /** Time a session must stay synchronized before the delay starts over (ms) */
  resetAfter: number
}

export interface TlsConfig {
  /** Paths to PEM files */
  ca?: string
  cert?: string
  key?: string
  servername?: string
  rejectUnauthorized?: boolean
}

/**
 * A cache entry as written in the configuration.
 */
export interface CacheOptions {
  id?: string
  host: string
  port?: number
  transport?: 'tcp' | 'tls'
  tls?: TlsConfig
  preference?: number
  protocolVersion?: ProtocolVersion
  backoff?: Partial<BackoffConfig>
}

/**
 * A cache entry with its defaults filled in.
 */
export interface CacheConfig {
  /** Defaults to `host:port` */
  id: string
  host: string
  port: number
  transport: 'tcp' | 'tls'
  tls?: TlsConfig
  /** Lower is preferred */
  preference: number
  protocolVersion: ProtocolVersion
  backoff: BackoffConfig
}

export interface SessionTimers {
  refreshInterval: number
  honorCacheTimers: boolean
  connectTimeout: number
  responseTimeout: number
  endOfDataTimeout: number
  syncTimeout: number
}
