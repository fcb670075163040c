import { CacheConfig } from './config'

/**
 * A connected, reliable byte stream to a cache.
 */
export interface RtrTransport {
  readonly remote: string
  send (data: Buffer): void
  close (): void
  on (event: 'data', listener: (chunk: Buffer) => void): this
  on (event: 'close', listener: (error?: Error) => void): this
  removeAllListeners (): this
}

export interface ConnectOptions {
  timeout: number
}

export type Connector = (cache: CacheConfig, options: ConnectOptions) => Promise<RtrTransport>
