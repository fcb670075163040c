import { CacheConfig } from '../types/config'
import { ConnectOptions, Connector, RtrTransport } from '../types/transport'
import { connectSocket } from '../rtr/transport'

/**
 * Opens transports to caches. Defaults to plain TCP or TLS sockets; another
 * connector (SSH tunnel, in-process pipe) can be registered instead.
 */
export default class Transports {
  private connector: Connector = connectSocket

  registerConnector (connector: Connector) {
    this.connector = connector
  }

  connect = (cache: CacheConfig, options: ConnectOptions): Promise<RtrTransport> => {
    return this.connector(cache, options)
  }
}
