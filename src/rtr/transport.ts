import { EventEmitter } from 'events'
import { readFileSync } from 'fs'
import { Socket, createConnection } from 'net'
import { connect as connectTls } from 'tls'
import { CacheConfig } from '../types/config'
import { Connector, RtrTransport } from '../types/transport'
import TransportError from '../errors/transport-error'
import TimeoutError from '../errors/timeout-error'
import { create as createLogger } from '../common/log'
const log = createLogger('transport')

export class SocketTransport extends EventEmitter implements RtrTransport {
  readonly remote: string
  private socket: Socket
  private lastError?: Error

  constructor (socket: Socket, remote: string) {
    super()
    this.socket = socket
    this.remote = remote

    socket.on('data', (chunk: Buffer) => this.emit('data', chunk))
    socket.on('error', (err: Error) => {
      log.debug('socket error. remote=%s error=%s', remote, err.message)
      this.lastError = err
    })
    socket.once('close', () => this.emit('close', this.lastError))
  }

  send (data: Buffer) {
    this.socket.write(data)
  }

  close () {
    this.socket.destroy()
  }
}

function openSocket (cache: CacheConfig): { socket: Socket, readyEvent: string } {
  if (cache.transport === 'tls') {
    const tls = cache.tls || {}
    return {
      socket: connectTls({
        host: cache.host,
        port: cache.port,
        servername: tls.servername,
        ca: tls.ca ? readFileSync(tls.ca) : undefined,
        cert: tls.cert ? readFileSync(tls.cert) : undefined,
        key: tls.key ? readFileSync(tls.key) : undefined,
        rejectUnauthorized: tls.rejectUnauthorized !== false
      }),
      readyEvent: 'secureConnect'
    }
  }
  return {
    socket: createConnection({ host: cache.host, port: cache.port }),
    readyEvent: 'connect'
  }
}

export const connectSocket: Connector = (cache, { timeout }) => new Promise<RtrTransport>((resolve, reject) => {
  const remote = `${cache.host}:${cache.port}`
  const { socket, readyEvent } = openSocket(cache)

  const timer = setTimeout(() => {
    socket.destroy()
    reject(new TimeoutError('connection attempt timed out. remote=' + remote, timeout))
  }, timeout)

  const onError = (err: Error) => {
    clearTimeout(timer)
    reject(new TransportError(`connection attempt failed. remote=${remote} error=${err.message}`, err))
  }

  socket.once('error', onError)
  socket.once(readyEvent, () => {
    clearTimeout(timer)
    socket.removeListener('error', onError)
    socket.setKeepAlive(true)
    socket.setNoDelay(true)
    resolve(new SocketTransport(socket, remote))
  })
})
