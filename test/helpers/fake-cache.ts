import { EventEmitter } from 'events'
import { decodePdu, encodePdu } from '../../src/rtr/pdu'
import { Connector, RtrTransport } from '../../src/types/transport'
import { Pdu } from '../../src/types/pdu'
import TransportError from '../../src/errors/transport-error'

/**
 * In-process stand-in for a cache connection. Whatever the session sends is
 * recorded; the test plays the cache by calling `receive`.
 */
export class FakeTransport extends EventEmitter implements RtrTransport {
  readonly remote: string
  sent: Buffer[] = []
  closed: boolean = false

  constructor (remote: string) {
    super()
    this.remote = remote
  }

  send (data: Buffer) {
    if (this.closed) {
      throw new Error('send on closed transport')
    }
    this.sent.push(data)
  }

  close () {
    this.closed = true
  }

  sentPdus (): Pdu[] {
    return this.sent.map(buffer => decodePdu(buffer))
  }

  lastSent (): Pdu {
    const pdus = this.sentPdus()
    const last = pdus[pdus.length - 1]
    if (!last) {
      throw new Error('nothing sent')
    }
    return last
  }

  receive (...pdus: Array<Pdu | Buffer>) {
    for (const pdu of pdus) {
      this.emit('data', Buffer.isBuffer(pdu) ? pdu : encodePdu(pdu))
    }
  }

  hangUp (err?: Error) {
    this.closed = true
    this.emit('close', err)
  }
}

export class FakeCache {
  transports: FakeTransport[] = []
  attempts: number = 0
  refuse: boolean = false

  connector: Connector = async (cache) => {
    this.attempts++
    if (this.refuse) {
      throw new TransportError(`connection attempt failed. remote=${cache.host}:${cache.port} error=refused`)
    }
    const transport = new FakeTransport(`${cache.host}:${cache.port}`)
    this.transports.push(transport)
    return transport
  }

  /**
   * Most recent connection to the given host.
   */
  transportFor (host: string): FakeTransport {
    const matching = this.transports.filter(transport => transport.remote.startsWith(host + ':'))
    const transport = matching[matching.length - 1]
    if (!transport) {
      throw new Error('no connection was opened. host=' + host)
    }
    return transport
  }

  get last (): FakeTransport {
    const transport = this.transports[this.transports.length - 1]
    if (!transport) {
      throw new Error('no connection was opened')
    }
    return transport
  }
}

/**
 * Let pending promise continuations run. Only timers are faked in these
 * tests, so setImmediate still fires after the microtask queue drains.
 */
export const flush = () => new Promise<void>(resolve => setImmediate(resolve))
