import { EventEmitter } from 'events'
import PduFramer from './framer'
import { decodePdu, encodePdu } from './pdu'
import Backoff from '../lib/backoff'
import Stats, { SessionErrorKind } from '../services/stats'
import VrpSnapshot from '../routing/vrp-snapshot'
import VrpTable from '../routing/vrp-table'
import { vrpFromPdu } from '../routing/utils'
import { CacheConfig, SessionTimers } from '../types/config'
import { Connector, RtrTransport } from '../types/transport'
import {
  Pdu,
  PduType,
  ErrorCode,
  ProtocolVersion,
  EndOfDataPdu,
  EndOfDataTiming,
  isPrefixPdu
} from '../types/pdu'
import ProtocolError from '../errors/protocol-error'
import UnexpectedPduError from '../errors/unexpected-pdu-error'
import UnsupportedVersionError from '../errors/unsupported-version-error'
import TransportError from '../errors/transport-error'
import TimeoutError from '../errors/timeout-error'
import CacheSignaledError from '../errors/cache-signaled-error'
import { create as createLogger, formatError, ValidatorLogger } from '../common/log'

export enum SessionState {
  Disconnected = 'disconnected',
  Connecting = 'connecting',
  AwaitingCacheResponse = 'awaiting-cache-response',
  ReceivingFullTable = 'receiving-full-table',
  Established = 'established',
  ReceivingDelta = 'receiving-delta',
  Error = 'error'
}

export interface RtrSessionOpts {
  cache: CacheConfig
  timers: SessionTimers
  connector: Connector
  stats: Stats
}

export interface SessionStatus {
  id: string
  remote: string
  state: SessionState
  healthy: boolean
  preference: number
  protocolVersion: ProtocolVersion
  sessionId?: number
  serial?: number
  vrpCount: number
  lastSyncStarted?: number
  lastSync?: number
  lastError?: string
  timing?: EndOfDataTiming
  backoffAttempts: number
}

type QueryKind = 'reset' | 'serial'

const RECEIVING_STATES = [
  SessionState.AwaitingCacheResponse,
  SessionState.ReceivingFullTable,
  SessionState.ReceivingDelta
]

/**
 * Client side of one RTR session with one cache.
 *
 * The session owns its connection, its serial continuity and the last snapshot
 * it committed. Callers only observe it through events:
 *
 * - `state` (state, previousState) on every transition
 * - `commit` (snapshot, full) when an End of Data produced a new snapshot
 * - `failure` (error) when the session entered the Error state
 * - `health` () when the session stopped being healthy without changing state
 *
 * A session never emits `error` and never throws out of its event handlers;
 * every failure ends in the Error state and a reconnect after backoff.
 */
export default class RtrSession extends EventEmitter {
  readonly id: string
  protected cache: CacheConfig
  protected timers: SessionTimers
  protected connector: Connector
  protected stats: Stats
  protected log: ValidatorLogger
  protected backoff: Backoff
  protected framer: PduFramer = new PduFramer()

  protected state: SessionState = SessionState.Disconnected
  protected started: boolean = false
  protected transport?: RtrTransport
  /**
   * Incremented whenever the current connection is abandoned, so callbacks
   * belonging to an older connection can recognize themselves as stale.
   */
  protected generation: number = 0

  protected version: ProtocolVersion
  protected negotiated: boolean = false
  protected sessionId?: number
  protected serial?: number
  protected snapshot?: VrpSnapshot

  protected query?: QueryKind
  protected table?: VrpTable
  protected pendingNotify: boolean = false

  protected lastSyncStarted?: number
  /** A query is outstanding and no failure has interrupted it */
  protected resyncing: boolean = false
  protected lastSync?: number
  protected lastError?: string
  protected timing?: EndOfDataTiming

  protected connectTimer?: NodeJS.Timeout
  protected responseTimer?: NodeJS.Timeout
  protected inactivityTimer?: NodeJS.Timeout
  protected refreshTimer?: NodeJS.Timeout
  protected syncTimer?: NodeJS.Timeout
  protected reconnectTimer?: NodeJS.Timeout

  constructor ({ cache, timers, connector, stats }: RtrSessionOpts) {
    super()
    this.id = cache.id
    this.cache = cache
    this.timers = timers
    this.connector = connector
    this.stats = stats
    this.version = cache.protocolVersion
    this.backoff = new Backoff(cache.backoff)
    this.log = createLogger(`rtr-session[${cache.id}]`)
  }

  getState () {
    return this.state
  }

  getPreference () {
    return this.cache.preference
  }

  getSerial () {
    return this.serial
  }

  getProtocolVersion () {
    return this.version
  }

  /**
   * Last snapshot committed by this session, kept across reconnects.
   */
  getSnapshot () {
    return this.snapshot
  }

  getLastSync () {
    return this.lastSync
  }

  /**
   * A session is healthy when it is synchronized, or when it holds a snapshot
   * and its current resynchronization has not yet exceeded `syncTimeout`.
   */
  isHealthy (now: number = Date.now()): boolean {
    if (!this.snapshot) {
      return false
    }
    if (this.state === SessionState.Established) {
      return true
    }
    if (this.state === SessionState.Connecting || RECEIVING_STATES.includes(this.state)) {
      return this.resyncing &&
        this.lastSyncStarted !== undefined &&
        now - this.lastSyncStarted < this.timers.syncTimeout
    }
    return false
  }

  getStatus (now: number = Date.now()): SessionStatus {
    return {
      id: this.id,
      remote: `${this.cache.host}:${this.cache.port}`,
      state: this.state,
      healthy: this.isHealthy(now),
      preference: this.cache.preference,
      protocolVersion: this.version,
      sessionId: this.sessionId,
      serial: this.serial,
      vrpCount: this.snapshot ? this.snapshot.size : 0,
      lastSyncStarted: this.lastSyncStarted,
      lastSync: this.lastSync,
      lastError: this.lastError,
      timing: this.timing,
      backoffAttempts: this.backoff.getAttempts()
    }
  }

  start () {
    if (this.started) {
      return
    }
    this.started = true
    this.log.info('starting session. remote=%s:%s version=%s', this.cache.host, this.cache.port, this.version)
    this.connect()
  }

  /**
   * Abandon the connection and any transfer in progress. The last committed
   * snapshot is kept, nothing partial is ever committed.
   */
  stop () {
    if (!this.started) {
      return
    }
    this.started = false
    this.log.info('stopping session.')
    this.teardown()
    this.clearTimer('reconnectTimer')
    this.clearTimer('syncTimer')
    this.setState(SessionState.Disconnected)
  }

  protected connect () {
    this.teardown()
    this.negotiated = false
    this.setState(SessionState.Connecting)

    const generation = this.generation
    this.connectTimer = setTimeout(() => {
      if (generation !== this.generation) return
      this.fail(new TimeoutError('connection attempt timed out.', this.timers.connectTimeout))
    }, this.timers.connectTimeout)

    this.open(generation)
      .catch((err: unknown) => this.log.error('unexpected error while connecting. error=%s', formatError(err)))
  }

  protected async open (generation: number) {
    let transport: RtrTransport
    try {
      transport = await this.connector(this.cache, { timeout: this.timers.connectTimeout })
    } catch (err) {
      if (generation !== this.generation) return
      this.fail(err instanceof TransportError
        ? err
        : new TransportError('connection attempt failed. error=' + (err instanceof Error ? err.message : String(err)), err))
      return
    }

    if (generation !== this.generation) {
      this.log.debug('discarding connection of abandoned attempt. remote=%s', transport.remote)
      transport.close()
      return
    }

    this.clearTimer('connectTimer')
    this.transport = transport
    transport.on('data', (chunk: Buffer) => this.handleData(generation, chunk))
    transport.on('close', (err?: Error) => this.handleClose(generation, err))
    this.log.debug('connected. remote=%s', transport.remote)

    if (this.sessionId !== undefined && this.serial !== undefined) {
      this.sendSerialQuery(SessionState.AwaitingCacheResponse)
    } else {
      this.sendResetQuery()
    }
  }

  protected handleData (generation: number, chunk: Buffer) {
    if (generation !== this.generation) return

    let pdus: Buffer[]
    try {
      pdus = this.framer.push(chunk)
    } catch (err) {
      this.fail(err)
      return
    }

    for (const buffer of pdus) {
      // A previous PDU may have ended or replaced this connection
      if (generation !== this.generation) return
      try {
        this.handlePdu(decodePdu(buffer))
      } catch (err) {
        if (err instanceof ProtocolError && !err.pdu) {
          err.pdu = buffer
        }
        this.fail(err)
        return
      }
    }
  }

  protected handleClose (generation: number, err?: Error) {
    if (generation !== this.generation) return
    this.transport = undefined
    this.fail(new TransportError('connection closed by cache.' + (err ? ' error=' + err.message : ''), err))
  }

  protected handlePdu (pdu: Pdu) {
    this.stats.countPdu(this.id, pdu.type)
    this.log.trace('received pdu. type=%s version=%s state=%s', PduType[pdu.type], pdu.version, this.state)
    // A notify is not an answer to the outstanding query
    if (pdu.type !== PduType.SerialNotify) {
      this.clearTimer('responseTimer')
    }

    if (pdu.type === PduType.ErrorReport) {
      this.handleErrorReport(pdu.version, pdu.errorCode, pdu.errorText)
      return
    }
    this.checkVersion(pdu.version)

    switch (pdu.type) {
      case PduType.SerialNotify:
        this.handleSerialNotify(pdu.sessionId, pdu.serial)
        break
      case PduType.CacheResponse:
        this.handleCacheResponse(pdu.sessionId)
        break
      case PduType.Ipv4Prefix:
      case PduType.Ipv6Prefix:
      case PduType.RouterKey:
      case PduType.Aspa:
        this.handlePayload(pdu)
        break
      case PduType.EndOfData:
        this.handleEndOfData(pdu)
        break
      case PduType.CacheReset:
        this.handleCacheReset()
        break
      case PduType.SerialQuery:
      case PduType.ResetQuery:
        throw new UnexpectedPduError('received a query from the cache. type=' + PduType[pdu.type])
    }

    this.armInactivityTimer()
    if (this.state === SessionState.Established && this.refreshTimer) {
      this.scheduleRefresh()
    }
  }

  protected checkVersion (version: ProtocolVersion) {
    if (this.negotiated) {
      if (version !== this.version) {
        throw new UnsupportedVersionError('pdu version differs from negotiated version.', version)
      }
      return
    }

    if (version > this.version) {
      throw new UnsupportedVersionError('cache answered with a higher protocol version.', version, ErrorCode.UnsupportedProtocolVersion)
    }
    if (version < this.version) {
      this.log.info('cache uses an older protocol version, downgrading. from=%s to=%s', this.version, version)
      this.version = version
    }
    this.negotiated = true
  }

  protected handleErrorReport (version: ProtocolVersion, errorCode: number, errorText: string) {
    if (
      errorCode === ErrorCode.UnsupportedProtocolVersion &&
      !this.negotiated &&
      version < this.version
    ) {
      this.log.info('cache does not support protocol version, reconnecting. from=%s to=%s', this.version, version)
      this.version = version
      this.sessionId = undefined
      this.serial = undefined
      this.connect()
      return
    }

    const name = ErrorCode[errorCode] || 'Unknown'
    throw new CacheSignaledError(`cache reported an error. code=${errorCode} (${name}) text=${JSON.stringify(errorText)}`, errorCode, errorText)
  }

  protected handleSerialNotify (sessionId: number, serial: number) {
    if (this.state === SessionState.Established) {
      if (sessionId === this.sessionId && serial === this.serial) {
        this.log.trace('ignoring notify for current serial. serial=%s', serial)
        return
      }
      this.log.debug('cache announced new serial. serial=%s', serial)
      this.sendSerialQuery(SessionState.ReceivingDelta)
      return
    }

    this.log.trace('notify during transfer, querying after end of data. serial=%s', serial)
    this.pendingNotify = true
  }

  protected handleCacheResponse (sessionId: number) {
    const awaiting = this.state === SessionState.AwaitingCacheResponse ||
      (this.state === SessionState.ReceivingDelta && !this.table)
    if (!awaiting) {
      throw new UnexpectedPduError('unexpected cache response. state=' + this.state)
    }

    if (this.query === 'reset') {
      this.sessionId = sessionId
      this.table = new VrpTable()
      this.setState(SessionState.ReceivingFullTable)
      return
    }

    if (sessionId !== this.sessionId) {
      throw new ProtocolError(`cache changed session id without a cache reset. expected=${this.sessionId} received=${sessionId}`, ErrorCode.CorruptData)
    }
    this.table = new VrpTable(this.snapshot)
    this.setState(SessionState.ReceivingDelta)
  }

  protected handlePayload (pdu: Pdu) {
    if (!this.table) {
      throw new UnexpectedPduError(`unexpected ${PduType[pdu.type]} outside of a transfer. state=${this.state}`)
    }

    if (isPrefixPdu(pdu)) {
      const { vrp, announce } = vrpFromPdu(pdu)
      if (announce) {
        this.table.announce(vrp)
      } else {
        this.table.withdraw(vrp)
      }
    }
    // Router keys and ASPA records are counted but not kept
  }

  protected handleEndOfData (pdu: EndOfDataPdu) {
    const table = this.table
    if (!table) {
      throw new UnexpectedPduError('unexpected end of data. state=' + this.state)
    }
    if (pdu.sessionId !== this.sessionId) {
      throw new ProtocolError(`end of data for another session. expected=${this.sessionId} received=${pdu.sessionId}`, ErrorCode.CorruptData)
    }

    const now = Date.now()
    const full = this.query === 'reset'
    const stats = table.getStats()
    const changed = full || table.changed || pdu.serial !== this.serial || !this.snapshot

    this.table = undefined
    this.query = undefined
    this.serial = pdu.serial
    this.timing = pdu.timing
    this.lastSync = now
    this.resyncing = false
    this.clearTimer('syncTimer')
    this.backoff.succeeded(now)

    if (changed) {
      this.snapshot = table.commit({ cacheId: this.id, sessionId: this.sessionId, serial: pdu.serial })
      this.stats.sessionCommits.inc({ cache: this.id, kind: full ? 'full' : 'delta' })
      this.stats.sessionVrps.set({ cache: this.id }, this.snapshot.size)
      this.stats.sessionSerial.set({ cache: this.id }, pdu.serial)
      this.log.info('committed %s transfer. serial=%s announced=%s withdrawn=%s vrps=%s',
        full ? 'full' : 'incremental', pdu.serial, stats.announced, stats.withdrawn, stats.size)
    } else {
      this.log.debug('incremental transfer changed nothing. serial=%s', pdu.serial)
    }

    this.setState(SessionState.Established)
    if (changed && this.snapshot) {
      this.emit('commit', this.snapshot, full)
    }

    if (this.pendingNotify) {
      this.pendingNotify = false
      this.sendSerialQuery(SessionState.ReceivingDelta)
      return
    }
    this.scheduleRefresh()
  }

  protected handleCacheReset () {
    if (this.query === 'reset') {
      throw new UnexpectedPduError('cache reset in response to a reset query.')
    }

    this.log.info('cache reset, starting full resynchronization. serial=%s', this.serial)
    this.lastError = 'cache reset'
    this.stats.sessionErrors.inc({ cache: this.id, kind: 'cache' })
    this.sessionId = undefined
    this.serial = undefined
    this.table = undefined
    this.pendingNotify = false
    this.clearTimer('refreshTimer')
    this.beginSync()
    this.setState(SessionState.Connecting)
    this.sendResetQuery()
  }

  protected sendResetQuery () {
    this.query = 'reset'
    this.beginSync()
    if (this.send({ type: PduType.ResetQuery, version: this.version })) {
      this.setState(SessionState.AwaitingCacheResponse)
      this.startResponseTimer()
    }
  }

  protected sendSerialQuery (nextState: SessionState.AwaitingCacheResponse | SessionState.ReceivingDelta) {
    const { sessionId, serial } = this
    if (sessionId === undefined || serial === undefined) {
      this.sendResetQuery()
      return
    }

    this.query = 'serial'
    this.clearTimer('refreshTimer')
    this.beginSync()
    if (this.send({ type: PduType.SerialQuery, version: this.version, sessionId, serial })) {
      this.setState(nextState)
      this.startResponseTimer()
    }
  }

  protected send (pdu: Pdu): boolean {
    if (!this.transport) {
      this.fail(new TransportError('not connected.'))
      return false
    }
    try {
      this.transport.send(encodePdu(pdu))
      return true
    } catch (err) {
      this.fail(err instanceof ProtocolError
        ? err
        : new TransportError('failed to send pdu. type=' + PduType[pdu.type], err))
      return false
    }
  }

  protected beginSync () {
    this.lastSyncStarted = Date.now()
    this.resyncing = true
    this.clearTimer('syncTimer')
    this.syncTimer = setTimeout(() => {
      this.syncTimer = undefined
      this.log.warn('synchronization is taking too long. syncTimeout=%s state=%s', this.timers.syncTimeout, this.state)
      this.emit('health')
    }, this.timers.syncTimeout)
  }

  protected startResponseTimer () {
    this.clearTimer('responseTimer')
    this.responseTimer = setTimeout(() => {
      this.responseTimer = undefined
      this.fail(new TimeoutError('no response from cache.', this.timers.responseTimeout))
    }, this.timers.responseTimeout)
  }

  /**
   * While a transfer is running every PDU restarts its inactivity deadline.
   */
  protected armInactivityTimer () {
    this.clearTimer('inactivityTimer')
    if (!this.table) {
      return
    }
    this.inactivityTimer = setTimeout(() => {
      this.inactivityTimer = undefined
      this.fail(new TimeoutError('transfer stalled before end of data.', this.timers.endOfDataTimeout))
    }, this.timers.endOfDataTimeout)
  }

  protected scheduleRefresh () {
    const interval = this.timers.honorCacheTimers && this.timing
      ? this.timing.refreshInterval * 1000
      : this.timers.refreshInterval

    this.clearTimer('refreshTimer')
    this.refreshTimer = setTimeout(() => {
      this.refreshTimer = undefined
      if (this.state === SessionState.Established) {
        this.log.debug('refresh interval elapsed, polling cache. interval=%s', interval)
        this.sendSerialQuery(SessionState.ReceivingDelta)
      }
    }, interval)
  }

  protected fail (err: unknown) {
    const kind = errorKind(err)
    const message = err instanceof Error ? err.message : String(err)
    this.lastError = message
    this.stats.sessionErrors.inc({ cache: this.id, kind })

    if (err instanceof ProtocolError) {
      this.log.warn('protocol error. code=%s error=%s', ErrorCode[err.rtrErrorCode], message)
      this.reportError(err)
    } else if (kind === 'cache') {
      this.log.warn('cache signaled an error. error=%s', message)
    } else {
      this.log.warn('transport error. error=%s', message)
    }

    const keepContinuity = err instanceof TransportError ||
      (err instanceof CacheSignaledError && err.keepsSerialContinuity)
    if (!keepContinuity) {
      this.sessionId = undefined
      this.serial = undefined
    }

    this.resyncing = false
    this.clearTimer('syncTimer')
    this.teardown()
    this.setState(SessionState.Error)
    this.emit('failure', err)

    if (!this.started) {
      return
    }

    const delay = this.backoff.next(Date.now())
    this.log.debug('reconnecting after backoff. delay=%s attempts=%s', delay, this.backoff.getAttempts())
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined
      this.setState(SessionState.Disconnected)
      this.connect()
    }, delay)
  }

  /**
   * Tell the cache what went wrong before hanging up. Error Reports are never
   * answered with another Error Report.
   */
  protected reportError (err: ProtocolError) {
    const transport = this.transport
    if (!transport) {
      return
    }
    const encapsulatedPdu = err.pdu || Buffer.alloc(0)
    if (encapsulatedPdu.length >= 2 && encapsulatedPdu[1] === PduType.ErrorReport) {
      return
    }

    try {
      transport.send(encodePdu({
        type: PduType.ErrorReport,
        version: this.version,
        errorCode: err.rtrErrorCode,
        encapsulatedPdu,
        errorText: err.message
      }))
    } catch (sendErr) {
      this.log.debug('could not send error report. error=%s', formatError(sendErr))
    }
  }

  protected teardown () {
    this.generation++
    this.clearTimer('connectTimer')
    this.clearTimer('responseTimer')
    this.clearTimer('inactivityTimer')
    this.clearTimer('refreshTimer')
    this.clearTimer('reconnectTimer')
    this.framer.reset()
    this.table = undefined
    this.query = undefined
    this.pendingNotify = false

    const transport = this.transport
    this.transport = undefined
    if (transport) {
      transport.removeAllListeners()
      transport.close()
    }
  }

  protected setState (state: SessionState) {
    if (state === this.state) {
      return
    }
    const previous = this.state
    this.state = state
    this.log.trace('state change. from=%s to=%s', previous, state)
    this.emit('state', state, previous)
  }

  protected clearTimer (name: 'connectTimer' | 'responseTimer' | 'inactivityTimer' | 'refreshTimer' | 'syncTimer' | 'reconnectTimer') {
    const timer = this[name]
    if (timer) {
      clearTimeout(timer)
      this[name] = undefined
    }
  }
}

function errorKind (err: unknown): SessionErrorKind {
  if (err instanceof ProtocolError) return 'protocol'
  if (err instanceof CacheSignaledError) return 'cache'
  return 'transport'
}
