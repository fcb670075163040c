import { Injector } from 'reduct'
import { sortBy } from 'lodash'
import Config from './config'
import Stats from './stats'
import Transports from './transports'
import VrpStore from './vrp-store'
import RtrSession, { SessionState, SessionStatus } from '../rtr/session'
import VrpSnapshot from '../routing/vrp-snapshot'
import { CacheConfig } from '../types/config'
import { create as createLogger } from '../common/log'
const log = createLogger('session-pool')

export interface PoolStatus {
  available: boolean
  /** Id of the session whose snapshot is published */
  authoritative?: string
  version: number
  sessionId?: number
  serial?: number
  /** Time since the authoritative session last completed a synchronization (ms) */
  staleness?: number
  sessions: SessionStatus[]
}

/**
 * Runs one RTR session per configured cache and decides which session's
 * snapshot is published.
 *
 * Selection runs synchronously whenever a session reports a state change, a
 * commit or a change in health, so the store only ever has one writer.
 */
export default class SessionPool {
  protected config: Config
  protected stats: Stats
  protected transports: Transports
  protected store: VrpStore

  protected sessions: RtrSession[] = []
  protected authoritative?: RtrSession
  /** Session snapshot last handed to the store, before versioning */
  protected published?: VrpSnapshot
  protected stalenessTimer?: NodeJS.Timeout
  protected started: boolean = false

  constructor (deps: Injector) {
    this.config = deps(Config)
    this.stats = deps(Stats)
    this.transports = deps(Transports)
    this.store = deps(VrpStore)
  }

  start () {
    if (this.started) {
      return
    }
    this.started = true

    if (!this.sessions.length) {
      this.sessions = this.config.caches.map(cache => this.createSession(cache))
    }
    if (!this.sessions.length) {
      log.warn('no caches configured, validation will stay unavailable.')
    }

    for (const session of this.sessions) {
      session.start()
    }
    this.select()
  }

  stop () {
    if (!this.started) {
      return
    }
    this.started = false
    this.clearStalenessTimer()
    for (const session of this.sessions) {
      session.stop()
    }
  }

  getSessions () {
    return this.sessions.slice()
  }

  getSession (id: string) {
    return this.sessions.find(session => session.id === id)
  }

  getAuthoritative () {
    return this.authoritative
  }

  getStatus (now: number = Date.now()): PoolStatus {
    const lastSync = this.authoritative && this.authoritative.getLastSync()
    return {
      available: this.store.isAvailable(),
      authoritative: this.authoritative && this.authoritative.id,
      version: this.store.getVersion(),
      sessionId: this.published && this.published.sessionId,
      serial: this.published && this.published.serial,
      staleness: lastSync === undefined ? undefined : now - lastSync,
      sessions: this.sessions.map(session => session.getStatus(now))
    }
  }

  /**
   * Pick the authoritative session and publish its snapshot if it changed.
   *
   * Healthy sessions come first: the current authoritative one while it stays
   * healthy, otherwise the lowest preference, then configuration order. A
   * session that is resynchronizing only counts while its snapshot is within
   * the staleness ceiling. Without a healthy session the most recently
   * synchronized snapshot within the ceiling is used. Without one of those the
   * table is unavailable.
   */
  select (now: number = Date.now()) {
    this.clearStalenessTimer()

    const healthy = this.sessions.filter(session => this.isUsable(session, now))
    let chosen: RtrSession | undefined
    let stale = false

    if (this.authoritative && healthy.includes(this.authoritative)) {
      chosen = this.authoritative
    } else if (healthy.length) {
      chosen = sortBy(healthy, session => session.getPreference())[0]
    } else {
      const fresh = this.sessions.filter(session => {
        const lastSync = session.getLastSync()
        return session.getSnapshot() !== undefined &&
          lastSync !== undefined &&
          now - lastSync < this.config.stalenessCeiling
      })
      chosen = sortBy(fresh, session => -(session.getLastSync() || 0), session => session.getPreference())[0]
      stale = true
    }

    if (chosen !== this.authoritative) {
      log.info('authoritative session changed. from=%s to=%s stale=%s',
        this.authoritative ? this.authoritative.id : '-', chosen ? chosen.id : '-', stale)
      this.authoritative = chosen
    }

    const snapshot = chosen && chosen.getSnapshot()
    if (!chosen || !snapshot) {
      this.store.setAvailable(false)
      return
    }

    if (snapshot !== this.published) {
      this.published = snapshot
      this.store.publish(snapshot)
    } else {
      this.store.setAvailable(true)
    }

    const lastSync = chosen.getLastSync()
    const expires = stale || chosen.getState() !== SessionState.Established
    if (expires && lastSync !== undefined && this.started) {
      const delay = Math.max(0, lastSync + this.config.stalenessCeiling - now)
      this.stalenessTimer = setTimeout(() => {
        this.stalenessTimer = undefined
        this.select()
      }, delay)
    }
  }

  /**
   * Healthy, and unless synchronized, holding a snapshot younger than the
   * staleness ceiling.
   */
  protected isUsable (session: RtrSession, now: number): boolean {
    if (!session.isHealthy(now)) {
      return false
    }
    if (session.getState() === SessionState.Established) {
      return true
    }
    const lastSync = session.getLastSync()
    return lastSync !== undefined && now - lastSync < this.config.stalenessCeiling
  }

  protected createSession (cache: CacheConfig): RtrSession {
    const session = new RtrSession({
      cache,
      timers: this.config.getSessionTimers(),
      connector: this.transports.connect,
      stats: this.stats
    })

    session.on('state', () => this.select())
    session.on('commit', () => this.select())
    session.on('health', () => this.select())
    session.on('failure', (err: unknown) => {
      log.debug('session failed. id=%s error=%s', session.id, err instanceof Error ? err.message : String(err))
    })

    return session
  }

  protected clearStalenessTimer () {
    if (this.stalenessTimer) {
      clearTimeout(this.stalenessTimer)
      this.stalenessTimer = undefined
    }
  }
}
