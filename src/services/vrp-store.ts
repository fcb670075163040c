import { EventEmitter } from 'events'
import { Injector } from 'reduct'
import VrpSnapshot from '../routing/vrp-snapshot'
import Stats from './stats'
import { create as createLogger } from '../common/log'
const log = createLogger('vrp-store')

/**
 * Holds the externally visible VRP snapshot.
 *
 * Publishing swaps a single reference, so a reader holding the result of
 * `current()` keeps a complete snapshot no matter what is published after.
 * Emits `publish` (snapshot) and `availability` (available).
 */
export default class VrpStore extends EventEmitter {
  protected stats: Stats
  protected snapshot: VrpSnapshot = VrpSnapshot.empty()
  protected version: number = 0
  protected available: boolean = false

  constructor (deps: Injector) {
    super()
    this.stats = deps(Stats)
  }

  current (): VrpSnapshot {
    return this.snapshot
  }

  getVersion () {
    return this.version
  }

  isAvailable () {
    return this.available
  }

  /**
   * Install a snapshot as current. Returns the snapshot with its assigned
   * version, which is what readers will see.
   */
  publish (snapshot: VrpSnapshot): VrpSnapshot {
    const published = snapshot.withVersion(++this.version)
    this.snapshot = published
    this.stats.publishedVersion.set(published.version)

    log.info('published vrp snapshot. version=%s cache=%s serial=%s vrps=%s',
      published.version, published.cacheId, published.serial, published.size)

    this.setAvailable(true)
    this.emit('publish', published)
    return published
  }

  /**
   * Availability is decided by the session pool; the store keeps the last
   * snapshot either way.
   */
  setAvailable (available: boolean) {
    if (available === this.available) {
      return
    }
    this.available = available
    if (available) {
      log.info('vrp table available.')
    } else {
      log.warn('vrp table unavailable. version=%s', this.version)
    }
    this.emit('availability', available)
  }
}
