import { Injector } from 'reduct'
import VrpStore from './vrp-store'
import VrpSnapshot from '../routing/vrp-snapshot'
import { create as createLogger, formatError } from '../common/log'
const log = createLogger('event-sink')

export type SnapshotSubscriber = (version: number, snapshot: VrpSnapshot) => void | Promise<void>

/**
 * Tells collaborators about every published snapshot. A failing subscriber is
 * logged and does not affect the others or the publisher.
 */
export default class EventSink {
  protected store: VrpStore
  protected subscribers: Set<SnapshotSubscriber> = new Set()

  constructor (deps: Injector) {
    this.store = deps(VrpStore)
    this.store.on('publish', (snapshot: VrpSnapshot) => this.notify(snapshot))
  }

  /**
   * Returns a function that removes the subscription.
   */
  subscribe (subscriber: SnapshotSubscriber): () => void {
    this.subscribers.add(subscriber)
    return () => {
      this.subscribers.delete(subscriber)
    }
  }

  protected notify (snapshot: VrpSnapshot) {
    for (const subscriber of Array.from(this.subscribers)) {
      try {
        const result = subscriber(snapshot.version, snapshot)
        if (result instanceof Promise) {
          result.catch((err: unknown) => {
            log.error('subscriber failed. version=%s error=%s', snapshot.version, formatError(err))
          })
        }
      } catch (err) {
        log.error('subscriber failed. version=%s error=%s', snapshot.version, formatError(err))
      }
    }
  }
}
