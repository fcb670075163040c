import { BackoffConfig } from '../types/config'

/**
 * Exponential reconnect delay: `base`, doubling on every consecutive failure up
 * to `max`. A session that stayed synchronized for at least `resetAfter` before
 * failing starts over from `base`.
 */
export default class Backoff {
  private base: number
  private max: number
  private resetAfter: number
  private attempts: number = 0
  private syncedSince?: number

  constructor ({ base, max, resetAfter }: BackoffConfig) {
    this.base = base
    this.max = Math.max(base, max)
    this.resetAfter = resetAfter
  }

  getAttempts () {
    return this.attempts
  }

  /**
   * Record that the session reached a synchronized state.
   */
  succeeded (now: number = Date.now()) {
    if (this.syncedSince === undefined) {
      this.syncedSince = now
    }
  }

  /**
   * Delay before the next attempt after a failure.
   */
  next (now: number = Date.now()): number {
    if (this.syncedSince !== undefined && now - this.syncedSince >= this.resetAfter) {
      this.attempts = 0
    }
    this.syncedSince = undefined

    const delay = Math.min(this.max, this.base * 2 ** this.attempts)
    if (delay < this.max) {
      this.attempts++
    }
    return delay
  }
}
