import { Injector } from 'reduct'
import VrpStore from './vrp-store'
import Stats from './stats'
import { validateRoute } from '../routing/validate'
import { ValidationResult } from '../types/vrp'
import StalenessExceededError from '../errors/staleness-exceeded-error'

export default class Validator {
  protected store: VrpStore
  protected stats: Stats

  constructor (deps: Injector) {
    this.store = deps(VrpStore)
    this.stats = deps(Stats)
  }

  /**
   * Validate a route against the current snapshot. Throws
   * StalenessExceededError while no usable VRP data is available; whether to
   * treat that as Valid or Invalid is up to the caller.
   */
  validate (prefix: string, prefixLength: number, originAsn: number): ValidationResult {
    const snapshot = this.store.current()
    if (!this.store.isAvailable()) {
      const version = this.store.getVersion()
      throw new StalenessExceededError(
        'vrp data unavailable. version=' + version,
        version ? Date.now() - snapshot.createdAt : undefined
      )
    }

    const result = validateRoute(snapshot, prefix, prefixLength, originAsn)
    this.stats.validations.inc({ state: result.state })
    return result
  }
}
