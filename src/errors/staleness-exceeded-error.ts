import BaseError from 'extensible-error'

export default class StalenessExceededError extends BaseError {
  public httpErrorCode: number
  /** Age of the last published snapshot (ms), if there is one */
  public staleness?: number

  constructor (message: string, staleness?: number) {
    super(message)

    this.httpErrorCode = 503
    this.staleness = staleness
  }
}
