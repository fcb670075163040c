import BaseError from 'extensible-error'

export default class TransportError extends BaseError {
  public cause?: unknown

  constructor (message: string, cause?: unknown) {
    super(message)

    this.cause = cause
  }
}
