import TransportError from './transport-error'

export default class TimeoutError extends TransportError {
  public timeout: number

  constructor (message: string, timeout: number) {
    super(message + ' timeout=' + timeout)

    this.timeout = timeout
  }
}
