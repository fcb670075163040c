import BaseError from 'extensible-error'

export default class InvalidRouteError extends BaseError {
  public httpErrorCode: number

  constructor (message: string) {
    super(message)

    this.httpErrorCode = 400
  }
}
