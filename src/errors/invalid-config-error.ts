import BaseError from 'extensible-error'
import { ErrorObject } from 'ajv'

export default class InvalidConfigError extends BaseError {
  protected validationErrors: ErrorObject[]

  constructor (message: string, validationErrors: ErrorObject[]) {
    super(message)

    this.validationErrors = validationErrors
  }

  debugPrint (log: (message: string) => void, validationError?: ErrorObject) {
    if (!validationError) {
      for (const ve of this.validationErrors) {
        this.debugPrint(log, ve)
      }
      return
    }

    const additionalInfo = Object.keys(validationError.params)
      .map(key => `${key}=${validationError.params[key]}`)
      .join(' ')

    log(`-- ${validationError.instancePath}: ${validationError.message}. ${additionalInfo}`)
  }
}
