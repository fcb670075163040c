import BaseError from 'extensible-error'
import { ErrorCode } from '../types/pdu'

export default class CacheSignaledError extends BaseError {
  /** Undefined for a Cache Reset, the reported code for an Error Report */
  public rtrErrorCode?: number
  public errorText: string

  constructor (message: string, rtrErrorCode?: number, errorText: string = '') {
    super(message)

    this.rtrErrorCode = rtrErrorCode
    this.errorText = errorText
  }

  get keepsSerialContinuity () {
    return this.rtrErrorCode === ErrorCode.NoDataAvailable
  }
}
