import BaseError from 'extensible-error'
import { ErrorCode } from '../types/pdu'

export default class ProtocolError extends BaseError {
  public rtrErrorCode: ErrorCode
  /** Bytes of the PDU that caused the error, echoed back in the Error Report */
  public pdu?: Buffer

  constructor (message: string, rtrErrorCode: ErrorCode = ErrorCode.CorruptData, pdu?: Buffer) {
    super(message)

    this.rtrErrorCode = rtrErrorCode
    this.pdu = pdu
  }
}
