import ProtocolError from './protocol-error'
import { ErrorCode } from '../types/pdu'

export default class UnsupportedVersionError extends ProtocolError {
  public receivedVersion: number

  constructor (message: string, receivedVersion: number, rtrErrorCode: ErrorCode = ErrorCode.UnexpectedProtocolVersion, pdu?: Buffer) {
    super(message + ' version=' + receivedVersion, rtrErrorCode, pdu)

    this.receivedVersion = receivedVersion
  }
}
