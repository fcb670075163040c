import ProtocolError from './protocol-error'
import { ErrorCode } from '../types/pdu'

export default class MalformedPduError extends ProtocolError {
  public field: string

  constructor (field: string, message: string, rtrErrorCode: ErrorCode = ErrorCode.CorruptData, pdu?: Buffer) {
    super(`malformed pdu. field=${field} ${message}`, rtrErrorCode, pdu)

    this.field = field
  }
}
