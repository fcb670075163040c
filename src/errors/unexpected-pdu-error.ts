import ProtocolError from './protocol-error'
import { ErrorCode } from '../types/pdu'

export default class UnexpectedPduError extends ProtocolError {
  constructor (message: string, pdu?: Buffer) {
    super(message, ErrorCode.CorruptData, pdu)
  }
}
