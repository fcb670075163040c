import ProtocolError from './protocol-error'
import { ErrorCode } from '../types/pdu'

export default class WithdrawalOfUnknownRecordError extends ProtocolError {
  constructor (message: string) {
    super(message, ErrorCode.WithdrawalOfUnknownRecord)
  }
}
