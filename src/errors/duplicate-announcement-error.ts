import ProtocolError from './protocol-error'
import { ErrorCode } from '../types/pdu'

export default class DuplicateAnnouncementError extends ProtocolError {
  constructor (message: string) {
    super(message, ErrorCode.DuplicateAnnouncement)
  }
}
