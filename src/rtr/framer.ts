import MalformedPduError from '../errors/malformed-pdu-error'
import { HEADER_LENGTH, MAX_PDU_LENGTH } from './pdu'

/**
 * Splits a byte stream into whole PDUs using the length field of each header.
 */
export default class PduFramer {
  private buffered: Buffer = Buffer.alloc(0)

  get pending () {
    return this.buffered.length
  }

  push (chunk: Buffer): Buffer[] {
    this.buffered = this.buffered.length ? Buffer.concat([this.buffered, chunk]) : chunk

    const pdus: Buffer[] = []
    while (this.buffered.length >= HEADER_LENGTH) {
      const length = this.buffered.readUInt32BE(4)
      if (length < HEADER_LENGTH || length > MAX_PDU_LENGTH) {
        const header = this.buffered.slice(0, HEADER_LENGTH)
        this.reset()
        throw new MalformedPduError('length', `pdu length out of bounds. length=${length}`, undefined, header)
      }
      if (this.buffered.length < length) {
        break
      }
      pdus.push(this.buffered.slice(0, length))
      this.buffered = this.buffered.slice(length)
    }
    return pdus
  }

  reset () {
    this.buffered = Buffer.alloc(0)
  }
}
