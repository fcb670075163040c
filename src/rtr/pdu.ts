import { Reader, Writer } from 'oer-utils'
import MalformedPduError from '../errors/malformed-pdu-error'
import {
  Pdu,
  PduType,
  PrefixPdu,
  ErrorCode,
  ProtocolVersion,
  MAX_PROTOCOL_VERSION
} from '../types/pdu'

export const HEADER_LENGTH = 8
/** Upper bound for a single PDU; Error Reports and Router Keys are the only variable-size ones */
export const MAX_PDU_LENGTH = 65536

const SKI_LENGTH = 20

const FIXED_LENGTHS: { [type: number]: number } = {
  [PduType.SerialNotify]: 12,
  [PduType.SerialQuery]: 12,
  [PduType.ResetQuery]: 8,
  [PduType.CacheResponse]: 8,
  [PduType.Ipv4Prefix]: 20,
  [PduType.Ipv6Prefix]: 32,
  [PduType.CacheReset]: 8
}

export interface PduHeader {
  version: number
  type: number
  /** Session id, error code or flags depending on the type */
  field: number
  length: number
}

export function readHeader (buffer: Buffer): PduHeader {
  if (buffer.length < HEADER_LENGTH) {
    throw new MalformedPduError('length', `pdu shorter than header. length=${buffer.length}`, ErrorCode.CorruptData, buffer)
  }
  const reader = new Reader(buffer.slice(0, HEADER_LENGTH))
  return {
    version: reader.readUInt8Number(),
    type: reader.readUInt8Number(),
    field: reader.readUInt16Number(),
    length: reader.readUInt32Number()
  }
}

function isProtocolVersion (version: number): version is ProtocolVersion {
  return Number.isInteger(version) && version >= 0 && version <= MAX_PROTOCOL_VERSION
}

function minimumVersion (type: PduType): ProtocolVersion {
  switch (type) {
    case PduType.RouterKey:
      return 1
    case PduType.Aspa:
      return 2
    default:
      return 0
  }
}

/**
 * Decode exactly one PDU. The buffer must hold the whole PDU and nothing else.
 */
export function decodePdu (buffer: Buffer): Pdu {
  const header = readHeader(buffer)
  const malformed = (field: string, message: string, code: ErrorCode = ErrorCode.CorruptData) =>
    new MalformedPduError(field, message, code, buffer)

  if (!isProtocolVersion(header.version)) {
    throw malformed('version', `unsupported protocol version. version=${header.version}`, ErrorCode.UnsupportedProtocolVersion)
  }
  const version = header.version

  if (!(header.type in PduType) || typeof PduType[header.type] !== 'string') {
    throw malformed('type', `unknown pdu type. type=${header.type}`, ErrorCode.UnsupportedPduType)
  }
  const type: PduType = header.type

  if (version < minimumVersion(type)) {
    throw malformed('type', `pdu type not defined in this version. type=${PduType[type]} version=${version}`, ErrorCode.UnsupportedPduType)
  }

  if (header.length !== buffer.length) {
    throw malformed('length', `declared length does not match pdu. declared=${header.length} actual=${buffer.length}`)
  }

  const expectedLength = type === PduType.EndOfData
    ? (version === 0 ? 12 : 24)
    : FIXED_LENGTHS[type]
  if (expectedLength !== undefined && header.length !== expectedLength) {
    throw malformed('length', `invalid length for ${PduType[type]}. expected=${expectedLength} actual=${header.length}`)
  }

  const requireZero = (field: string, value: number) => {
    if (value !== 0) {
      throw malformed(field, `reserved field is not zero. value=${value}`)
    }
  }

  const reader = new Reader(buffer.slice(HEADER_LENGTH))

  switch (type) {
    case PduType.SerialNotify:
    case PduType.SerialQuery:
      return {
        type,
        version,
        sessionId: header.field,
        serial: reader.readUInt32Number()
      }
    case PduType.ResetQuery:
    case PduType.CacheReset:
      requireZero('zero', header.field)
      return { type, version }
    case PduType.CacheResponse:
      return { type, version, sessionId: header.field }
    case PduType.Ipv4Prefix:
    case PduType.Ipv6Prefix: {
      requireZero('zero', header.field)
      const flags = reader.readUInt8Number()
      const prefixLength = reader.readUInt8Number()
      const maxLength = reader.readUInt8Number()
      requireZero('zero', reader.readUInt8Number())
      const width = type === PduType.Ipv4Prefix ? 32 : 128
      const prefix = reader.readOctetString(width / 8)
      const asn = reader.readUInt32Number()

      if (prefixLength > width) {
        throw malformed('prefixLength', `prefix length exceeds address width. prefixLength=${prefixLength}`)
      }
      if (maxLength > width) {
        throw malformed('maxLength', `max length exceeds address width. maxLength=${maxLength}`)
      }
      if (maxLength < prefixLength) {
        throw malformed('maxLength', `max length shorter than prefix length. prefixLength=${prefixLength} maxLength=${maxLength}`)
      }

      return { type, version, flags, prefixLength, maxLength, prefix, asn }
    }
    case PduType.EndOfData: {
      const serial = reader.readUInt32Number()
      if (version === 0) {
        return { type, version, sessionId: header.field, serial }
      }
      return {
        type,
        version,
        sessionId: header.field,
        serial,
        timing: {
          refreshInterval: reader.readUInt32Number(),
          retryInterval: reader.readUInt32Number(),
          expireInterval: reader.readUInt32Number()
        }
      }
    }
    case PduType.RouterKey: {
      requireZero('zero', header.field & 0xff)
      if (header.length < HEADER_LENGTH + SKI_LENGTH + 4) {
        throw malformed('length', `router key pdu too short. length=${header.length}`)
      }
      const subjectKeyIdentifier = reader.readOctetString(SKI_LENGTH)
      const asn = reader.readUInt32Number()
      const subjectPublicKeyInfo = reader.readOctetString(header.length - HEADER_LENGTH - SKI_LENGTH - 4)
      return { type, version, flags: header.field >> 8, subjectKeyIdentifier, asn, subjectPublicKeyInfo }
    }
    case PduType.ErrorReport: {
      let remaining = header.length - HEADER_LENGTH
      if (remaining < 4) {
        throw malformed('encapsulatedPduLength', 'error report truncated before encapsulated pdu length.')
      }
      const encapsulatedLength = reader.readUInt32Number()
      remaining -= 4
      if (encapsulatedLength > remaining) {
        throw malformed('encapsulatedPduLength', `encapsulated pdu exceeds error report. encapsulatedLength=${encapsulatedLength} remaining=${remaining}`)
      }
      const encapsulatedPdu = reader.readOctetString(encapsulatedLength)
      remaining -= encapsulatedLength
      if (remaining < 4) {
        throw malformed('errorTextLength', 'error report truncated before error text length.')
      }
      const textLength = reader.readUInt32Number()
      remaining -= 4
      if (textLength !== remaining) {
        throw malformed('errorTextLength', `error text length does not match pdu. textLength=${textLength} remaining=${remaining}`)
      }
      const errorText = reader.readOctetString(textLength).toString('utf8')
      return { type, version, errorCode: header.field, encapsulatedPdu, errorText }
    }
    case PduType.Aspa: {
      requireZero('zero', header.field & 0xff)
      const bodyLength = header.length - HEADER_LENGTH
      if (bodyLength < 4 || bodyLength % 4 !== 0) {
        throw malformed('length', `invalid length for Aspa. length=${header.length}`)
      }
      const customerAsn = reader.readUInt32Number()
      const providerAsns: number[] = []
      for (let i = 1; i < bodyLength / 4; i++) {
        providerAsns.push(reader.readUInt32Number())
      }
      return { type, version, flags: header.field >> 8, customerAsn, providerAsns }
    }
  }
}

function checkUInt (field: string, value: number, bits: 8 | 16 | 32) {
  if (!Number.isInteger(value) || value < 0 || value >= 2 ** bits) {
    throw new MalformedPduError(field, `value out of range for uint${bits}. value=${value}`, ErrorCode.InternalError)
  }
}

function checkPrefix (pdu: PrefixPdu) {
  const width = pdu.type === PduType.Ipv4Prefix ? 32 : 128
  if (pdu.prefix.length !== width / 8) {
    throw new MalformedPduError('prefix', `address has wrong size for family. octets=${pdu.prefix.length}`, ErrorCode.InternalError)
  }
  checkUInt('flags', pdu.flags, 8)
  checkUInt('asn', pdu.asn, 32)
  if (!Number.isInteger(pdu.prefixLength) || pdu.prefixLength < 0 || pdu.prefixLength > width) {
    throw new MalformedPduError('prefixLength', `prefix length out of range. prefixLength=${pdu.prefixLength}`, ErrorCode.InternalError)
  }
  if (!Number.isInteger(pdu.maxLength) || pdu.maxLength < pdu.prefixLength || pdu.maxLength > width) {
    throw new MalformedPduError('maxLength', `max length out of range. prefixLength=${pdu.prefixLength} maxLength=${pdu.maxLength}`, ErrorCode.InternalError)
  }
}

function pduLength (pdu: Pdu): number {
  switch (pdu.type) {
    case PduType.EndOfData:
      return pdu.version === 0 ? 12 : 24
    case PduType.RouterKey:
      return HEADER_LENGTH + SKI_LENGTH + 4 + pdu.subjectPublicKeyInfo.length
    case PduType.ErrorReport:
      return HEADER_LENGTH + 4 + pdu.encapsulatedPdu.length + 4 + Buffer.byteLength(pdu.errorText, 'utf8')
    case PduType.Aspa:
      return HEADER_LENGTH + 4 + 4 * pdu.providerAsns.length
    default:
      return FIXED_LENGTHS[pdu.type]
  }
}

function headerField (pdu: Pdu): number {
  switch (pdu.type) {
    case PduType.SerialNotify:
    case PduType.SerialQuery:
    case PduType.CacheResponse:
    case PduType.EndOfData:
      checkUInt('sessionId', pdu.sessionId, 16)
      return pdu.sessionId
    case PduType.ErrorReport:
      checkUInt('errorCode', pdu.errorCode, 16)
      return pdu.errorCode
    case PduType.RouterKey:
    case PduType.Aspa:
      checkUInt('flags', pdu.flags, 8)
      return pdu.flags << 8
    default:
      return 0
  }
}

export function encodePdu (pdu: Pdu): Buffer {
  if (!isProtocolVersion(pdu.version)) {
    throw new MalformedPduError('version', `unsupported protocol version. version=${pdu.version}`, ErrorCode.InternalError)
  }
  if (pdu.version < minimumVersion(pdu.type)) {
    throw new MalformedPduError('type', `pdu type not defined in this version. type=${PduType[pdu.type]} version=${pdu.version}`, ErrorCode.InternalError)
  }

  const length = pduLength(pdu)
  if (length > MAX_PDU_LENGTH) {
    throw new MalformedPduError('length', `pdu too large. length=${length}`, ErrorCode.InternalError)
  }

  const writer = new Writer()
  writer.writeUInt8(pdu.version)
  writer.writeUInt8(pdu.type)
  writer.writeUInt16(headerField(pdu))
  writer.writeUInt32(length)

  switch (pdu.type) {
    case PduType.SerialNotify:
    case PduType.SerialQuery:
      checkUInt('serial', pdu.serial, 32)
      writer.writeUInt32(pdu.serial)
      break
    case PduType.Ipv4Prefix:
    case PduType.Ipv6Prefix:
      checkPrefix(pdu)
      writer.writeUInt8(pdu.flags)
      writer.writeUInt8(pdu.prefixLength)
      writer.writeUInt8(pdu.maxLength)
      writer.writeUInt8(0)
      writer.write(pdu.prefix)
      writer.writeUInt32(pdu.asn)
      break
    case PduType.EndOfData:
      checkUInt('serial', pdu.serial, 32)
      writer.writeUInt32(pdu.serial)
      if (pdu.version > 0) {
        if (!pdu.timing) {
          throw new MalformedPduError('timing', 'end of data requires timing parameters from version 1.', ErrorCode.InternalError)
        }
        checkUInt('refreshInterval', pdu.timing.refreshInterval, 32)
        checkUInt('retryInterval', pdu.timing.retryInterval, 32)
        checkUInt('expireInterval', pdu.timing.expireInterval, 32)
        writer.writeUInt32(pdu.timing.refreshInterval)
        writer.writeUInt32(pdu.timing.retryInterval)
        writer.writeUInt32(pdu.timing.expireInterval)
      }
      break
    case PduType.RouterKey:
      if (pdu.subjectKeyIdentifier.length !== SKI_LENGTH) {
        throw new MalformedPduError('subjectKeyIdentifier', `subject key identifier must be ${SKI_LENGTH} octets.`, ErrorCode.InternalError)
      }
      checkUInt('asn', pdu.asn, 32)
      writer.write(pdu.subjectKeyIdentifier)
      writer.writeUInt32(pdu.asn)
      writer.write(pdu.subjectPublicKeyInfo)
      break
    case PduType.ErrorReport: {
      const text = Buffer.from(pdu.errorText, 'utf8')
      writer.writeUInt32(pdu.encapsulatedPdu.length)
      writer.write(pdu.encapsulatedPdu)
      writer.writeUInt32(text.length)
      writer.write(text)
      break
    }
    case PduType.Aspa:
      checkUInt('customerAsn', pdu.customerAsn, 32)
      writer.writeUInt32(pdu.customerAsn)
      for (const provider of pdu.providerAsns) {
        checkUInt('providerAsns', provider, 32)
        writer.writeUInt32(provider)
      }
      break
  }

  return writer.getBuffer()
}
