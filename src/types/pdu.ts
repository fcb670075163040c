export type ProtocolVersion = 0 | 1 | 2

export const MAX_PROTOCOL_VERSION: ProtocolVersion = 2

export enum PduType {
  SerialNotify = 0,
  SerialQuery = 1,
  ResetQuery = 2,
  CacheResponse = 3,
  Ipv4Prefix = 4,
  Ipv6Prefix = 6,
  EndOfData = 7,
  CacheReset = 8,
  RouterKey = 9,
  ErrorReport = 10,
  Aspa = 11
}

export enum ErrorCode {
  CorruptData = 0,
  InternalError = 1,
  NoDataAvailable = 2,
  InvalidRequest = 3,
  UnsupportedProtocolVersion = 4,
  UnsupportedPduType = 5,
  WithdrawalOfUnknownRecord = 6,
  DuplicateAnnouncement = 7,
  UnexpectedProtocolVersion = 8,
  AspaProviderListError = 9
}

/** Bit 0 of the flags octet: set for announcements, clear for withdrawals. */
export const FLAG_ANNOUNCE = 0x01

export interface SerialNotifyPdu {
  type: PduType.SerialNotify
  version: ProtocolVersion
  sessionId: number
  serial: number
}

export interface SerialQueryPdu {
  type: PduType.SerialQuery
  version: ProtocolVersion
  sessionId: number
  serial: number
}

export interface ResetQueryPdu {
  type: PduType.ResetQuery
  version: ProtocolVersion
}

export interface CacheResponsePdu {
  type: PduType.CacheResponse
  version: ProtocolVersion
  sessionId: number
}

export interface PrefixPdu {
  type: PduType.Ipv4Prefix | PduType.Ipv6Prefix
  version: ProtocolVersion
  flags: number
  prefixLength: number
  maxLength: number
  /** Raw address octets, 4 for IPv4 and 16 for IPv6 */
  prefix: Buffer
  asn: number
}

export interface EndOfDataTiming {
  refreshInterval: number
  retryInterval: number
  expireInterval: number
}

export interface EndOfDataPdu {
  type: PduType.EndOfData
  version: ProtocolVersion
  sessionId: number
  serial: number
  /** Present from version 1 onwards (seconds) */
  timing?: EndOfDataTiming
}

export interface CacheResetPdu {
  type: PduType.CacheReset
  version: ProtocolVersion
}

export interface RouterKeyPdu {
  type: PduType.RouterKey
  version: ProtocolVersion
  flags: number
  subjectKeyIdentifier: Buffer
  asn: number
  subjectPublicKeyInfo: Buffer
}

export interface ErrorReportPdu {
  type: PduType.ErrorReport
  version: ProtocolVersion
  errorCode: number
  encapsulatedPdu: Buffer
  errorText: string
}

export interface AspaPdu {
  type: PduType.Aspa
  version: ProtocolVersion
  flags: number
  customerAsn: number
  providerAsns: number[]
}

export type Pdu =
  SerialNotifyPdu |
  SerialQueryPdu |
  ResetQueryPdu |
  CacheResponsePdu |
  PrefixPdu |
  EndOfDataPdu |
  CacheResetPdu |
  RouterKeyPdu |
  ErrorReportPdu |
  AspaPdu

export const isPrefixPdu = (pdu: Pdu): pdu is PrefixPdu =>
  pdu.type === PduType.Ipv4Prefix || pdu.type === PduType.Ipv6Prefix

export const isAnnouncement = (pdu: PrefixPdu | RouterKeyPdu | AspaPdu) =>
  (pdu.flags & FLAG_ANNOUNCE) === FLAG_ANNOUNCE
