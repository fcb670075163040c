import { encodePdu } from '../../src/rtr/pdu'
import { parseCidr } from '../../src/lib/ip'
import { EndOfDataTiming, Pdu, PduType, ProtocolVersion } from '../../src/types/pdu'
import { CacheConfig, SessionTimers } from '../../src/types/config'
import { Vrp } from '../../src/types/vrp'
import VrpTable from '../../src/routing/vrp-table'
import VrpSnapshot from '../../src/routing/vrp-snapshot'

export const DEFAULT_TIMING: EndOfDataTiming = { refreshInterval: 3600, retryInterval: 600, expireInterval: 7200 }

export const cacheResponse = (sessionId: number, version: ProtocolVersion = 2): Pdu =>
  ({ type: PduType.CacheResponse, version, sessionId })

export const serialNotify = (sessionId: number, serial: number, version: ProtocolVersion = 2): Pdu =>
  ({ type: PduType.SerialNotify, version, sessionId, serial })

export const cacheReset = (version: ProtocolVersion = 2): Pdu =>
  ({ type: PduType.CacheReset, version })

export const endOfData = (
  sessionId: number,
  serial: number,
  version: ProtocolVersion = 2,
  timing: EndOfDataTiming = DEFAULT_TIMING
): Pdu => version === 0
  ? { type: PduType.EndOfData, version, sessionId, serial }
  : { type: PduType.EndOfData, version, sessionId, serial, timing }

export const errorReport = (errorCode: number, errorText: string = '', version: ProtocolVersion = 2): Pdu =>
  ({ type: PduType.ErrorReport, version, errorCode, encapsulatedPdu: Buffer.alloc(0), errorText })

export const prefix = (
  cidr: string,
  maxLength: number,
  asn: number,
  announce: boolean = true,
  version: ProtocolVersion = 2
): Pdu => {
  const parsed = parseCidr(cidr)
  return {
    type: parsed.family === 4 ? PduType.Ipv4Prefix : PduType.Ipv6Prefix,
    version,
    flags: announce ? 1 : 0,
    prefixLength: parsed.length,
    maxLength,
    prefix: parsed.bytes,
    asn
  }
}

export const prefixBytes = (cidr: string, maxLength: number, asn: number, announce: boolean = true) =>
  encodePdu(prefix(cidr, maxLength, asn, announce))

export const vrp = (cidr: string, maxLength: number, asn: number): Vrp => {
  const parsed = parseCidr(cidr)
  return { family: parsed.family, prefix: parsed.address, prefixLength: parsed.length, maxLength, asn }
}

export const snapshotOf = (vrps: Vrp[], serial?: number): VrpSnapshot => {
  const table = new VrpTable()
  for (const entry of vrps) {
    table.announce(entry)
  }
  return table.commit({ cacheId: 'test', sessionId: 1, serial })
}

export const cacheConfig = (id: string, overrides: Partial<CacheConfig> = {}): CacheConfig => ({
  id,
  host: id + '.test',
  port: 323,
  transport: 'tcp',
  preference: 100,
  protocolVersion: 2,
  backoff: { base: 1000, max: 600000, resetAfter: 60000 },
  ...overrides
})

export const sessionTimers = (overrides: Partial<SessionTimers> = {}): SessionTimers => ({
  refreshInterval: 3600000,
  honorCacheTimers: true,
  connectTimeout: 10000,
  responseTimeout: 30000,
  endOfDataTimeout: 60000,
  syncTimeout: 300000,
  ...overrides
})
