import { isIPv4, isIPv6 } from 'net'
import InvalidRouteError from '../errors/invalid-route-error'

export type AddressFamily = 4 | 6

export interface ParsedPrefix {
  family: AddressFamily
  /** Canonical text form of the (masked) network address */
  address: string
  bytes: Buffer
  length: number
}

export const familyWidth = (family: AddressFamily) => family === 4 ? 32 : 128

export const familyOfBytes = (bytes: Buffer): AddressFamily => bytes.length === 4 ? 4 : 6

export function parseAddress (text: string): Buffer {
  if (isIPv4(text)) {
    return Buffer.from(text.split('.').map(Number))
  }
  if (!isIPv6(text)) {
    throw new InvalidRouteError('invalid ip address. address=' + text)
  }

  const bytes = Buffer.alloc(16)
  let groups: number[]
  const [head, tail] = splitEmbeddedIpv4(text)

  if (head.includes('::')) {
    const [left, right] = head.split('::')
    const leftGroups = parseGroups(left)
    const rightGroups = parseGroups(right)
    const missing = (tail ? 6 : 8) - leftGroups.length - rightGroups.length
    groups = [...leftGroups, ...new Array<number>(missing).fill(0), ...rightGroups]
  } else {
    groups = parseGroups(head)
  }

  groups.forEach((group, i) => bytes.writeUInt16BE(group, i * 2))
  if (tail) {
    tail.copy(bytes, 12)
  }
  return bytes
}

function splitEmbeddedIpv4 (text: string): [string, Buffer | undefined] {
  const lastColon = text.lastIndexOf(':')
  const last = text.slice(lastColon + 1)
  if (!isIPv4(last)) {
    return [text, undefined]
  }
  // Keep a trailing '::' intact when the IPv4 part follows it directly
  const head = text[lastColon - 1] === ':' ? text.slice(0, lastColon + 1) : text.slice(0, lastColon)
  return [head, Buffer.from(last.split('.').map(Number))]
}

function parseGroups (text: string): number[] {
  return text === '' ? [] : text.split(':').map(group => parseInt(group, 16))
}

/**
 * Format address octets as text, compressing the longest run of zero groups
 * in IPv6 addresses.
 */
export function formatAddress (bytes: Buffer): string {
  if (bytes.length === 4) {
    return Array.from(bytes).join('.')
  }

  const groups: number[] = []
  for (let i = 0; i < 16; i += 2) {
    groups.push(bytes.readUInt16BE(i))
  }

  let bestStart = -1
  let bestLength = 0
  for (let i = 0; i < groups.length; i++) {
    if (groups[i] !== 0) continue
    let j = i
    while (j < groups.length && groups[j] === 0) j++
    if (j - i > bestLength) {
      bestStart = i
      bestLength = j - i
    }
    i = j
  }

  const hex = groups.map(group => group.toString(16))
  if (bestLength < 2) {
    return hex.join(':')
  }
  return hex.slice(0, bestStart).join(':') + '::' + hex.slice(bestStart + bestLength).join(':')
}

export function maskAddress (bytes: Buffer, length: number): Buffer {
  const masked = Buffer.from(bytes)
  for (let i = 0; i < masked.length; i++) {
    const bitsInByte = Math.max(0, Math.min(8, length - i * 8))
    masked[i] &= bitsInByte === 0 ? 0 : (0xff << (8 - bitsInByte)) & 0xff
  }
  return masked
}

export function hasHostBits (bytes: Buffer, length: number): boolean {
  return !maskAddress(bytes, length).equals(bytes)
}

/**
 * Bit `index` of the address, most significant bit first.
 */
export function getBit (bytes: Buffer, index: number): 0 | 1 {
  return (bytes[index >> 3] >> (7 - (index & 7))) & 1 ? 1 : 0
}

export function parsePrefix (address: string, length: number): ParsedPrefix {
  const bytes = parseAddress(address)
  const family = familyOfBytes(bytes)

  if (!Number.isInteger(length) || length < 0 || length > familyWidth(family)) {
    throw new InvalidRouteError(`invalid prefix length. address=${address} length=${length}`)
  }

  const masked = maskAddress(bytes, length)
  return {
    family,
    address: formatAddress(masked),
    bytes: masked,
    length
  }
}

/**
 * Parse CIDR notation such as `10.0.0.0/8` or `2001:db8::/32`.
 */
export function parseCidr (cidr: string): ParsedPrefix {
  const slash = cidr.lastIndexOf('/')
  if (slash === -1) {
    throw new InvalidRouteError('prefix is missing a length. prefix=' + cidr)
  }
  const lengthText = cidr.slice(slash + 1)
  if (!/^\d{1,3}$/.test(lengthText)) {
    throw new InvalidRouteError('invalid prefix length. prefix=' + cidr)
  }
  return parsePrefix(cidr.slice(0, slash), Number(lengthText))
}
