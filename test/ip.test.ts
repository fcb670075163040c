import { describe, it, expect } from 'vitest'
import {
  formatAddress,
  hasHostBits,
  maskAddress,
  parseAddress,
  parseCidr,
  parsePrefix
} from '../src/lib/ip'
import InvalidRouteError from '../src/errors/invalid-route-error'

describe('ip helpers', () => {
  it('parses and formats IPv4 addresses', () => {
    expect(parseAddress('192.0.2.1')).toEqual(Buffer.from([192, 0, 2, 1]))
    expect(formatAddress(Buffer.from([198, 51, 100, 0]))).toBe('198.51.100.0')
  })

  it('parses compressed IPv6 addresses', () => {
    expect(parseAddress('2001:db8::1').toString('hex')).toBe('20010db8000000000000000000000001')
    expect(parseAddress('::').toString('hex')).toBe('00000000000000000000000000000000')
    expect(parseAddress('::ffff:192.0.2.1').toString('hex')).toBe('00000000000000000000ffffc0000201')
  })

  it('formats IPv6 addresses with the longest zero run compressed', () => {
    expect(formatAddress(parseAddress('2001:0db8:0000:0000:0001:0000:0000:0000'))).toBe('2001:db8:0:0:1::')
    expect(formatAddress(parseAddress('2001:db8:0:1:0:0:0:1'))).toBe('2001:db8:0:1::1')
    expect(formatAddress(parseAddress('2001:db8:1:2:3:4:0:5'))).toBe('2001:db8:1:2:3:4:0:5')
  })

  it('rejects malformed addresses', () => {
    expect(() => parseAddress('192.0.2')).toThrow(InvalidRouteError)
    expect(() => parseAddress('2001:db8:::1')).toThrow(InvalidRouteError)
  })

  it('masks host bits', () => {
    expect(maskAddress(Buffer.from([10, 1, 2, 3]), 12)).toEqual(Buffer.from([10, 0, 0, 0]))
    expect(hasHostBits(Buffer.from([10, 1, 0, 0]), 16)).toBe(false)
    expect(hasHostBits(Buffer.from([10, 1, 0, 0]), 8)).toBe(true)
  })

  it('parses prefixes into their canonical network address', () => {
    expect(parsePrefix('10.1.2.3', 16)).toEqual({
      family: 4,
      address: '10.1.0.0',
      bytes: Buffer.from([10, 1, 0, 0]),
      length: 16
    })
    expect(parseCidr('2001:db8:ffff::/32').address).toBe('2001:db8::')
  })

  it('rejects prefix lengths outside the family width', () => {
    expect(() => parsePrefix('10.0.0.0', 33)).toThrow(InvalidRouteError)
    expect(() => parsePrefix('2001:db8::', 129)).toThrow(InvalidRouteError)
    expect(() => parseCidr('10.0.0.0')).toThrow('prefix is missing a length')
    expect(() => parseCidr('10.0.0.0/x')).toThrow('invalid prefix length')
  })
})
