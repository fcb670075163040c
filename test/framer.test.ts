import { describe, it, expect } from 'vitest'
import PduFramer from '../src/rtr/framer'
import MalformedPduError from '../src/errors/malformed-pdu-error'

const resetQuery = Buffer.from('0202000000000008', 'hex')
const serialQuery = Buffer.from('010100070000000c0000002a', 'hex')

describe('PduFramer', () => {
  it('returns whole pdus from a single chunk', () => {
    const framer = new PduFramer()
    expect(framer.push(Buffer.concat([resetQuery, serialQuery]))).toEqual([resetQuery, serialQuery])
    expect(framer.pending).toBe(0)
  })

  it('reassembles a pdu split across chunks', () => {
    const framer = new PduFramer()
    expect(framer.push(serialQuery.slice(0, 3))).toEqual([])
    expect(framer.push(serialQuery.slice(3, 10))).toEqual([])
    expect(framer.pending).toBe(10)
    expect(framer.push(Buffer.concat([serialQuery.slice(10), resetQuery.slice(0, 4)]))).toEqual([serialQuery])
    expect(framer.pending).toBe(4)
  })

  it('rejects a length below the header size and drops buffered data', () => {
    const framer = new PduFramer()
    expect(() => framer.push(Buffer.from('0202000000000004', 'hex'))).toThrow(MalformedPduError)
    expect(framer.pending).toBe(0)
  })

  it('rejects a length above the maximum pdu size', () => {
    const framer = new PduFramer()
    expect(() => framer.push(Buffer.from('020a000000100000', 'hex'))).toThrow('field=length')
  })
})
