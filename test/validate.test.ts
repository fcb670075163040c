import { describe, it, expect } from 'vitest'
import { validateRoute } from '../src/routing/validate'
import VrpTable from '../src/routing/vrp-table'
import { ValidationState } from '../src/types/vrp'
import InvalidRouteError from '../src/errors/invalid-route-error'
import { snapshotOf, vrp } from './helpers/pdus'

describe('validateRoute', () => {
  const authorization = vrp('10.0.0.0/8', 24, 65001)
  const snapshot = snapshotOf([authorization])

  it('is valid for a covered route from the authorized origin within max length', () => {
    expect(validateRoute(snapshot, '10.1.0.0', 16, 65001)).toEqual({
      state: ValidationState.Valid,
      covering: [authorization],
      matched: [authorization]
    })
  })

  it('is invalid when the route is longer than the max length', () => {
    expect(validateRoute(snapshot, '10.1.0.0', 25, 65001)).toEqual({
      state: ValidationState.Invalid,
      covering: [authorization],
      matched: []
    })
  })

  it('is invalid when the origin differs', () => {
    expect(validateRoute(snapshot, '10.1.0.0', 16, 65002).state).toBe(ValidationState.Invalid)
  })

  it('is not found without a covering vrp', () => {
    expect(validateRoute(snapshot, '11.0.0.0', 16, 65001)).toEqual({
      state: ValidationState.NotFound,
      covering: [],
      matched: []
    })
  })

  it('does not treat a more specific vrp as covering a shorter route', () => {
    expect(validateRoute(snapshot, '10.0.0.0', 7, 65001).state).toBe(ValidationState.NotFound)
  })

  it('accepts any matching vrp among several covering ones', () => {
    const multi = snapshotOf([
      authorization,
      vrp('10.1.0.0/16', 16, 65002),
      vrp('10.1.0.0/16', 24, 65003)
    ])
    const result = validateRoute(multi, '10.1.2.0', 24, 65003)
    expect(result.state).toBe(ValidationState.Valid)
    expect(result.covering).toHaveLength(3)
    expect(result.matched).toEqual([vrp('10.1.0.0/16', 24, 65003)])

    expect(validateRoute(multi, '10.1.2.0', 24, 65001).state).toBe(ValidationState.Valid)
    expect(validateRoute(multi, '10.1.2.0', 24, 65002).state).toBe(ValidationState.Invalid)
  })

  it('never validates against an AS0 vrp', () => {
    const as0 = snapshotOf([vrp('192.0.2.0/24', 24, 0)])
    expect(validateRoute(as0, '192.0.2.0', 24, 0).state).toBe(ValidationState.Invalid)
    expect(validateRoute(as0, '192.0.2.0', 24, 64496).state).toBe(ValidationState.Invalid)
  })

  it('ignores host bits in the queried prefix', () => {
    expect(validateRoute(snapshot, '10.1.2.3', 16, 65001).state).toBe(ValidationState.Valid)
  })

  it('validates IPv6 routes against IPv6 vrps only', () => {
    const mixed = snapshotOf([authorization, vrp('2001:db8::/32', 48, 65001)])
    expect(validateRoute(mixed, '2001:db8:1::', 48, 65001).state).toBe(ValidationState.Valid)
    expect(validateRoute(mixed, '2001:db8:1::', 64, 65001).state).toBe(ValidationState.Invalid)
    expect(validateRoute(mixed, '2001:db9::', 32, 65001).state).toBe(ValidationState.NotFound)
  })

  it('changes from not found to valid when a matching vrp is added, and back when withdrawn', () => {
    const other = vrp('203.0.113.0/24', 24, 64511)
    const before = snapshotOf([authorization])
    expect(validateRoute(before, '203.0.113.0', 24, 64511).state).toBe(ValidationState.NotFound)

    const add = new VrpTable(before)
    add.announce(other)
    const after = add.commit({})
    expect(validateRoute(after, '203.0.113.0', 24, 64511).state).toBe(ValidationState.Valid)
    expect(validateRoute(after, '10.1.0.0', 16, 65001).state).toBe(ValidationState.Valid)

    const remove = new VrpTable(after)
    remove.withdraw(other)
    expect(validateRoute(remove.commit({}), '203.0.113.0', 24, 64511).state).toBe(ValidationState.NotFound)
  })

  it('rejects malformed requests', () => {
    expect(() => validateRoute(snapshot, '10.0.0.0', 33, 65001)).toThrow(InvalidRouteError)
    expect(() => validateRoute(snapshot, '10.0.0.0', 8, -1)).toThrow(InvalidRouteError)
    expect(() => validateRoute(snapshot, '10.0.0.0', 8, 2 ** 32)).toThrow('origin asn out of range')
    expect(() => validateRoute(snapshot, 'not-an-address', 8, 65001)).toThrow(InvalidRouteError)
  })
})
