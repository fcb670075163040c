import VrpSnapshot from './vrp-snapshot'
import { parsePrefix } from '../lib/ip'
import { ValidationResult, ValidationState } from '../types/vrp'
import InvalidRouteError from '../errors/invalid-route-error'

export const MAX_ASN = 0xffffffff

/**
 * Route origin validation of one route against one snapshot.
 *
 * Any covering VRP rules out NotFound; any covering VRP with the route's origin
 * and a max length at least the route's length makes it Valid. Which of the
 * covering VRPs is most specific plays no role. An AS0 VRP covers but never
 * matches.
 */
export function validateRoute (
  snapshot: VrpSnapshot,
  prefix: string,
  prefixLength: number,
  originAsn: number
): ValidationResult {
  if (!Number.isInteger(originAsn) || originAsn < 0 || originAsn > MAX_ASN) {
    throw new InvalidRouteError('origin asn out of range. asn=' + originAsn)
  }
  const route = parsePrefix(prefix, prefixLength)

  const covering = snapshot.trie(route.family).covering(route.bytes, route.length)
  if (!covering.length) {
    return { state: ValidationState.NotFound, covering, matched: [] }
  }

  const matched = covering.filter(vrp =>
    vrp.asn !== 0 &&
    vrp.asn === originAsn &&
    route.length <= vrp.maxLength
  )

  return {
    state: matched.length ? ValidationState.Valid : ValidationState.Invalid,
    covering,
    matched
  }
}
