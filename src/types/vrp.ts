import { AddressFamily } from '../lib/ip'

/**
 * Validated ROA Payload.
 */
export interface Vrp {
  readonly family: AddressFamily
  /** Canonical text form of the network address */
  readonly prefix: string
  readonly prefixLength: number
  readonly maxLength: number
  readonly asn: number
}

export enum ValidationState {
  Valid = 'valid',
  NotFound = 'not-found',
  Invalid = 'invalid'
}

export interface ValidationResult {
  state: ValidationState
  /** Every VRP whose prefix covers the route */
  covering: Vrp[]
  /** Covering VRPs that authorize the route's origin and length */
  matched: Vrp[]
}
