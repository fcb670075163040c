import PrefixTrie from './prefix-trie'
import { vrpSortKey } from './utils'
import { Vrp } from '../types/vrp'
import { AddressFamily, formatAddress, parseAddress, parsePrefix } from '../lib/ip'

export interface SnapshotSource {
  cacheId?: string
  sessionId?: number
  serial?: number
}

/**
 * An immutable, versioned set of VRPs.
 *
 * A snapshot never changes once created. Incremental updates produce a new
 * snapshot that shares unchanged trie nodes with its predecessor.
 */
export default class VrpSnapshot {
  /** Publication counter assigned by the VRP store; zero until published */
  readonly version: number
  readonly cacheId?: string
  readonly sessionId?: number
  readonly serial?: number
  readonly createdAt: number

  readonly ipv4: PrefixTrie<Vrp>
  readonly ipv6: PrefixTrie<Vrp>

  constructor (
    ipv4: PrefixTrie<Vrp>,
    ipv6: PrefixTrie<Vrp>,
    source: SnapshotSource = {},
    version: number = 0,
    createdAt: number = Date.now()
  ) {
    this.ipv4 = ipv4
    this.ipv6 = ipv6
    this.cacheId = source.cacheId
    this.sessionId = source.sessionId
    this.serial = source.serial
    this.version = version
    this.createdAt = createdAt
    Object.freeze(this)
  }

  static empty (source?: SnapshotSource) {
    return new VrpSnapshot(
      PrefixTrie.empty<Vrp>(32, vrpSortKey),
      PrefixTrie.empty<Vrp>(128, vrpSortKey),
      source
    )
  }

  get size () {
    return this.ipv4.size + this.ipv6.size
  }

  get source (): SnapshotSource {
    return { cacheId: this.cacheId, sessionId: this.sessionId, serial: this.serial }
  }

  trie (family: AddressFamily) {
    return family === 4 ? this.ipv4 : this.ipv6
  }

  /**
   * Every VRP whose prefix is equal to or less specific than the given one.
   */
  lookup (prefix: string, length: number): Vrp[] {
    const parsed = parsePrefix(prefix, length)
    return this.trie(parsed.family).covering(parsed.bytes, parsed.length)
  }

  has (vrp: Vrp): boolean {
    const key = vrpSortKey(vrp)
    return this.trie(vrp.family)
      .get(parseAddress(vrp.prefix), vrp.prefixLength)
      .some(existing => vrpSortKey(existing) === key)
  }

  * vrps (family?: AddressFamily): IterableIterator<Vrp> {
    if (family !== 6) yield * this.ipv4.values()
    if (family !== 4) yield * this.ipv6.values()
  }

  /**
   * Distinct origin ASNs, ascending. AS0 authorizes nobody and is left out.
   */
  origins (family?: AddressFamily): number[] {
    const origins = new Set<number>()
    for (const vrp of this.vrps(family)) {
      if (vrp.asn !== 0) origins.add(vrp.asn)
    }
    return Array.from(origins).sort((a, b) => a - b)
  }

  forOrigin (asn: number, family?: AddressFamily): Vrp[] {
    return Array.from(this.vrps(family)).filter(vrp => vrp.asn === asn)
  }

  /**
   * Aggregated prefixes covered by at least one VRP, in CIDR notation.
   */
  covered (family: AddressFamily): string[] {
    return this.trie(family).aggregate()
      .map(({ bytes, length }) => `${formatAddress(bytes)}/${length}`)
  }

  withVersion (version: number): VrpSnapshot {
    return new VrpSnapshot(this.ipv4, this.ipv6, this.source, version, this.createdAt)
  }

  toJSON () {
    return {
      version: this.version,
      cacheId: this.cacheId,
      sessionId: this.sessionId,
      serial: this.serial,
      size: this.size
    }
  }
}
