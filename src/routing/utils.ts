import { Vrp } from '../types/vrp'
import { PrefixPdu, PduType, isAnnouncement } from '../types/pdu'
import { formatAddress, maskAddress } from '../lib/ip'

/**
 * Order of VRPs sharing a prefix: by origin, then by max length.
 */
export function vrpSortKey (vrp: Vrp): string {
  return String(vrp.asn).padStart(10, '0') + '/' + String(vrp.maxLength).padStart(3, '0')
}

export function formatVrp (vrp: Vrp): string {
  return `${vrp.prefix}/${vrp.prefixLength}-${vrp.maxLength} AS${vrp.asn}`
}

export function formatVrpAsJson (vrp: Vrp) {
  return {
    asn: 'AS' + vrp.asn,
    prefix: `${vrp.prefix}/${vrp.prefixLength}`,
    maxLength: vrp.maxLength
  }
}

export function vrpFromPdu (pdu: PrefixPdu): { vrp: Vrp, announce: boolean } {
  const address = maskAddress(pdu.prefix, pdu.prefixLength)
  return {
    vrp: {
      family: pdu.type === PduType.Ipv4Prefix ? 4 : 6,
      prefix: formatAddress(address),
      prefixLength: pdu.prefixLength,
      maxLength: pdu.maxLength,
      asn: pdu.asn
    },
    announce: isAnnouncement(pdu)
  }
}
