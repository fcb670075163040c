import VrpSnapshot, { SnapshotSource } from './vrp-snapshot'
import { TrieEditor } from './prefix-trie'
import { formatVrp } from './utils'
import { Vrp } from '../types/vrp'
import { parseAddress } from '../lib/ip'
import DuplicateAnnouncementError from '../errors/duplicate-announcement-error'
import WithdrawalOfUnknownRecordError from '../errors/withdrawal-of-unknown-record-error'

/**
 * Working table a session accumulates a transfer into.
 *
 * A full transfer starts from an empty table, an incremental one from the
 * session's last committed snapshot. Either way nothing is visible outside the
 * table until `commit` returns the new snapshot; the base snapshot is never
 * modified.
 */
export default class VrpTable {
  private ipv4: TrieEditor<Vrp>
  private ipv6: TrieEditor<Vrp>
  private announced: number = 0
  private withdrawn: number = 0

  constructor (base: VrpSnapshot = VrpSnapshot.empty()) {
    this.ipv4 = base.ipv4.edit()
    this.ipv6 = base.ipv6.edit()
  }

  get size () {
    return this.ipv4.size + this.ipv6.size
  }

  get changed () {
    return this.announced > 0 || this.withdrawn > 0
  }

  getStats () {
    return { announced: this.announced, withdrawn: this.withdrawn, size: this.size }
  }

  announce (vrp: Vrp) {
    if (!this.editor(vrp).add(parseAddress(vrp.prefix), vrp.prefixLength, vrp)) {
      throw new DuplicateAnnouncementError('duplicate announcement. vrp=' + formatVrp(vrp))
    }
    this.announced++
  }

  withdraw (vrp: Vrp) {
    if (!this.editor(vrp).remove(parseAddress(vrp.prefix), vrp.prefixLength, vrp)) {
      throw new WithdrawalOfUnknownRecordError('withdrawal of unknown record. vrp=' + formatVrp(vrp))
    }
    this.withdrawn++
  }

  /**
   * Seal the table into a snapshot. The table can not be edited afterwards.
   */
  commit (source: SnapshotSource): VrpSnapshot {
    return new VrpSnapshot(this.ipv4.freeze(), this.ipv6.freeze(), source)
  }

  private editor (vrp: Vrp) {
    return vrp.family === 4 ? this.ipv4 : this.ipv6
  }
}
