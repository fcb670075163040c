import { sortedIndexBy } from 'lodash'
import { getBit } from '../lib/ip'

interface TrieNode<T> {
  /** Edit session allowed to mutate this node in place */
  owner?: object
  children: [TrieNode<T> | undefined, TrieNode<T> | undefined]
  items: T[]
}

export interface TrieEntry<T> {
  bytes: Buffer
  length: number
  items: readonly T[]
}

/**
 * An immutable binary trie where the members' keys represent IP prefixes.
 * Every node may hold several items (kept sorted by `sortKey`); looking up a
 * prefix returns the items of every node on the path from the root, i.e. of
 * every stored prefix that covers it.
 *
 * Example:
 *   let editor = PrefixTrie.empty<string>(32, s => s).edit()
 *   editor.add(Buffer.from([10, 0, 0, 0]), 8, 'a')
 *   editor.add(Buffer.from([10, 1, 0, 0]), 16, 'b')
 *   const trie = editor.freeze()
 *   trie.covering(Buffer.from([10, 1, 2, 0]), 24) // ⇒ ['a', 'b']
 *   trie.covering(Buffer.from([10, 2, 0, 0]), 16) // ⇒ ['a']
 *   trie.covering(Buffer.from([11, 0, 0, 0]), 8)  // ⇒ []
 *
 * Edits happen through a `TrieEditor`, which copies each node it touches once
 * and shares everything else with the trie it started from.
 */
export default class PrefixTrie<T> {
  readonly width: number
  readonly sortKey: (item: T) => string
  protected root?: TrieNode<T>
  protected count: number

  constructor (width: number, sortKey: (item: T) => string, root?: TrieNode<T>, count: number = 0) {
    this.width = width
    this.sortKey = sortKey
    this.root = root
    this.count = count
  }

  static empty<T> (width: number, sortKey: (item: T) => string) {
    return new PrefixTrie<T>(width, sortKey)
  }

  get size () {
    return this.count
  }

  /**
   * Items stored at any prefix that is equal to or less specific than the
   * given prefix, least specific first.
   */
  covering (bytes: Buffer, length: number): T[] {
    const result: T[] = []
    let node = this.root
    for (let depth = 0; node; depth++) {
      result.push(...node.items)
      if (depth === length) break
      node = node.children[getBit(bytes, depth)]
    }
    return result
  }

  get (bytes: Buffer, length: number): readonly T[] {
    let node = this.root
    for (let depth = 0; node && depth < length; depth++) {
      node = node.children[getBit(bytes, depth)]
    }
    return node ? node.items : []
  }

  /**
   * Walk every populated prefix in address order, shorter prefixes first.
   */
  * entries (): IterableIterator<TrieEntry<T>> {
    const bits: number[] = []
    const trie = this

    function * walk (node: TrieNode<T>): IterableIterator<TrieEntry<T>> {
      if (node.items.length) {
        yield { bytes: trie.bitsToBytes(bits), length: bits.length, items: node.items }
      }
      for (const bit of [0, 1]) {
        const child = node.children[bit]
        if (child) {
          bits.push(bit)
          yield * walk(child)
          bits.pop()
        }
      }
    }

    if (this.root) {
      yield * walk(this.root)
    }
  }

  * values (): IterableIterator<T> {
    for (const entry of this.entries()) {
      yield * entry.items
    }
  }

  /**
   * The smallest set of prefixes that together cover every populated prefix:
   * nested prefixes collapse into their shortest cover and sibling pairs merge
   * into their parent.
   */
  aggregate (): { bytes: Buffer, length: number }[] {
    const bits: number[] = []
    const collect = (node: TrieNode<T>): { bytes: Buffer, length: number }[] => {
      if (node.items.length) {
        return [{ bytes: this.bitsToBytes(bits), length: bits.length }]
      }
      const parts: { bytes: Buffer, length: number }[][] = []
      for (const bit of [0, 1]) {
        const child = node.children[bit]
        bits.push(bit)
        parts.push(child ? collect(child) : [])
        bits.pop()
      }
      const [left, right] = parts
      if (
        left.length === 1 && left[0].length === bits.length + 1 &&
        right.length === 1 && right[0].length === bits.length + 1
      ) {
        return [{ bytes: this.bitsToBytes(bits), length: bits.length }]
      }
      return left.concat(right)
    }

    return this.root ? collect(this.root) : []
  }

  edit (): TrieEditor<T> {
    return new TrieEditor(this.width, this.sortKey, this.root, this.count)
  }

  toJSON () {
    return Array.from(this.values())
  }

  protected bitsToBytes (bits: number[]): Buffer {
    const bytes = Buffer.alloc(this.width / 8)
    bits.forEach((bit, i) => {
      if (bit) bytes[i >> 3] |= 0x80 >> (i & 7)
    })
    return bytes
  }
}

/**
 * Transient view of a trie. Nodes created by this editor are mutated in place;
 * nodes shared with the original trie are copied before being changed, so the
 * original never observes an edit.
 */
export class TrieEditor<T> extends PrefixTrie<T> {
  private owner?: object = {}

  /**
   * Add an item under the prefix. Returns false, leaving the trie untouched,
   * if an item with the same sort key is already stored there.
   */
  add (bytes: Buffer, length: number, item: T): boolean {
    const owner = this.requireOwner()
    const key = this.sortKey(item)
    const path = this.descend(bytes, length, owner)
    const node = path[path.length - 1]
    const index = sortedIndexBy(node.items, item, this.sortKey)

    if (index < node.items.length && this.sortKey(node.items[index]) === key) {
      return false
    }

    node.items.splice(index, 0, item)
    this.count++
    return true
  }

  /**
   * Remove the item with the same sort key from the prefix. Returns the removed
   * item, or undefined if there was none.
   */
  remove (bytes: Buffer, length: number, item: T): T | undefined {
    const owner = this.requireOwner()
    const key = this.sortKey(item)
    const existing = this.get(bytes, length)
    const index = sortedIndexBy(existing, item, this.sortKey)

    if (index >= existing.length || this.sortKey(existing[index]) !== key) {
      return undefined
    }

    const path = this.descend(bytes, length, owner)
    const [removed] = path[path.length - 1].items.splice(index, 1)
    this.count--
    this.prune(bytes, path)
    return removed
  }

  /**
   * Finish editing and return the resulting immutable trie. The editor can
   * not be used afterwards.
   */
  freeze (): PrefixTrie<T> {
    this.requireOwner()
    this.owner = undefined
    return new PrefixTrie(this.width, this.sortKey, this.root, this.count)
  }

  private requireOwner (): object {
    if (!this.owner) {
      throw new Error('trie editor has already been frozen.')
    }
    return this.owner
  }

  private own (node: TrieNode<T> | undefined, owner: object): TrieNode<T> {
    if (!node) {
      return { owner, children: [undefined, undefined], items: [] }
    }
    if (node.owner === owner) {
      return node
    }
    return { owner, children: [node.children[0], node.children[1]], items: node.items.slice() }
  }

  /**
   * Make every node on the path to the prefix writable, creating missing ones.
   */
  private descend (bytes: Buffer, length: number, owner: object): TrieNode<T>[] {
    let node = this.own(this.root, owner)
    this.root = node
    const path = [node]
    for (let depth = 0; depth < length; depth++) {
      const bit = getBit(bytes, depth)
      const child = this.own(node.children[bit], owner)
      node.children[bit] = child
      path.push(child)
      node = child
    }
    return path
  }

  private prune (bytes: Buffer, path: TrieNode<T>[]) {
    for (let depth = path.length - 1; depth > 0; depth--) {
      const node = path[depth]
      if (node.items.length || node.children[0] || node.children[1]) {
        return
      }
      path[depth - 1].children[getBit(bytes, depth - 1)] = undefined
    }
    const root = path[0]
    if (!root.items.length && !root.children[0] && !root.children[1]) {
      this.root = undefined
    }
  }
}
