// Prefix trie mapping byte strings to codewords, used by the encoder

import { DEFAULT_TRIE_CAPACITY } from '../constants'
import { allocateBytes, allocateCodewords, grownSize } from '../alloc'

export type NodeId = number

const ROOT: NodeId = 0
// Root is never a child, so 0 marks a free edge slot
const EMPTY_SLOT = 0

// Nodes are dense ids. Every node except the root has exactly one incoming
// edge, so the edge label (parent, byte) is stored on the child and the edge
// table is an open-addressing array of child ids.
// A node carries a codeword only if its exact string was inserted.
export class DictionaryTrie {
  readonly root: NodeId = ROOT

  private slots: Uint32Array
  private slotMask: number
  private edgeCount = 0
  private nextId: NodeId = ROOT + 1
  private parents: Uint32Array
  private labels: Uint8Array
  private codewords: Uint32Array
  private terminal: Uint8Array
  private entries = 0

  constructor(initialCapacity: number = DEFAULT_TRIE_CAPACITY) {
    this.parents = allocateCodewords(initialCapacity)
    this.labels = allocateBytes(initialCapacity)
    this.codewords = allocateCodewords(initialCapacity)
    this.terminal = allocateBytes(initialCapacity)
    const slotCount = grownSize(16, initialCapacity * 2)
    this.slots = allocateCodewords(slotCount)
    this.slotMask = slotCount - 1
  }

  // Number of strings that carry a codeword
  get size(): number {
    return this.entries
  }

  get nodeCount(): number {
    return this.nextId
  }

  private static slotHash(node: NodeId, byte: number): number {
    return (Math.imul(node, 0x9E3779B1) ^ Math.imul((byte & 0xFF) + 1, 0x85EBCA77)) >>> 0
  }

  private ensureCapacity(nodes: number): void {
    if (nodes <= this.terminal.length) return
    const size = grownSize(this.terminal.length, nodes)

    const parents = allocateCodewords(size)
    parents.set(this.parents)
    this.parents = parents

    const labels = allocateBytes(size)
    labels.set(this.labels)
    this.labels = labels

    const codewords = allocateCodewords(size)
    codewords.set(this.codewords)
    this.codewords = codewords

    const terminal = allocateBytes(size)
    terminal.set(this.terminal)
    this.terminal = terminal
  }

  // Keeps the edge table at most three quarters full
  private ensureSlots(edges: number): void {
    if (edges * 4 <= this.slots.length * 3) return
    const slotCount = grownSize(this.slots.length, Math.ceil(edges * 4 / 3))
    const slots = allocateCodewords(slotCount)
    const mask = slotCount - 1

    for (let i = 0; i < this.slots.length; i++) {
      const id = this.slots[i]
      if (id === EMPTY_SLOT) continue
      let slot = DictionaryTrie.slotHash(this.parents[id], this.labels[id]) & mask
      while (slots[slot] !== EMPTY_SLOT) slot = (slot + 1) & mask
      slots[slot] = id
    }

    this.slots = slots
    this.slotMask = mask
  }

  // Slot holding the edge (node, byte), or the free slot where it would go
  private findSlot(node: NodeId, byte: number): number {
    const label = byte & 0xFF
    let slot = DictionaryTrie.slotHash(node, label) & this.slotMask
    for (;;) {
      const id = this.slots[slot]
      if (id === EMPTY_SLOT) return slot
      if (this.parents[id] === node && this.labels[id] === label) return slot
      slot = (slot + 1) & this.slotMask
    }
  }

  child(node: NodeId, byte: number): NodeId | undefined {
    if (this.slots.length === 0) return undefined
    const id = this.slots[this.findSlot(node, byte)]
    return id === EMPTY_SLOT ? undefined : id
  }

  private ensureChild(node: NodeId, byte: number): NodeId {
    const existing = this.child(node, byte)
    if (existing !== undefined) return existing

    const id = this.nextId++
    this.ensureCapacity(this.nextId)
    this.parents[id] = node
    this.labels[id] = byte & 0xFF

    this.ensureSlots(this.edgeCount + 1)
    this.slots[this.findSlot(node, byte)] = id
    this.edgeCount++
    return id
  }

  codewordAt(node: NodeId): number | undefined {
    return this.terminal[node] === 1 ? this.codewords[node] : undefined
  }

  private mark(node: NodeId, codeword: number): void {
    // First insertion wins
    if (this.terminal[node] === 1) return
    this.terminal[node] = 1
    this.codewords[node] = codeword
    this.entries++
  }

  insert(key: ArrayLike<number>, codeword: number): void {
    let node = this.root
    for (let i = 0; i < key.length; i++) {
      node = this.ensureChild(node, key[i])
    }
    // The empty string is never an entry
    if (node === this.root) return
    this.mark(node, codeword)
  }

  // Extends the string at `node` by one byte and assigns it `codeword`
  insertChild(node: NodeId, byte: number, codeword: number): NodeId {
    const id = this.ensureChild(node, byte)
    this.mark(id, codeword)
    return id
  }

  lookup(key: ArrayLike<number>): number | undefined {
    let node = this.root
    for (let i = 0; i < key.length; i++) {
      const next = this.child(node, key[i])
      if (next === undefined) return undefined
      node = next
    }
    return this.codewordAt(node)
  }

  destroy(): void {
    this.slots = new Uint32Array(0)
    this.slotMask = 0
    this.edgeCount = 0
    this.parents = new Uint32Array(0)
    this.labels = new Uint8Array(0)
    this.codewords = new Uint32Array(0)
    this.terminal = new Uint8Array(0)
    this.nextId = ROOT + 1
    this.entries = 0
  }
}
