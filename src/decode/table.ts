// Codeword-indexed dictionary used by the decoder
//
// Entry bytes live in a single arena; each slot records its offset, length
// and state. A slot's state, not its bytes, says whether it is assigned.

import { SEED_TABLE_CAPACITY, DEFAULT_ARENA_SIZE } from '../constants'
import { allocateBytes, allocateCodewords, grownSize } from '../alloc'
import { CorruptStreamError } from '../errors'

const SLOT_EMPTY = 0
const SLOT_ASSIGNED = 1
const SLOT_RESERVED = 2

export class IndexedDictionary {
  private offsets: Uint32Array
  private lengths: Uint32Array
  private states: Uint8Array
  private arena: Uint8Array
  private arenaLength = 0
  private next = 0

  constructor(
    initialCapacity: number = SEED_TABLE_CAPACITY,
    initialArenaSize: number = DEFAULT_ARENA_SIZE
  ) {
    this.offsets = allocateCodewords(initialCapacity)
    this.lengths = allocateCodewords(initialCapacity)
    this.states = allocateBytes(initialCapacity)
    this.arena = allocateBytes(initialArenaSize)
  }

  // Codeword the next append will receive
  get nextCodeword(): number {
    return this.next
  }

  get capacity(): number {
    return this.states.length
  }

  has(codeword: number): boolean {
    return codeword < this.next && this.states[codeword] === SLOT_ASSIGNED
  }

  // View into the arena; later appends never modify it
  get(codeword: number): Uint8Array {
    if (!this.has(codeword)) {
      throw new CorruptStreamError(`Codeword ${codeword} is not assigned`)
    }
    const offset = this.offsets[codeword]
    return this.arena.subarray(offset, offset + this.lengths[codeword])
  }

  append(bytes: ArrayLike<number>): number {
    const offset = this.reserveArena(bytes.length)
    this.arena.set(bytes, offset)
    return this.assign(offset, bytes.length)
  }

  // Appends get(prefix) followed by `byte`
  appendExtended(prefix: number, byte: number): number {
    if (!this.has(prefix)) {
      throw new CorruptStreamError(`Codeword ${prefix} is not assigned`)
    }
    const prefixOffset = this.offsets[prefix]
    const prefixLength = this.lengths[prefix]
    const offset = this.reserveArena(prefixLength + 1)
    this.arena.copyWithin(offset, prefixOffset, prefixOffset + prefixLength)
    this.arena[offset + prefixLength] = byte
    return this.assign(offset, prefixLength + 1)
  }

  // Consumes the next codeword without an entry
  reserve(): number {
    this.ensureSlots(this.next + 1)
    this.states[this.next] = SLOT_RESERVED
    return this.next++
  }

  destroy(): void {
    this.offsets = new Uint32Array(0)
    this.lengths = new Uint32Array(0)
    this.states = new Uint8Array(0)
    this.arena = new Uint8Array(0)
    this.arenaLength = 0
    this.next = 0
  }

  private assign(offset: number, length: number): number {
    this.ensureSlots(this.next + 1)
    const codeword = this.next++
    this.offsets[codeword] = offset
    this.lengths[codeword] = length
    this.states[codeword] = SLOT_ASSIGNED
    return codeword
  }

  private reserveArena(length: number): number {
    const offset = this.arenaLength
    const needed = offset + length
    if (needed > this.arena.length) {
      const arena = allocateBytes(grownSize(this.arena.length, needed))
      arena.set(this.arena.subarray(0, this.arenaLength))
      this.arena = arena
    }
    this.arenaLength = needed
    return offset
  }

  private ensureSlots(slots: number): void {
    if (slots <= this.states.length) return
    const size = grownSize(this.states.length, slots)

    const offsets = allocateCodewords(size)
    offsets.set(this.offsets)
    this.offsets = offsets

    const lengths = allocateCodewords(size)
    lengths.set(this.lengths)
    this.lengths = lengths

    // New slots start out empty
    const states = allocateBytes(size)
    states.set(this.states)
    this.states = states
  }
}
