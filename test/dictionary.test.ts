import { describe, it, expect } from 'vitest'
import { DictionaryTrie } from '../src/encode/trie'
import { seedDictionary } from '../src/encode/encode'
import { IndexedDictionary } from '../src/decode/table'
import { seedTable } from '../src/decode/decode'
import { CorruptStreamError } from '../src/errors'

const bytes = (text: string) => new TextEncoder().encode(text)

describe('DictionaryTrie', () => {
  it('starts empty', () => {
    const trie = new DictionaryTrie()
    expect(trie.size).toBe(0)
    expect(trie.lookup(bytes('a'))).toBeUndefined()
  })

  it('distinguishes codeword 0 from a missing entry', () => {
    const trie = new DictionaryTrie()
    seedDictionary(trie)
    expect(trie.size).toBe(256)
    expect(trie.lookup(new Uint8Array([0]))).toBe(0)
    expect(trie.lookup(new Uint8Array([0, 0]))).toBeUndefined()
  })

  it('maps every literal to its own value', () => {
    const trie = new DictionaryTrie()
    seedDictionary(trie)
    for (let byte = 0; byte < 256; byte++) {
      expect(trie.lookup([byte])).toBe(byte)
    }
  })

  it('looks up exact strings only', () => {
    const trie = new DictionaryTrie()
    trie.insert(bytes('abc'), 300)
    expect(trie.lookup(bytes('abc'))).toBe(300)
    expect(trie.lookup(bytes('ab'))).toBeUndefined()
    expect(trie.lookup(bytes('abcd'))).toBeUndefined()
    expect(trie.size).toBe(1)
  })

  it('keeps the first codeword when a string is inserted twice', () => {
    const trie = new DictionaryTrie()
    trie.insert(bytes('xy'), 257)
    trie.insert(bytes('xy'), 999)
    expect(trie.lookup(bytes('xy'))).toBe(257)
    expect(trie.size).toBe(1)
  })

  it('never treats the empty string as an entry', () => {
    const trie = new DictionaryTrie()
    trie.insert(new Uint8Array(0), 5)
    expect(trie.lookup(new Uint8Array(0))).toBeUndefined()
    expect(trie.size).toBe(0)
  })

  it('extends a string through the cursor API', () => {
    const trie = new DictionaryTrie()
    seedDictionary(trie)
    const a = trie.child(trie.root, 0x61)
    expect(a).toBeDefined()
    if (a === undefined) return

    const ab = trie.insertChild(a, 0x62, 257)
    expect(trie.codewordAt(ab)).toBe(257)
    expect(trie.child(a, 0x62)).toBe(ab)
    expect(trie.lookup(bytes('ab'))).toBe(257)
    expect(trie.child(ab, 0x63)).toBeUndefined()
  })

  it('grows past its initial capacity', () => {
    const trie = new DictionaryTrie(4)
    for (let i = 0; i < 100; i++) {
      trie.insert([i, i + 1], 257 + i)
    }
    for (let i = 0; i < 100; i++) {
      expect(trie.lookup([i, i + 1])).toBe(257 + i)
    }
    expect(trie.size).toBe(100)
  })

  it('holds more than 2^24 edges', () => {
    const trie = new DictionaryTrie()
    const edges = 2 ** 24 + 16
    let node = trie.root
    for (let i = 0; i < edges; i++) {
      node = trie.insertChild(node, i & 0xFF, 257 + i)
    }

    expect(trie.size).toBe(edges)
    expect(trie.nodeCount).toBe(edges + 1)
    expect(trie.codewordAt(node)).toBe(257 + edges - 1)
    expect(trie.child(trie.root, 0)).toBe(1)
    expect(trie.child(1, 1)).toBe(2)
    expect(trie.child(1, 2)).toBeUndefined()
    trie.destroy()
  }, 120_000)

  it('holds strings containing zero bytes', () => {
    const trie = new DictionaryTrie()
    trie.insert([0, 0, 0], 400)
    trie.insert([0, 0], 401)
    expect(trie.lookup([0, 0, 0])).toBe(400)
    expect(trie.lookup([0, 0])).toBe(401)
    expect(trie.lookup([0])).toBeUndefined()
  })

  it('releases all entries on destroy', () => {
    const trie = new DictionaryTrie()
    seedDictionary(trie)
    trie.destroy()
    expect(trie.size).toBe(0)
    expect(trie.nodeCount).toBe(1)
    expect(trie.lookup([65])).toBeUndefined()

    trie.insert([65, 66], 300)
    expect(trie.lookup([65, 66])).toBe(300)
  })
})

describe('IndexedDictionary', () => {
  it('assigns sequential codewords', () => {
    const table = new IndexedDictionary()
    expect(table.append(bytes('a'))).toBe(0)
    expect(table.append(bytes('bc'))).toBe(1)
    expect(table.nextCodeword).toBe(2)
    expect(Array.from(table.get(1))).toEqual([0x62, 0x63])
  })

  it('seeds literals and reserves 256', () => {
    const table = new IndexedDictionary()
    seedTable(table)
    expect(table.nextCodeword).toBe(257)
    expect(Array.from(table.get(0))).toEqual([0])
    expect(Array.from(table.get(255))).toEqual([255])
    expect(table.has(256)).toBe(false)
    expect(() => table.get(256)).toThrow(CorruptStreamError)
  })

  it('doubles capacity when the seed is exhausted', () => {
    const table = new IndexedDictionary()
    seedTable(table)
    expect(table.capacity).toBe(257)

    expect(table.appendExtended(0x61, 0x62)).toBe(257)
    expect(table.capacity).toBe(514)
    expect(Array.from(table.get(257))).toEqual([0x61, 0x62])
    expect(Array.from(table.get(0x61))).toEqual([0x61])
  })

  it('preserves entries across arena growth', () => {
    const table = new IndexedDictionary(2, 1)
    const first = table.append([1, 2, 3])
    let prev = first
    for (let i = 0; i < 50; i++) {
      prev = table.appendExtended(prev, i)
    }
    expect(Array.from(table.get(first))).toEqual([1, 2, 3])
    expect(table.get(prev).length).toBe(53)
    expect(table.get(prev)[52]).toBe(49)
  })

  it('keeps views returned before growth intact', () => {
    const table = new IndexedDictionary(1, 1)
    const codeword = table.append([7, 8])
    const view = table.get(codeword)
    for (let i = 0; i < 20; i++) table.append([9, 9, 9])
    expect(Array.from(view)).toEqual([7, 8])
  })

  it('tells an unassigned slot from a zero-length entry', () => {
    const table = new IndexedDictionary()
    const empty = table.append(new Uint8Array(0))
    expect(table.has(empty)).toBe(true)
    expect(table.get(empty).length).toBe(0)
    expect(table.has(empty + 1)).toBe(false)
    expect(() => table.get(empty + 1)).toThrow('Codeword 1 is not assigned')
  })

  it('rejects extending an unassigned codeword', () => {
    const table = new IndexedDictionary()
    seedTable(table)
    expect(() => table.appendExtended(300, 0)).toThrow(CorruptStreamError)
  })

  it('releases everything on destroy', () => {
    const table = new IndexedDictionary()
    seedTable(table)
    table.destroy()
    expect(table.nextCodeword).toBe(0)
    expect(table.capacity).toBe(0)
    expect(table.has(0)).toBe(false)
  })
})
