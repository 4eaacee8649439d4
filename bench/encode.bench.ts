import { bench, describe } from 'vitest'
import * as zlib from 'zlib'
import { lzwCompress } from '../src/encode/encode'
import { packCodewords } from '../src/encode/codeword-writer'

// Test data
const shortText = 'Hello, World!'
const mediumText = 'The quick brown fox jumps over the lazy dog. '.repeat(100)
const longText = mediumText.repeat(10)
const html = `<!DOCTYPE html><html><head><title>Test</title></head><body>${'<p>Content</p>'.repeat(500)}</body></html>`

const inputs = [
  { name: 'short (13 B)', data: new TextEncoder().encode(shortText) },
  { name: 'medium (4.5 KB)', data: new TextEncoder().encode(mediumText) },
  { name: 'long (45 KB)', data: new TextEncoder().encode(longText) },
  { name: 'html (8 KB)', data: new TextEncoder().encode(html) },
  { name: 'run (64 KB)', data: new Uint8Array(64 * 1024).fill(0x61) },
]

// Packed size against deflate, for orientation only
console.log('\n[bench] packed LZW vs deflate:')
for (const { name, data } of inputs) {
  const ours = packCodewords(lzwCompress(data))
  const native = zlib.deflateSync(data)
  console.log(`[bench] ${name}: lzw=${ours.length} deflate=${native.length} (${(ours.length / native.length).toFixed(2)}x)`)
}
console.log('')

describe('compress', () => {
  for (const { name, data } of inputs) {
    bench(`lzw-lib ${name}`, () => {
      lzwCompress(data)
    })

    bench(`node:zlib deflate ${name}`, () => {
      zlib.deflateSync(data)
    })
  }
})
