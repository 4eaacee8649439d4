// Decode benchmark: vitest bench plus a median-time comparison with inflate
// Usage: npm run bench:fixtures && npm run bench
import { bench, describe } from 'vitest'
import { readFileSync, existsSync } from 'node:fs'
import { join, dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import { performance } from 'node:perf_hooks'
import * as zlib from 'node:zlib'
import { lzwDecompress } from '../src/decode/decode'
import { unpackCodewords } from '../src/decode/codeword-reader'

const __dirname = dirname(fileURLToPath(import.meta.url))
const fixturesPath = join(__dirname, 'fixtures')

const SAMPLE_COUNT = Number(process.env.BENCH_SAMPLES ?? '25')

interface Fixture {
  name: string
  codewords: Uint32Array
  deflated: Uint8Array
  originalSize: number
}

const fixtures: Fixture[] = []
const fixtureNames = ['html-content', 'long-run', 'random-binary']

for (const name of fixtureNames) {
  const lzwPath = join(fixturesPath, `${name}.lzw`)
  const binPath = join(fixturesPath, `${name}.bin`)
  if (!existsSync(lzwPath) || !existsSync(binPath)) continue
  const original = readFileSync(binPath)
  fixtures.push({
    name,
    codewords: unpackCodewords(new Uint8Array(readFileSync(lzwPath))),
    deflated: new Uint8Array(zlib.deflateSync(original)),
    originalSize: original.length,
  })
}

if (fixtures.length === 0) {
  console.log('\n[bench] No fixtures! Run: npm run bench:fixtures\n')
}

console.log(`\n[bench] samples=${SAMPLE_COUNT}`)
console.log(`[bench] fixtures: ${fixtures.map(f => f.name).join(', ')}\n`)

for (const fixture of fixtures) {
  const ours = medianMs(() => lzwDecompress(fixture.codewords))
  const inflate = medianMs(() => zlib.inflateSync(fixture.deflated))
  console.log(
    `[bench] ${fixture.name.padEnd(15)} lzw=${ours.toFixed(2)}ms inflate=${inflate.toFixed(2)}ms ` +
    `(${(ours / inflate).toFixed(2)}x)`
  )
}
console.log('')

// Vitest benchmarks
describe('lzw-lib decode', () => {
  for (const fixture of fixtures) {
    bench(`${fixture.name} (${(fixture.originalSize / 1024).toFixed(0)} KB)`, () => {
      lzwDecompress(fixture.codewords)
    })
  }
})

function medianMs(fn: () => void): number {
  fn()
  const samples: number[] = []
  for (let i = 0; i < SAMPLE_COUNT; i++) {
    const start = performance.now()
    fn()
    samples.push(performance.now() - start)
  }
  samples.sort((a, b) => a - b)
  return samples[samples.length >> 1]
}
