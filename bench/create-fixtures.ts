// Create LZW-compressed benchmark fixtures
// Run with: npx tsx bench/create-fixtures.ts
import { writeFileSync, mkdirSync } from 'node:fs'
import { join, dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import { lzwCompress } from '../src/encode/encode'
import { packCodewords } from '../src/encode/codeword-writer'

const __dirname = dirname(fileURLToPath(import.meta.url))
const fixturesPath = join(__dirname, 'fixtures')

mkdirSync(fixturesPath, { recursive: true })

const sources: Array<{ name: string; getData: () => Uint8Array }> = [
  {
    name: 'html-content',
    getData: () => {
      const html = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Test</title>
  <style>body { font-family: sans-serif; margin: 0; padding: 20px; }</style>
</head>
<body>
  <div class="container"><h1>Hello</h1><p>Content here.</p></div>
</body>
</html>`.repeat(100)
      return new TextEncoder().encode(html)
    },
  },
  {
    name: 'long-run',
    getData: () => new Uint8Array(256 * 1024).fill(0x41),
  },
  {
    name: 'random-binary',
    getData: () => {
      const data = new Uint8Array(50 * 1024)
      for (let i = 0; i < data.length; i++) data[i] = Math.floor(Math.random() * 256)
      return data
    },
  },
]

console.log('[bench] Creating LZW-compressed fixtures...\n')

for (const source of sources) {
  console.log(`[bench] Processing: ${source.name}`)
  const data = source.getData()
  console.log(`[bench]   Original: ${(data.length / 1024).toFixed(1)} KB`)

  const packed = packCodewords(lzwCompress(data))

  console.log(`[bench]   Packed: ${(packed.length / 1024).toFixed(1)} KB (${(packed.length / data.length * 100).toFixed(1)}%)`)

  writeFileSync(join(fixturesPath, `${source.name}.bin`), data)
  writeFileSync(join(fixturesPath, `${source.name}.lzw`), packed)
  console.log('')
}

console.log('[bench] Done!')
