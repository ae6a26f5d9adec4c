#!/usr/bin/env npx tsx
/**
 * Write a synthetic match recording in the input-file format
 *
 * Usage:
 *   npx tsx scripts/generate-sample-data.ts
 *
 * Options:
 *   --duration=<s>   Length of the recording in seconds (default: 30)
 *   --rate=<fps>     Frames per second (default: 30)
 *   --seed=<n>       PRNG seed (default: 1)
 *   --out=<path>     Output file (default: sample_data.json)
 */

import * as fs from 'fs'
import * as path from 'path'
import { generateSampleMatch } from '@pitch-replay/frames'

// Parse CLI args
const args = process.argv.slice(2)
const getArg = (name: string, defaultValue: string): string => {
  const arg = args.find(a => a.startsWith(`--${name}=`))
  return arg ? arg.split('=')[1] : defaultValue
}

const DURATION = parseFloat(getArg('duration', '30'))
const RATE = parseFloat(getArg('rate', '30'))
const SEED = parseInt(getArg('seed', '1'), 10)
const OUT = path.resolve(getArg('out', 'sample_data.json'))

function main() {
  if (!(DURATION > 0) || !(RATE > 0) || Number.isNaN(SEED)) {
    console.error('❌ --duration and --rate must be positive numbers, --seed an integer')
    process.exit(1)
  }

  const frames = generateSampleMatch({ duration: DURATION, dataRate: RATE, seed: SEED })
  fs.writeFileSync(OUT, JSON.stringify(frames))

  console.log(`✅ Wrote ${frames.length} frames (${DURATION}s at ${RATE} fps, seed ${SEED})`)
  console.log(`   ${OUT}`)
}

main()
