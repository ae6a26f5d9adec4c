#!/usr/bin/env npx tsx
/**
 * Headless replay of a match recording
 *
 * Plays the file from the start at real time, printing the HUD once a second,
 * and exits when playback reaches the last frame.
 *
 * Usage:
 *   npx tsx scripts/replay.ts --file=sample_data.json
 *
 * Options:
 *   --file=<path>    Recording to play (required)
 *   --rate=<hz>      Ticks per second (default: 60)
 *   --speed=<x>      Playback speed multiplier (default: 1)
 */

import * as fs from 'fs'
import { createReplay, createTicker, formatHud } from '@pitch-replay/app'
import { DataFormatError, inspectBounds, readFrameFile, type FrameStore } from '@pitch-replay/frames'
import { createPlaybackController } from '@pitch-replay/playback'

// Parse CLI args
const args = process.argv.slice(2)
const getArg = (name: string, defaultValue: string): string => {
  const arg = args.find(a => a.startsWith(`--${name}=`))
  return arg ? arg.split('=')[1] : defaultValue
}

const FILE = getArg('file', '')
const RATE = Math.max(1, parseInt(getArg('rate', '60'), 10) || 60)
const SPEED = parseFloat(getArg('speed', '1'))

function load(): FrameStore {
  try {
    return readFrameFile(FILE)
  } catch (error) {
    if (error instanceof DataFormatError) {
      console.error(`❌ ${error.name}: ${error.message}`)
      process.exit(1)
    }
    throw error
  }
}

function main() {
  if (!FILE || !fs.existsSync(FILE)) {
    console.error('❌ Recording required. Use --file=<path>')
    process.exit(1)
  }
  if (!(SPEED > 0)) {
    console.error('❌ --speed must be a positive number')
    process.exit(1)
  }

  const store = load()

  const outOfBounds = inspectBounds(store.frames)
  if (outOfBounds.length > 0) {
    const [first] = outOfBounds
    console.warn(
      `⚠️  ${outOfBounds.length} positions outside the pitch (first: frame ${first.frameIndex}, ${
        first.entity === 'ball' ? 'ball' : `player ${first.entity}`
      })`,
    )
  }

  console.log(`🚀 Playing ${store.frameCount()} frames (${store.lastTimestamp().toFixed(2)}s) at ${SPEED}x`)

  const replay = createReplay(createPlaybackController(store))
  const ticker = createTicker()
  const printHud = () => console.log(`   ${formatHud(replay.info()).join(' | ')}`)

  let sinceHud = 0

  replay.togglePlayPause()
  ticker.start()
  printHud()

  const interval = setInterval(() => {
    const delta = ticker.tick()
    replay.tick(delta * SPEED)

    sinceHud += delta
    if (sinceHud >= 1) {
      sinceHud = 0
      printHud()
    }

    if (replay.state() !== 'playing') {
      clearInterval(interval)
      ticker.stop()
      printHud()
      console.log('✅ Reached the last frame')
    }
  }, 1000 / RATE)
}

main()
