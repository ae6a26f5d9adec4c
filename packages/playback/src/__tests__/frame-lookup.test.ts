import { createFrameStore, type Frame } from '@pitch-replay/frames'
import { describe, expect, it } from 'vitest'
import { estimateDataRate, fractionBetween, locateFrame } from '../frame-lookup'

function createFrame(timestamp: number): Frame {
  return {
    timestamp,
    ball: { x: 0.5, y: 0.5, z: 0 },
    players: Array.from({ length: 22 }, () => ({ x: 0.5, y: 0.5 })),
  }
}

const storeAt = (...timestamps: number[]) => createFrameStore(timestamps.map(createFrame))

describe('estimateDataRate', () => {
  it('derives frames per second from the timestamps', () => {
    expect(estimateDataRate(storeAt(0, 0.5, 1, 1.5, 2))).toBe(2)
  })

  it('returns 0 without a span to measure', () => {
    expect(estimateDataRate(storeAt())).toBe(0)
    expect(estimateDataRate(storeAt(3))).toBe(0)
    expect(estimateDataRate(storeAt(1, 1))).toBe(0)
  })
})

describe('locateFrame', () => {
  const even = storeAt(0, 0.5, 1, 1.5, 2)

  it('finds the largest index whose timestamp is <= time', () => {
    expect(locateFrame(even, 0, 2)).toBe(0)
    expect(locateFrame(even, 0.75, 2)).toBe(1)
    expect(locateFrame(even, 1, 2)).toBe(2)
    expect(locateFrame(even, 1.99, 2)).toBe(3)
    expect(locateFrame(even, 2, 2)).toBe(4)
  })

  it('clamps times outside the sequence to its boundaries', () => {
    expect(locateFrame(even, -1, 2)).toBe(0)
    expect(locateFrame(even, 10, 2)).toBe(4)
  })

  it('corrects a wrong data rate hint', () => {
    expect(locateFrame(even, 0.75, 100)).toBe(1)
    expect(locateFrame(even, 1.75, 0.1)).toBe(3)
    expect(locateFrame(even, 1.25, 0)).toBe(2)
  })

  it('handles unevenly spaced frames', () => {
    const uneven = storeAt(0, 0.1, 0.5, 3)
    const rate = estimateDataRate(uneven)

    expect(locateFrame(uneven, 0.4, rate)).toBe(1)
    expect(locateFrame(uneven, 2.9, rate)).toBe(2)
  })

  it('picks the last of equal timestamps', () => {
    expect(locateFrame(storeAt(0, 1, 1, 2), 1, 1)).toBe(2)
  })

  it('returns 0 for an empty store', () => {
    expect(locateFrame(storeAt(), 3, 30)).toBe(0)
  })
})

describe('fractionBetween', () => {
  it('is the normalized position between two timestamps', () => {
    expect(fractionBetween(storeAt(0, 0.5, 1), 1, 0.75)).toBe(0.5)
  })

  it('is 0 when the two timestamps are equal', () => {
    expect(fractionBetween(storeAt(0, 1, 1, 2), 1, 1)).toBe(0)
  })

  it('is clamped to [0, 1]', () => {
    expect(fractionBetween(storeAt(2, 3), 0, 0)).toBe(0)
    expect(fractionBetween(storeAt(2, 3), 0, 5)).toBe(1)
  })
})
