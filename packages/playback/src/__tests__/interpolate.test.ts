import type { Frame } from '@pitch-replay/frames'
import { describe, expect, it } from 'vitest'
import { InterpolationMismatchError } from '../errors'
import { interpolate, lerp } from '../interpolate'

/** Create a frame whose players are spread along x and shifted by `offset` */
function createFrame(timestamp: number, ball: [number, number, number], offset = 0, playerCount = 22): Frame {
  return {
    timestamp,
    ball: { x: ball[0], y: ball[1], z: ball[2] },
    players: Array.from({ length: playerCount }, (_, i) => ({ x: i / 100 + offset, y: 0.3 + offset })),
  }
}

describe('lerp', () => {
  it('returns the endpoints exactly', () => {
    expect(lerp(0.1, 0.7, 0)).toBe(0.1)
    expect(lerp(0.1, 0.7, 1)).toBe(0.7)
  })

  it('interpolates linearly in between', () => {
    expect(lerp(0, 1, 0.25)).toBe(0.25)
    expect(lerp(2, 4, 0.5)).toBe(3)
  })

  it('does not clamp t', () => {
    expect(lerp(0, 1, 2)).toBe(2)
    expect(lerp(0, 1, -0.5)).toBe(-0.5)
  })
})

describe('interpolate', () => {
  const a = createFrame(0, [0, 0, 0])
  const b = createFrame(5, [1, 1, 0.5], 0.25)

  it('returns the first frame at t = 0 and the second at t = 1', () => {
    expect(interpolate(a, b, 0)).toEqual(a)
    expect(interpolate(a, b, 1)).toEqual(b)
  })

  it('returns the same frame for any t when both frames are equal', () => {
    for (const t of [0, 0.3, 0.5, 0.77, 1]) {
      expect(interpolate(b, b, t)).toEqual(b)
    }
  })

  it('interpolates timestamp, ball and each player per axis', () => {
    const mid = interpolate(a, b, 0.5)

    expect(mid.timestamp).toBe(2.5)
    expect(mid.ball).toEqual({ x: 0.5, y: 0.5, z: 0.25 })
    expect(mid.players).toHaveLength(22)
    expect(mid.players[0].x).toBeCloseTo(0.125, 10)
    expect(mid.players[0].y).toBeCloseTo(0.425, 10)
    expect(mid.players[21].x).toBeCloseTo(0.335, 10)
  })

  it('does not modify its inputs', () => {
    const before = structuredClone(a)
    interpolate(a, b, 0.4)
    expect(a).toEqual(before)
  })

  it('rejects frames with different player counts', () => {
    const short = createFrame(1, [0, 0, 0], 0, 21)

    expect(() => interpolate(a, short, 0.5)).toThrow(InterpolationMismatchError)
    expect(() => interpolate(a, short, 0.5)).toThrow('Cannot interpolate between frames with 22 and 21 players')
  })
})
