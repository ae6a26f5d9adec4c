import { describe, expect, it } from 'vitest'
import { inspectBounds } from '../bounds'
import { loadFrames } from '../frame-store'
import { generateSampleMatch } from '../sample-match'

describe('generateSampleMatch', () => {
  it('generates duration * rate frames at the data rate', () => {
    const frames = generateSampleMatch({ duration: 2, dataRate: 10 })

    expect(frames).toHaveLength(20)
    expect(frames[0].time).toBe(0)
    expect(frames[5].time).toBe(0.5)
    expect(frames[19].time).toBe(1.9)
  })

  it('starts from the kick-off formation', () => {
    const [first] = generateSampleMatch({ duration: 1 })

    expect(first.ball).toEqual([0.5, 0.5, 0])
    expect(first.players).toHaveLength(22)
    expect(first.players[0]).toEqual([0.1, 0.1])
    expect(first.players[11]).toEqual([0.9, 0.1])
  })

  it('is deterministic for a seed', () => {
    const a = generateSampleMatch({ duration: 1, seed: 7 })
    const b = generateSampleMatch({ duration: 1, seed: 7 })
    const c = generateSampleMatch({ duration: 1, seed: 8 })

    expect(a).toEqual(b)
    expect(a).not.toEqual(c)
  })

  it('produces data the loader accepts, inside the pitch', () => {
    const store = loadFrames(generateSampleMatch({ duration: 5, seed: 3 }))

    expect(store.frameCount()).toBe(150)
    expect(inspectBounds(store.frames)).toEqual([])
  })

  it('keeps each team in its own half', () => {
    const frames = generateSampleMatch({ duration: 3, seed: 11 })

    for (const frame of frames.slice(1)) {
      for (const [x] of frame.players.slice(0, 11)) {
        expect(x).toBeGreaterThanOrEqual(0.05)
        expect(x).toBeLessThanOrEqual(0.45)
      }
      for (const [x] of frame.players.slice(11)) {
        expect(x).toBeGreaterThanOrEqual(0.55)
        expect(x).toBeLessThanOrEqual(0.95)
      }
    }
  })
})
