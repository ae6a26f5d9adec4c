import { describe, expect, it } from 'vitest'
import { createTicker } from '../create-ticker'

/** Manual millisecond clock */
function createFakeClock(start = 1000) {
  let time = start
  return {
    now: () => time,
    advance: (ms: number) => {
      time += ms
    },
  }
}

describe('createTicker', () => {
  it('returns 0 while stopped', () => {
    const clock = createFakeClock()
    const ticker = createTicker({ now: clock.now })

    clock.advance(100)
    expect(ticker.isRunning()).toBe(false)
    expect(ticker.tick()).toBe(0)
  })

  it('measures seconds between ticks', () => {
    const clock = createFakeClock()
    const ticker = createTicker({ now: clock.now })

    ticker.start()
    clock.advance(16)
    expect(ticker.tick()).toBe(0.016)
    expect(ticker.delta()).toBe(0.016)

    clock.advance(50)
    expect(ticker.tick()).toBe(0.05)
  })

  it('caps a stalled tick at maxDelta', () => {
    const clock = createFakeClock()
    const ticker = createTicker({ now: clock.now, maxDelta: 0.1 })

    ticker.start()
    clock.advance(3000)
    expect(ticker.tick()).toBe(0.1)
  })

  it('does not count time spent stopped', () => {
    const clock = createFakeClock()
    const ticker = createTicker({ now: clock.now })

    ticker.start()
    ticker.stop()
    clock.advance(10_000)
    ticker.start()
    clock.advance(20)

    expect(ticker.isRunning()).toBe(true)
    expect(ticker.tick()).toBe(0.02)
  })

  it('never returns a negative delta', () => {
    const clock = createFakeClock()
    const ticker = createTicker({ now: clock.now })

    ticker.start()
    clock.advance(-5)
    expect(ticker.tick()).toBe(0)
  })
})
