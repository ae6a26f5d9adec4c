import { createSignal, type Accessor } from 'solid-js'

export interface Ticker {
  /** Whether the ticker is running */
  isRunning: Accessor<boolean>
  /** Seconds measured by the last tick */
  delta: Accessor<number>
  /** Start measuring from now */
  start: () => void
  /** Stop measuring */
  stop: () => void
  /**
   * Measure the seconds since the previous tick (call once per host loop
   * iteration). Returns 0 while stopped.
   */
  tick: () => number
}

export interface CreateTickerOptions {
  /** Upper bound for one tick, so a stalled host does not jump ahead (default: 0.25s) */
  maxDelta?: number
  /** Millisecond clock (default: performance.now) */
  now?: () => number
}

/**
 * Creates a ticker that turns a host render loop into per-tick delta times
 */
export function createTicker(options: CreateTickerOptions = {}): Ticker {
  const maxDelta = options.maxDelta ?? 0.25
  const now = options.now ?? (() => performance.now())

  const [isRunning, setIsRunning] = createSignal(false)
  const [delta, setDelta] = createSignal(0)

  // performance.now() at the previous tick
  let lastTickTime = 0

  function start() {
    lastTickTime = now()
    setDelta(0)
    setIsRunning(true)
  }

  function stop() {
    setIsRunning(false)
    setDelta(0)
  }

  function tick(): number {
    if (!isRunning()) return 0

    const currentTime = now()
    const seconds = Math.min(Math.max(0, (currentTime - lastTickTime) / 1000), maxDelta)
    lastTickTime = currentTime

    setDelta(seconds)
    return seconds
  }

  return {
    isRunning,
    delta,
    start,
    stop,
    tick,
  }
}
