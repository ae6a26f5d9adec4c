import type { Frame, FrameStore } from '@pitch-replay/frames'
import { debug } from '@pitch-replay/utils'
import { estimateDataRate, fractionBetween, locateFrame } from './frame-lookup'
import { interpolate } from './interpolate'

/** Playback state */
export type PlaybackState = 'stopped' | 'playing' | 'paused'

/** Direction of a step, step-hold or scrub */
export type StepDirection = 'forward' | 'backward'

/** Reported instead of a frame while the controller holds no frames */
export const NO_DATA_AVAILABLE = 'no-data-available' as const
export type PlaybackWarning = typeof NO_DATA_AVAILABLE

export interface PlaybackOptions {
  /** Frames per second used to estimate frame indices (default: derived from the timestamps) */
  dataRate?: number
  /**
   * Playback-time seconds per real second while scrubbing forward (default: 5).
   * Speeds and the data rate must be positive, the hold delay non-negative;
   * other values fall back to the default.
   */
  fastForwardSpeed?: number
  /** Playback-time seconds per real second while scrubbing backward (default: 5) */
  rewindSpeed?: number
  /** Seconds a step must be held before continuous scrubbing starts (default: 0.3) */
  holdDelay?: number
}

export type ResolvedPlaybackOptions = Required<PlaybackOptions>

/** What a renderer needs for one tick. Never mutate it. */
export interface PlaybackSnapshot {
  /** Displayed frame: interpolated, or the stored frame at exact frame times. Null without data. */
  readonly frame: Frame | null
  readonly state: PlaybackState
  /** Elapsed playback time in seconds */
  readonly elapsed: number
  /** Lower index of the bracketing frame pair */
  readonly frameIndex: number
  /** Interpolation fraction between `frameIndex` and the next frame */
  readonly fraction: number
  /** Active scrub direction, if any */
  readonly scrub: StepDirection | null
  readonly warning: PlaybackWarning | null
}

/** Summary for on-screen display */
export interface PlaybackInfo {
  /** 1-based frame number (0 without data) */
  currentFrame: number
  totalFrames: number
  /** Elapsed playback time in seconds */
  time: number
  state: PlaybackState
  scrub: StepDirection | null
  fastForwardSpeed: number
  rewindSpeed: number
}

export interface PlaybackController {
  /** Current state */
  readonly state: PlaybackState

  /** Elapsed playback time in seconds, within [0, lastTimestamp] */
  readonly elapsed: number

  /** Lower index of the bracketing frame pair */
  readonly frameIndex: number

  /** The frames being played (read-only) */
  readonly store: FrameStore

  /** Options with defaults applied */
  readonly options: ResolvedPlaybackOptions

  /** stopped/paused -> playing, playing -> paused */
  togglePlayPause(): void

  /** Back to paused at time 0 */
  restart(): void

  /** Pause if playing, then move to the next frame's timestamp */
  stepForward(): void

  /** Pause if playing, then move to the previous frame's timestamp */
  stepBackward(): void

  /**
   * Step once and keep holding: after `holdDelay` seconds of `advance`,
   * scrub continuously in that direction until released or an end is reached
   */
  holdStep(direction: StepDirection): void

  /** Release a held step, ending its scrub */
  releaseStep(direction: StepDirection): void

  /**
   * Advance playback by the time since the previous tick.
   * Only has an effect while playing or scrubbing.
   */
  advance(deltaSeconds: number): void

  /** The displayed snapshot, materialized once per change */
  currentSnapshot(): PlaybackSnapshot

  /** Frame counter, time and state for display */
  info(): PlaybackInfo

  /**
   * Register a callback for state changes
   */
  onStateChange(callback: (state: PlaybackState) => void): () => void
}

interface StepHold {
  direction: StepDirection
  /** Seconds held so far */
  held: number
}

let controllerIdCounter = 0

/** `value` when it is a positive finite number, else `fallback` */
const positiveOr = (value: number | undefined, fallback: number) =>
  value !== undefined && value > 0 && Number.isFinite(value) ? value : fallback

/** `value` when it is a non-negative finite number, else `fallback` */
const nonNegativeOr = (value: number | undefined, fallback: number) =>
  value !== undefined && value >= 0 && Number.isFinite(value) ? value : fallback

/**
 * Create a playback controller over a frame store.
 *
 * Starts paused at time 0 on the first frame, or stopped when the store is
 * empty. Without frames every command is a no-op and snapshots carry the
 * `no-data-available` warning.
 */
export function createPlaybackController(
  store: FrameStore,
  options: PlaybackOptions = {},
): PlaybackController {
  const id = String(controllerIdCounter++)
  const log = debug(`playback-controller-${id}`, false)

  const resolved: ResolvedPlaybackOptions = {
    dataRate: positiveOr(options.dataRate, estimateDataRate(store)),
    fastForwardSpeed: positiveOr(options.fastForwardSpeed, 5),
    rewindSpeed: positiveOr(options.rewindSpeed, 5),
    holdDelay: nonNegativeOr(options.holdDelay, 0.3),
  }

  const count = store.frameCount()
  const lastTimestamp = store.lastTimestamp()
  const hasData = count > 0

  log('creating controller', { count, lastTimestamp, ...resolved })

  // Clock
  let state: PlaybackState = hasData ? 'paused' : 'stopped'
  let elapsed = 0
  let frameIndex = 0
  let hold: StepHold | null = null
  let scrub: StepDirection | null = null

  // Materialized snapshot, dropped on every change
  let snapshot: PlaybackSnapshot | null = null

  // Callbacks
  const stateCallbacks: Array<(state: PlaybackState) => void> = []

  const setState = (newState: PlaybackState) => {
    if (state !== newState) {
      log('setState', { from: state, to: newState })
      state = newState
      snapshot = null
      // callbacks may unsubscribe while being notified
      for (const cb of [...stateCallbacks]) {
        cb(newState)
      }
    }
  }

  /** Report a command that cannot act without frames */
  const ignored = (command: string) => {
    log(`${command}: ignored, ${NO_DATA_AVAILABLE}`)
  }

  const clampTime = (time: number) => Math.max(0, Math.min(time, lastTimestamp))

  /** Move to an arbitrary time, locating its bracketing pair */
  const seekTime = (time: number) => {
    elapsed = clampTime(time)
    frameIndex = locateFrame(store, elapsed, resolved.dataRate)
    snapshot = null
  }

  /** Move to a stored frame's exact timestamp */
  const seekFrame = (index: number) => {
    frameIndex = index
    elapsed = clampTime(store.frameAt(index).timestamp)
    snapshot = null
  }

  const endHold = () => {
    if (hold || scrub) {
      log('endHold', { hold, scrub })
      hold = null
      scrub = null
      snapshot = null
    }
  }

  const pauseIfPlaying = () => {
    if (state === 'playing') setState('paused')
  }

  /** Returns false when already at the end of the sequence in that direction */
  const step = (direction: StepDirection): boolean => {
    const current = store.frameAt(frameIndex).timestamp
    switch (direction) {
      case 'forward':
        if (elapsed < current) {
          seekFrame(frameIndex)
        } else if (frameIndex < count - 1) {
          seekFrame(frameIndex + 1)
        } else {
          return false
        }
        return true
      case 'backward':
        if (elapsed > current) {
          seekFrame(frameIndex)
        } else if (frameIndex > 0) {
          seekFrame(frameIndex - 1)
        } else {
          return false
        }
        return true
      default: {
        const exhaustive: never = direction
        throw new Error(`Unknown step direction: ${String(exhaustive)}`)
      }
    }
  }

  const scrubBy = (direction: StepDirection, deltaSeconds: number) => {
    switch (direction) {
      case 'forward':
        seekTime(elapsed + deltaSeconds * resolved.fastForwardSpeed)
        if (elapsed >= lastTimestamp) endHold()
        break
      case 'backward':
        seekTime(elapsed - deltaSeconds * resolved.rewindSpeed)
        if (elapsed <= 0) endHold()
        break
      default: {
        const exhaustive: never = direction
        throw new Error(`Unknown scrub direction: ${String(exhaustive)}`)
      }
    }
  }

  const materialize = (): PlaybackSnapshot => {
    if (!hasData) {
      const empty: PlaybackSnapshot = {
        frame: null,
        state,
        elapsed,
        frameIndex,
        fraction: 0,
        scrub,
        warning: NO_DATA_AVAILABLE,
      }
      return Object.freeze(empty)
    }

    const fraction = fractionBetween(store, frameIndex, elapsed)
    const frame =
      frameIndex >= count - 1
        ? store.frameAt(frameIndex)
        : interpolate(store.frameAt(frameIndex), store.frameAt(frameIndex + 1), fraction)

    const current: PlaybackSnapshot = { frame, state, elapsed, frameIndex, fraction, scrub, warning: null }
    return Object.freeze(current)
  }

  return {
    get state() {
      return state
    },

    get elapsed() {
      return elapsed
    },

    get frameIndex() {
      return frameIndex
    },

    get store() {
      return store
    },

    get options() {
      return resolved
    },

    togglePlayPause(): void {
      log('togglePlayPause', { currentState: state })
      if (!hasData) return ignored('togglePlayPause')
      endHold()

      switch (state) {
        case 'stopped':
        case 'paused':
          setState('playing')
          break
        case 'playing':
          setState('paused')
          break
        default: {
          const exhaustive: never = state
          throw new Error(`Unknown playback state: ${String(exhaustive)}`)
        }
      }
    },

    restart(): void {
      log('restart', { currentState: state })
      if (!hasData) return ignored('restart')
      endHold()
      elapsed = 0
      frameIndex = 0
      snapshot = null
      setState('paused')
    },

    stepForward(): void {
      log('stepForward', { elapsed, frameIndex })
      if (!hasData) return ignored('stepForward')
      endHold()
      pauseIfPlaying()
      if (!step('forward')) log('stepForward: already at the last frame')
    },

    stepBackward(): void {
      log('stepBackward', { elapsed, frameIndex })
      if (!hasData) return ignored('stepBackward')
      endHold()
      pauseIfPlaying()
      if (!step('backward')) log('stepBackward: already at the first frame')
    },

    holdStep(direction: StepDirection): void {
      log('holdStep', { direction, elapsed, frameIndex })
      if (!hasData) return ignored('holdStep')
      endHold()
      pauseIfPlaying()
      step(direction)
      hold = { direction, held: 0 }
    },

    releaseStep(direction: StepDirection): void {
      if (hold?.direction === direction || scrub === direction) {
        log('releaseStep', { direction })
        endHold()
      }
    },

    advance(deltaSeconds: number): void {
      if (!hasData) return
      if (!(deltaSeconds > 0) || !Number.isFinite(deltaSeconds)) return

      if (hold && !scrub) {
        hold.held += deltaSeconds
        if (hold.held >= resolved.holdDelay) {
          log('scrub start', { direction: hold.direction })
          scrub = hold.direction
          snapshot = null
        }
      }

      if (scrub) {
        scrubBy(scrub, deltaSeconds)
        return
      }

      if (state !== 'playing') return

      seekTime(elapsed + deltaSeconds)
      if (elapsed >= lastTimestamp) {
        log('advance: reached end', { elapsed, lastTimestamp })
        setState('paused')
      }
    },

    currentSnapshot(): PlaybackSnapshot {
      if (!snapshot) {
        snapshot = materialize()
      }
      return snapshot
    },

    info(): PlaybackInfo {
      return {
        currentFrame: hasData ? frameIndex + 1 : 0,
        totalFrames: count,
        time: elapsed,
        state,
        scrub,
        fastForwardSpeed: resolved.fastForwardSpeed,
        rewindSpeed: resolved.rewindSpeed,
      }
    },

    onStateChange(callback: (state: PlaybackState) => void): () => void {
      stateCallbacks.push(callback)
      return () => {
        const index = stateCallbacks.indexOf(callback)
        if (index !== -1) {
          stateCallbacks.splice(index, 1)
        }
      }
    },
  }
}
