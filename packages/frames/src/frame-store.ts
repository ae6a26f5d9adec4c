import { debug } from '@pitch-replay/utils'
import * as v from 'valibot'
import { DataFormatError, IndexOutOfRangeError } from './errors'
import { RawFrameListSchema, type RawFrame } from './schema'
import type { Frame } from './types'

const log = debug('frame-store', false)

export interface FrameStore {
  /** Frames in ascending timestamp order */
  readonly frames: readonly Frame[]

  /** Number of stored frames */
  frameCount(): number

  /**
   * Get the frame at the given index
   * @throws IndexOutOfRangeError when the index is not an integer in [0, frameCount)
   */
  frameAt(index: number): Frame

  /** Timestamp of the first frame (0 if empty) */
  firstTimestamp(): number

  /** Timestamp of the last frame (0 if empty) */
  lastTimestamp(): number
}

/**
 * Wrap frames that are already known to be valid and sorted.
 * The frames are frozen; the store never copies or re-sorts them.
 */
export function createFrameStore(frames: readonly Frame[]): FrameStore {
  for (const frame of frames) {
    Object.freeze(frame.ball)
    for (const player of frame.players) Object.freeze(player)
    Object.freeze(frame.players)
    Object.freeze(frame)
  }
  const sequence = Object.freeze([...frames])
  const count = sequence.length

  return {
    frames: sequence,

    frameCount() {
      return count
    },

    frameAt(index: number): Frame {
      const frame = Number.isInteger(index) ? sequence[index] : undefined
      if (!frame) {
        throw new IndexOutOfRangeError(index, count)
      }
      return frame
    },

    firstTimestamp() {
      return sequence[0]?.timestamp ?? 0
    },

    lastTimestamp() {
      return sequence[count - 1]?.timestamp ?? 0
    },
  }
}

/** Convert one validated input-file frame */
export function toFrame(raw: RawFrame): Frame {
  const ball = raw.ball
  return {
    timestamp: raw.time,
    ball: { x: ball[0], y: ball[1], z: ball.length === 3 ? ball[2] : 0 },
    players: raw.players.map(([x, y]) => ({ x, y })),
  }
}

/**
 * Validate raw frame data (as parsed from the input file) and build a store.
 *
 * Out-of-range coordinates are kept as they are; see `inspectBounds`.
 *
 * @throws DataFormatError when the data is not a non-empty list of well-formed
 * frames in non-decreasing timestamp order
 */
export function loadFrames(raw: unknown): FrameStore {
  const result = v.safeParse(RawFrameListSchema, raw)
  if (!result.success) {
    const [issue] = result.issues
    throw new DataFormatError(issue.message, { path: v.getDotPath(issue) ?? undefined })
  }

  const frames = result.output.map(toFrame)
  for (let i = 1; i < frames.length; i++) {
    const previous = frames[i - 1].timestamp
    const current = frames[i].timestamp
    if (current < previous) {
      throw new DataFormatError(`timestamp ${current} is earlier than the previous frame's ${previous}`, {
        path: `${i}.time`,
      })
    }
  }

  log('loaded', { count: frames.length, last: frames[frames.length - 1].timestamp })
  return createFrameStore(frames)
}
