/**
 * Frame lookup
 *
 * Maps an elapsed playback time onto the pair of stored frames that surrounds
 * it. Frames are expected to be evenly spaced, so the data rate gives an O(1)
 * estimate of the lower index that only needs local correction.
 */

import type { FrameStore } from '@pitch-replay/frames'

/**
 * Frames per second implied by the timestamps: (N - 1) / (last - first).
 * Returns 0 when there is no span to measure.
 */
export function estimateDataRate(store: FrameStore): number {
  const span = store.lastTimestamp() - store.firstTimestamp()
  if (store.frameCount() < 2 || span <= 0) return 0
  return (store.frameCount() - 1) / span
}

/**
 * Find the largest frame index whose timestamp is <= `time`.
 *
 * The estimate `floor((time - first) * dataRate)` is clamped to the valid
 * index range when it falls outside it, then walked forward or backward until
 * it satisfies the ordering. A `dataRate` of 0 starts the walk at index 0.
 */
export function locateFrame(store: FrameStore, time: number, dataRate: number): number {
  const count = store.frameCount()
  if (count === 0) return 0

  let index = dataRate > 0 ? Math.floor((time - store.firstTimestamp()) * dataRate) : 0
  if (!(index >= 0)) {
    index = 0
  } else if (index > count - 1) {
    index = count - 1
  }

  while (index < count - 1 && store.frameAt(index + 1).timestamp <= time) index++
  while (index > 0 && store.frameAt(index).timestamp > time) index--

  return index
}

/**
 * Interpolation fraction of `time` between frame `lower` and the next one.
 * Equal timestamps yield 0; times outside the pair are clamped to [0, 1].
 */
export function fractionBetween(store: FrameStore, lower: number, time: number): number {
  if (lower >= store.frameCount() - 1) return 0
  const start = store.frameAt(lower).timestamp
  const span = store.frameAt(lower + 1).timestamp - start
  if (span <= 0) return 0
  return Math.max(0, Math.min(1, (time - start) / span))
}

