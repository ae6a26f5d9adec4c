import type { Frame, Position } from './types'

export interface OutOfBounds {
  frameIndex: number
  /** `'ball'` or the player index */
  entity: 'ball' | number
  position: Position
}

const inUnitRange = (value: number) => value >= 0 && value <= 1

/**
 * List every coordinate outside the normalized [0, 1] range, ball height
 * included. Advisory only: frames are never rejected or clamped.
 */
export function inspectBounds(frames: readonly Frame[]): OutOfBounds[] {
  const found: OutOfBounds[] = []
  frames.forEach((frame, frameIndex) => {
    const { ball } = frame
    if (!inUnitRange(ball.x) || !inUnitRange(ball.y) || !inUnitRange(ball.z)) {
      found.push({ frameIndex, entity: 'ball', position: ball })
    }
    frame.players.forEach((position, entity) => {
      if (!inUnitRange(position.x) || !inUnitRange(position.y)) {
        found.push({ frameIndex, entity, position })
      }
    })
  })
  return found
}
