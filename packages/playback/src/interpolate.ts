import type { BallPosition, Frame, Position } from '@pitch-replay/frames'
import { InterpolationMismatchError } from './errors'

/** `a + (b - a) * t`, returning the endpoints exactly at t = 0 and t = 1 */
export function lerp(a: number, b: number, t: number): number {
  if (t === 0) return a
  if (t === 1) return b
  return a + (b - a) * t
}

const lerpPosition = (a: Position, b: Position, t: number): Position => ({
  x: lerp(a.x, b.x, t),
  y: lerp(a.y, b.y, t),
})

const lerpBall = (a: BallPosition, b: BallPosition, t: number): BallPosition => ({
  x: lerp(a.x, b.x, t),
  y: lerp(a.y, b.y, t),
  z: lerp(a.z, b.z, t),
})

/**
 * Linearly interpolate every coordinate between two frames, per axis and per
 * entity (players matched by index).
 *
 * `t` is not clamped: callers keep it in [0, 1].
 *
 * @throws InterpolationMismatchError when the frames have different player counts
 */
export function interpolate(from: Frame, to: Frame, t: number): Frame {
  if (from.players.length !== to.players.length) {
    throw new InterpolationMismatchError(from.players.length, to.players.length)
  }
  return {
    timestamp: lerp(from.timestamp, to.timestamp, t),
    ball: lerpBall(from.ball, to.ball, t),
    players: from.players.map((position, index) => lerpPosition(position, to.players[index], t)),
  }
}
