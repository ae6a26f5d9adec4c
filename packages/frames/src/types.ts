/** A normalized pitch coordinate, nominally within [0, 1] x [0, 1] */
export interface Position {
  readonly x: number
  readonly y: number
}

/** Ball position with height (0 = ground, 1 = maximum height) */
export interface BallPosition extends Position {
  readonly z: number
}

/** One timestamped snapshot of every entity on the pitch */
export interface Frame {
  /** Seconds since the start of the recording */
  readonly timestamp: number
  readonly ball: BallPosition
  /** Exactly 22 players: team A at 0-10, team B at 11-21 */
  readonly players: readonly Position[]
}
