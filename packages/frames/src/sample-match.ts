import type { RawFrame } from './schema'

export interface SampleMatchOptions {
  /** Length of the generated recording in seconds (default: 10) */
  duration?: number
  /** Frames per second (default: 30) */
  dataRate?: number
  /** PRNG seed; the same seed always yields the same match (default: 1) */
  seed?: number
}

type Point = [x: number, y: number]

const TEAM_A_FORMATION: Point[] = [
  [0.1, 0.1], [0.15, 0.1], [0.2, 0.1], [0.25, 0.1], [0.3, 0.1],
  [0.1, 0.3], [0.15, 0.3], [0.2, 0.3], [0.25, 0.3], [0.3, 0.3],
  [0.1, 0.5],
]

const TEAM_B_FORMATION: Point[] = [
  [0.9, 0.1], [0.85, 0.1], [0.8, 0.1], [0.75, 0.1], [0.7, 0.1],
  [0.9, 0.3], [0.85, 0.3], [0.8, 0.3], [0.75, 0.3], [0.7, 0.3],
  [0.9, 0.5],
]

const BALL_SPEED = 0.02
const GRAVITY = -0.02
const KICK_CHANCE = 0.05
const PLAYER_PULL = 0.01
const PLAYER_JITTER = 0.005

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(max, value))

/** mulberry32 */
function createRandom(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Generate a synthetic match in the input-file format.
 *
 * The ball drifts with a slowly wandering heading and is kicked up at random,
 * falling back under gravity. Players drift toward the ball but stay in their
 * own half.
 */
export function generateSampleMatch(options: SampleMatchOptions = {}): RawFrame[] {
  const duration = options.duration ?? 10
  const dataRate = options.dataRate ?? 30
  const random = createRandom(options.seed ?? 1)
  const uniform = (min: number, max: number) => min + (max - min) * random()

  const totalFrames = Math.floor(duration * dataRate)
  const frames: RawFrame[] = []

  let teamA = TEAM_A_FORMATION.map(([x, y]): Point => [x, y])
  let teamB = TEAM_B_FORMATION.map(([x, y]): Point => [x, y])
  let ball: [number, number, number] = [0.5, 0.5, 0]
  let heading = uniform(0, 2 * Math.PI)
  let velocityZ = 0

  const drift = (players: Point[], minX: number, maxX: number): Point[] =>
    players.map(([x, y]): Point => [
      clamp(x + (ball[0] - x) * PLAYER_PULL + uniform(-PLAYER_JITTER, PLAYER_JITTER), minX, maxX),
      clamp(y + (ball[1] - y) * PLAYER_PULL + uniform(-PLAYER_JITTER, PLAYER_JITTER), 0.05, 0.95),
    ])

  for (let frame = 0; frame < totalFrames; frame++) {
    if (frame > 0) {
      heading += uniform(-0.1, 0.1)
      const x = clamp(ball[0] + BALL_SPEED * Math.cos(heading), 0.05, 0.95)
      const y = clamp(ball[1] + BALL_SPEED * Math.sin(heading), 0.05, 0.95)

      velocityZ += GRAVITY
      if (random() < KICK_CHANCE) {
        velocityZ = uniform(0.1, 0.3)
      }
      let z = ball[2] + velocityZ
      if (z < 0) {
        z = 0
        velocityZ = 0
      } else if (z > 1) {
        z = 1
        velocityZ = 0
      }
      ball = [x, y, z]

      teamA = drift(teamA, 0.05, 0.45)
      teamB = drift(teamB, 0.55, 0.95)
    }

    frames.push({
      time: frame / dataRate,
      ball: [ball[0], ball[1], ball[2]],
      players: [...teamA, ...teamB].map(([x, y]): Point => [x, y]),
    })
  }

  return frames
}
