import * as v from 'valibot'
import { PLAYER_COUNT } from './teams'

const CoordinateSchema = v.pipe(v.number('expected a number'), v.finite('expected a finite number'))

/** `[x, y]` */
export const PointSchema = v.strictTuple(
  [CoordinateSchema, CoordinateSchema],
  'expected an [x, y] pair of numbers',
)

/** `[x, y]` or `[x, y, z]`, z being the ball height */
export const BallSchema = v.union(
  [PointSchema, v.strictTuple([CoordinateSchema, CoordinateSchema, CoordinateSchema])],
  'expected an [x, y] or [x, y, z] tuple of numbers',
)

export const RawFrameSchema = v.object({
  time: v.pipe(
    v.number('expected time in seconds'),
    v.finite('expected a finite time'),
    v.minValue(0, 'expected a non-negative time'),
  ),
  ball: BallSchema,
  players: v.pipe(
    v.array(PointSchema, 'expected a list of players'),
    v.length(PLAYER_COUNT, issue => `expected ${PLAYER_COUNT} players, got ${issue.received}`),
  ),
})

export const RawFrameListSchema = v.pipe(
  v.array(RawFrameSchema, 'expected a list of frames'),
  v.minLength(1, 'expected a non-empty list of frames'),
)

/** A frame as it appears in the input file */
export type RawFrame = v.InferOutput<typeof RawFrameSchema>
