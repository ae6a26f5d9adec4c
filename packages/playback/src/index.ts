// Interpolation
export { interpolate, lerp } from './interpolate'
export { InterpolationMismatchError } from './errors'

// Frame lookup
export { estimateDataRate, fractionBetween, locateFrame } from './frame-lookup'

// Playback
export {
  createPlaybackController,
  NO_DATA_AVAILABLE,
  type PlaybackController,
  type PlaybackInfo,
  type PlaybackOptions,
  type PlaybackSnapshot,
  type PlaybackState,
  type PlaybackWarning,
  type ResolvedPlaybackOptions,
  type StepDirection,
} from './controller'
