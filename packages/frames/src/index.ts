// Frame data
export type { BallPosition, Frame, Position } from './types'
export { PLAYER_COUNT, PLAYERS_PER_TEAM, TEAM_RANGES, teamOf, teamPlayers, type Team } from './teams'

// Errors
export { DataFormatError, IndexOutOfRangeError } from './errors'

// Loading
export { createFrameStore, loadFrames, toFrame, type FrameStore } from './frame-store'
export { readFrameFile } from './read-frame-file'
export { RawFrameListSchema, RawFrameSchema, type RawFrame } from './schema'

// Advisory checks and sample data
export { inspectBounds, type OutOfBounds } from './bounds'
export { generateSampleMatch, type SampleMatchOptions } from './sample-match'
