import type { PlaybackInfo } from '@pitch-replay/playback'

export const NO_DATA_MESSAGE = 'No data available'

export const CONTROLS_HELP = 'SPACE: Play/Pause | R: Restart | Arrows: Step/FF/RW'

/** State label, naming the scrub direction and speed while scrubbing */
export function formatState(info: PlaybackInfo): string {
  switch (info.scrub) {
    case 'forward':
      return `FAST FORWARD (${info.fastForwardSpeed}x)`
    case 'backward':
      return `REWIND (${info.rewindSpeed}x)`
    case null:
      return info.state.toUpperCase()
  }
}

/** HUD text lines: frame counter, time and state */
export function formatHud(info: PlaybackInfo): string[] {
  if (info.totalFrames === 0) return [NO_DATA_MESSAGE]
  return [
    `Frame: ${info.currentFrame}/${info.totalFrames}`,
    `Time: ${info.time.toFixed(2)}s`,
    `State: ${formatState(info)}`,
  ]
}
