import type {
  PlaybackController,
  PlaybackInfo,
  PlaybackSnapshot,
  PlaybackState,
  StepDirection,
} from '@pitch-replay/playback'
import { debug } from '@pitch-replay/utils'
import { batch, createSignal, type Accessor } from 'solid-js'

const log = debug('replay', false)

export interface ReplayState {
  /** Snapshot to draw this tick */
  snapshot: Accessor<PlaybackSnapshot>
  /** Current playback state */
  state: Accessor<PlaybackState>
  /** Elapsed playback time in seconds */
  elapsed: Accessor<number>
  /** Frame counter, time and state for the HUD */
  info: Accessor<PlaybackInfo>
}

export interface ReplayActions {
  /** Play or pause */
  togglePlayPause: () => void
  /** Back to the first frame, paused */
  restart: () => void
  /** Step one frame forward */
  stepForward: () => void
  /** Step one frame backward */
  stepBackward: () => void
  /** Step key pressed: step once, scrub while held */
  holdStep: (direction: StepDirection) => void
  /** Step key released */
  releaseStep: (direction: StepDirection) => void
  /**
   * One host tick: advance the controller, then read its snapshot.
   * Returns the snapshot to draw.
   */
  tick: (deltaSeconds: number) => PlaybackSnapshot
}

export interface Replay extends ReplayState, ReplayActions {
  /** The controller being mirrored */
  controller: PlaybackController
}

/**
 * Mirror a playback controller into signals for a reactive UI.
 *
 * The controller stays the only owner of playback time; every command and
 * tick goes through it and the signals are refreshed afterwards.
 */
export function createReplay(controller: PlaybackController): Replay {
  const [snapshot, setSnapshot] = createSignal(controller.currentSnapshot())
  const [state, setState] = createSignal(controller.state)
  const [elapsed, setElapsed] = createSignal(controller.elapsed)
  const [info, setInfo] = createSignal(controller.info())

  function sync(): PlaybackSnapshot {
    const current = controller.currentSnapshot()
    batch(() => {
      setSnapshot(current)
      setState(current.state)
      setElapsed(current.elapsed)
      setInfo(controller.info())
    })
    return current
  }

  function command(name: string, run: () => void) {
    return () => {
      log(name)
      run()
      sync()
    }
  }

  return {
    controller,
    snapshot,
    state,
    elapsed,
    info,
    togglePlayPause: command('togglePlayPause', () => controller.togglePlayPause()),
    restart: command('restart', () => controller.restart()),
    stepForward: command('stepForward', () => controller.stepForward()),
    stepBackward: command('stepBackward', () => controller.stepBackward()),
    holdStep(direction) {
      log('holdStep', { direction })
      controller.holdStep(direction)
      sync()
    },
    releaseStep(direction) {
      log('releaseStep', { direction })
      controller.releaseStep(direction)
      sync()
    },
    tick(deltaSeconds) {
      controller.advance(deltaSeconds)
      return sync()
    },
  }
}
