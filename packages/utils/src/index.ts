const ENABLED = typeof process !== 'undefined' && process.env.PITCH_REPLAY_DEBUG === '1'

/**
 * Create a debug logger that can be toggled on/off
 *
 * Logging happens only when the logger is enabled AND the process was started
 * with `PITCH_REPLAY_DEBUG=1`.
 *
 * Usage:
 *   const log = debug("controller", true);
 *   log("advance", { elapsed, delta });
 */
export function debug(title: string, enabled: boolean) {
  return (...args: unknown[]) => {
    if (ENABLED && enabled) {
      console.log(`[${title}]`, ...args)
    }
  }
}
