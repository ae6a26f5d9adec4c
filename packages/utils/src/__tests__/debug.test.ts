import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

describe('debug', () => {
  beforeEach(() => {
    // the env gate is read once at module load
    vi.resetModules()
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  it('logs from enabled loggers when PITCH_REPLAY_DEBUG=1', async () => {
    vi.stubEnv('PITCH_REPLAY_DEBUG', '1')
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
    const { debug } = await import('../index')

    debug('controller', true)('advance', { delta: 0.5 })
    debug('lookup', false)('skipped')

    expect(spy).toHaveBeenCalledTimes(1)
    expect(spy).toHaveBeenCalledWith('[controller]', 'advance', { delta: 0.5 })
  })

  it('stays silent without PITCH_REPLAY_DEBUG', async () => {
    vi.stubEnv('PITCH_REPLAY_DEBUG', '')
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {})
    const { debug } = await import('../index')

    debug('controller', true)('advance')

    expect(spy).not.toHaveBeenCalled()
  })
})
