import { afterEach, describe, expect, it, vi } from 'vitest'
import Log from '../src/helpers/logger'

describe('helpers/logger', () => {
  afterEach(() => {
    Log.setLogLevel('info')
    vi.restoreAllMocks()
  })

  it('hides debug output at the default level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const info = vi.spyOn(console, 'log').mockImplementation(() => {})

    Log.debug('hidden')
    Log.info('shown')

    expect(Log.getLogLevel()).toBe('info')
    expect(debug).not.toHaveBeenCalled()
    expect(info).toHaveBeenCalledTimes(1)
    expect(String(info.mock.calls[0][0])).toContain('shown')
  })

  it('prints debug output once the level is raised', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    Log.setLogLevel('debug')

    Log.debug('details', { file: 'a.jpg' })

    expect(Log.isDebug()).toBe(true)
    expect(debug).toHaveBeenCalledWith(expect.stringContaining('details'), { file: 'a.jpg' })
  })

  it('keeps errors at the quietest level', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    Log.setLogLevel('error')

    Log.warn('dropped')
    Log.error('kept')

    expect(warn).not.toHaveBeenCalled()
    expect(error).toHaveBeenCalledTimes(1)
  })
})
