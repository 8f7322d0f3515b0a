import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createProgressBar } from '../src/helpers/progress'

const progressMocks = vi.hoisted(() => {
  const start = vi.fn()
  const increment = vi.fn()
  const stop = vi.fn()
  const singleBar = vi.fn().mockImplementation(() => ({ start, increment, stop }))
  return { start, increment, stop, singleBar }
})

vi.mock('cli-progress', () => ({
  default: {
    SingleBar: progressMocks.singleBar,
    Presets: { shades_classic: 'preset' },
  },
}))

describe('helpers/progress', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('creates and starts a progress bar', () => {
    createProgressBar(10, 'Label')

    expect(progressMocks.singleBar).toHaveBeenCalledTimes(1)
    expect(progressMocks.singleBar.mock.calls[0][0]).toMatchObject({
      format: 'Label [{bar}] {percentage}% ({value}/{total}) {duration_formatted} {filename}',
    })
    expect(progressMocks.start).toHaveBeenCalledWith(10, 0, { filename: '' })
  })

  it('ticks with the file name and stops', () => {
    const bar = createProgressBar(2, 'Label')
    bar.tick('a.jpg')
    bar.tick()
    bar.stop()

    expect(progressMocks.increment.mock.calls).toEqual([
      [1, { filename: '→ a.jpg' }],
      [1, { filename: '' }],
    ])
    expect(progressMocks.stop).toHaveBeenCalledTimes(1)
  })

  it('stays silent when disabled', () => {
    const bar = createProgressBar(2, 'Label', false)
    bar.tick('a.jpg')
    bar.stop()

    expect(progressMocks.singleBar).not.toHaveBeenCalled()
  })
})
