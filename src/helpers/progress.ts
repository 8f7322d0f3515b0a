import cliProgress from 'cli-progress'

export interface ProgressReporter {
  tick: (filename?: string) => void
  stop: () => void
}

const SILENT: ProgressReporter = {
  tick: () => {},
  stop: () => {},
}

/**
 * Single-line bar on stdout. Disabled while debug logging is on, since
 * per-file log lines would tear the bar apart.
 */
export function createProgressBar(total: number, label: string, enabled = true): ProgressReporter {
  if (!enabled)
    return SILENT

  const bar = new cliProgress.SingleBar(
    {
      format: `${label} [{bar}] {percentage}% ({value}/{total}) {duration_formatted} {filename}`,
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
    },
    cliProgress.Presets.shades_classic,
  )

  bar.start(total, 0, { filename: '' })

  return {
    tick(filename) {
      bar.increment(1, { filename: filename ? `→ ${filename}` : '' })
    },
    stop() {
      bar.stop()
    },
  }
}
