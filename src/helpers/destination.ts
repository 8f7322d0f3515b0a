import { promises as fs } from 'node:fs'
import path from 'node:path'
import { Mutex } from 'async-mutex'
import { formatMonthDir, getDateParts } from './date'
import { ensureDir } from './fs'
import Log from './logger'

export interface DestinationOptions {
  includeDay?: boolean
}

const UNSAFE_CHARS = /[<>:"/\\|?*\u0000-\u001F]/g

export function sanitizeSegment(name: string): string {
  const cleaned = name.replace(UNSAFE_CHARS, '_').trim()
  // "." and ".." would escape the date folder
  return cleaned === '' || /^\.+$/.test(cleaned) ? '_' : cleaned
}

export function formatDateDir(root: string, date: Date, includeDay = true): string {
  const { y, d } = getDateParts(date)
  const parts = [root, String(y), formatMonthDir(date)]
  if (includeDay)
    parts.push(d)
  return path.join(...parts)
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file)
    return true
  }
  catch {
    return false
  }
}

/**
 * Builds `root/year/MM-Month/[DD]/place/filename` and picks a free name,
 * inserting `_1`, `_2`, ... before the extension.
 *
 * Allocation is serialized per directory and every handed-out path is
 * reserved for the lifetime of the builder, so two workers in this process
 * never get the same path even before either has copied its file. Another
 * process writing into the same tree can still race with the existence check.
 */
export class DestinationBuilder {
  // both grow for the whole run, bounded by the number of files
  private readonly locks = new Map<string, Mutex>()
  private readonly reserved = new Set<string>()
  private readonly includeDay: boolean

  constructor(private readonly root: string, options: DestinationOptions = {}) {
    this.includeDay = options.includeDay ?? true
  }

  directoryFor(date: Date, place: string): string {
    return path.join(formatDateDir(this.root, date, this.includeDay), sanitizeSegment(place))
  }

  private lockFor(dir: string): Mutex {
    let lock = this.locks.get(dir)
    if (!lock) {
      lock = new Mutex()
      this.locks.set(dir, lock)
    }
    return lock
  }

  async allocate(date: Date, place: string, sourceFile: string): Promise<string> {
    const dir = this.directoryFor(date, place)
    await ensureDir(dir)

    return this.lockFor(dir).runExclusive(async () => {
      const { name: stem, ext } = path.parse(sourceFile)
      let candidate = path.join(dir, `${stem}${ext}`)
      let counter = 1

      while (this.reserved.has(candidate) || await exists(candidate)) {
        candidate = path.join(dir, `${stem}_${counter}${ext}`)
        counter++
      }

      this.reserved.add(candidate)
      Log.debug(`Final destination path: ${candidate}`)
      return candidate
    })
  }

  /**
   * Frees a reservation whose copy never happened.
   */
  release(destination: string): void {
    this.reserved.delete(destination)
  }
}
