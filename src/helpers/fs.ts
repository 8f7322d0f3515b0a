import { constants, promises as fs } from 'node:fs'
import path from 'node:path'
import { CopyFailureError } from './errors'

export async function walk(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true })
  const result: string[] = []

  for (const e of entries) {
    const full = path.join(dir, e.name)
    if (e.isDirectory()) {
      result.push(...(await walk(full)))
    }
    else if (e.isFile()) {
      result.push(full)
    }
  }

  return result
}

export async function ensureDir(p: string) {
  await fs.mkdir(p, { recursive: true })
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory()
  }
  catch {
    return false
  }
}

/**
 * Copies a file and carries over its access and modification times.
 * Fails instead of overwriting an existing destination.
 */
export async function copyPreservingTimes(source: string, destination: string): Promise<void> {
  try {
    await ensureDir(path.dirname(destination))
    await fs.copyFile(source, destination, constants.COPYFILE_EXCL)
    const { atime, mtime } = await fs.stat(source)
    await fs.utimes(destination, atime, mtime)
  }
  catch (err) {
    throw new CopyFailureError(source, destination, err)
  }
}
