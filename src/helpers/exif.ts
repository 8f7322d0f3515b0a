import { spawn } from 'node:child_process'
import { promises as fs } from 'node:fs'
import process from 'node:process'
import ExifReader from 'exifreader'
import { errorMessage } from './errors'
import Log from './logger'

export type RawMetadata = Readonly<Record<string, unknown>>

export interface MetadataExtractor {
  readonly name: string
  extract: (file: string) => Promise<RawMetadata>
}

const EXIFTOOL = process.platform === 'win32' ? 'exiftool.exe' : 'exiftool'
const FFPROBE = process.platform === 'win32' ? 'ffprobe.exe' : 'ffprobe'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function runTool(command: string, args: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    const p = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    })

    let out = ''
    let err = ''

    p.stdout.on('data', d => (out += d))
    p.stderr.on('data', d => (err += d))

    p.on('error', reject)
    p.on('close', (code) => {
      if (code !== 0) {
        reject(new Error(err || `${command} exited with code ${code}`))
      }
      else {
        resolve(out)
      }
    })
  })
}

/* ---------- PHOTOS ---------- */

/**
 * Flattens exifreader's tag table to tag name -> raw value, so rationals stay
 * `[numerator, denominator]` pairs and strings stay strings.
 */
export function flattenTags(tags: Readonly<Record<string, unknown>>): RawMetadata {
  const metadata: Record<string, unknown> = {}

  for (const [name, tag] of Object.entries(tags)) {
    if (!isRecord(tag) || !('value' in tag))
      continue
    const value = tag.value
    // single-element string lists (DateTimeOriginal, GPSLatitudeRef)
    metadata[name] = Array.isArray(value) && value.length === 1 && typeof value[0] === 'string'
      ? value[0]
      : value
  }

  return metadata
}

export const photoExtractor: MetadataExtractor = {
  name: 'exifreader',
  async extract(file) {
    const buffer = await fs.readFile(file)
    const tags: unknown = await ExifReader.load(buffer)
    return isRecord(tags) ? flattenTags(tags) : {}
  },
}

/* ---------- VIDEOS ---------- */

export const EXIFTOOL_VIDEO_TAGS = [
  'CreationDate',
  'CreateDate',
  'MediaCreateDate',
  'TrackCreateDate',
  'GPSLatitude',
  'GPSLongitude',
]

export const exiftoolExtractor: MetadataExtractor = {
  name: 'exiftool',
  async extract(file) {
    const out = await runTool(EXIFTOOL, [
      '-json',
      '-n',
      '-charset',
      'filename=UTF8',
      ...EXIFTOOL_VIDEO_TAGS.map(t => `-${t}`),
      file,
    ])

    const rows: unknown = JSON.parse(out)
    const row = Array.isArray(rows) ? rows[0] : undefined
    if (!isRecord(row))
      return {}

    const metadata: Record<string, unknown> = {}
    for (const tag of EXIFTOOL_VIDEO_TAGS) {
      // QuickTime writes an all-zero date when none was recorded
      if (row[tag] !== undefined && row[tag] !== '0000:00:00 00:00:00')
        metadata[tag] = row[tag]
    }
    return metadata
  },
}

/**
 * ISO 6709 location as written by phones, e.g. "+48.8566+002.3522/".
 */
export function parseIso6709(value: string): { lat: number, lon: number } | null {
  const match = /^([+-]\d+(?:\.\d+)?)([+-]\d+(?:\.\d+)?)/.exec(value.trim())
  if (!match)
    return null
  return { lat: Number(match[1]), lon: Number(match[2]) }
}

export const ffprobeExtractor: MetadataExtractor = {
  name: 'ffprobe',
  async extract(file) {
    const out = await runTool(FFPROBE, [
      '-v',
      'quiet',
      '-print_format',
      'json',
      '-show_format',
      file,
    ])

    const data: unknown = JSON.parse(out)
    const tags: Record<string, unknown> = isRecord(data) && isRecord(data.format) && isRecord(data.format.tags)
      ? data.format.tags
      : {}

    const metadata: Record<string, unknown> = {}
    if (typeof tags.creation_time === 'string')
      metadata.CreationDate = tags.creation_time

    const location = tags['com.apple.quicktime.location.ISO6709'] ?? tags.location
    const position = typeof location === 'string' ? parseIso6709(location) : null
    if (position) {
      metadata.GPSLatitude = position.lat
      metadata.GPSLongitude = position.lon
    }
    return metadata
  },
}

export const VIDEO_EXTRACTORS: readonly MetadataExtractor[] = [exiftoolExtractor, ffprobeExtractor]

/**
 * Tries each extractor in order; the next one runs when the previous throws
 * or finds nothing. Resolves to empty metadata when all of them fail.
 */
export async function extractWithFallback(file: string, extractors: readonly MetadataExtractor[]): Promise<RawMetadata> {
  for (const extractor of extractors) {
    try {
      const metadata = await extractor.extract(file)
      if (Object.keys(metadata).length > 0) {
        Log.debug(`${extractor.name} read ${Object.keys(metadata).length} field(s) from ${file}`)
        return metadata
      }
      Log.debug(`${extractor.name} found no metadata in ${file}`)
    }
    catch (err) {
      Log.warn(`${extractor.name} could not read ${file}: ${errorMessage(err)}`)
    }
  }
  return {}
}
