import { promises as fs } from 'node:fs'
import { isValid, parse } from 'date-fns'
import { UnparseableDateError, errorMessage } from './errors'
import Log from './logger'

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
]

export const PHOTO_DATE_FIELDS = ['DateTimeOriginal', 'DateTime'] as const

export const VIDEO_DATE_FIELDS = ['CreationDate', 'CreateDate', 'MediaCreateDate', 'TrackCreateDate'] as const

const FRACTION_DIGITS = [1, 2, 3, 4, 5, 6]

// date-fns patterns, tried in order; S runs cover 1 to 6 fractional digits
const DATE_FORMATS = [
  'yyyy:MM:dd HH:mm:ss',
  'yyyy-MM-dd HH:mm:ss',
  "yyyy-MM-dd'T'HH:mm:ss",
  ...FRACTION_DIGITS.map(n => `yyyy:MM:dd HH:mm:ss.${'S'.repeat(n)}`),
  ...FRACTION_DIGITS.map(n => `yyyy-MM-dd HH:mm:ss.${'S'.repeat(n)}`),
  ...FRACTION_DIGITS.map(n => `yyyy-MM-dd'T'HH:mm:ss.${'S'.repeat(n)}`),
]

// "Z", "+02:00", "-0500" after an ISO time
const ISO_ZONE = /(?<=T\d{2}:\d{2}:\d{2}(?:\.\d+)?)(?:Z|[+-]\d{2}:?\d{2})$/

export function getDateParts(date: Date) {
  return {
    y: date.getFullYear(),
    m: String(date.getMonth() + 1).padStart(2, '0'),
    d: String(date.getDate()).padStart(2, '0'),
    hh: String(date.getHours()).padStart(2, '0'),
    mm: String(date.getMinutes()).padStart(2, '0'),
    ss: String(date.getSeconds()).padStart(2, '0'),
  }
}

/**
 * "03-March"
 */
export function formatMonthDir(date: Date): string {
  return `${getDateParts(date).m}-${MONTH_NAMES[date.getMonth()]}`
}

/**
 * Free-form fallback: lets the Date constructor read anything it understands,
 * after turning an EXIF "YYYY:MM:DD" date into ISO form.
 */
export function parseExifDate(raw?: string): Date | null {
  if (!raw)
    return null
  const fixed = raw.replace(/^(\d{4}):(\d{2}):(\d{2})/, '$1-$2-$3')
  const d = new Date(fixed)
  return Number.isNaN(d.getTime()) ? null : d
}

/**
 * Parses a metadata timestamp against the known fixed formats, then free-form.
 * The result carries the written date and time in its local fields.
 */
export function parseCaptureDate(raw: string): Date {
  // capture dates are wall-clock times, so an ISO zone suffix is dropped
  const value = raw.trim().replace(ISO_ZONE, '')
  const reference = new Date(0)

  for (const format of DATE_FORMATS) {
    const date = parse(value, format, reference)
    if (isValid(date))
      return date
  }

  const loose = parseExifDate(value)
  if (loose)
    return loose

  throw new UnparseableDateError(value)
}

function readDateField(metadata: Readonly<Record<string, unknown>>, fields: readonly string[]): Date | string | null {
  for (const field of fields) {
    const value = metadata[field]
    if (value instanceof Date && !Number.isNaN(value.getTime()))
      return value
    if (typeof value === 'string' && value.trim() !== '')
      return value
  }
  return null
}

async function fileSystemDate(file: string): Promise<Date> {
  try {
    const stat = await fs.stat(file)
    const ms = Math.min(stat.mtimeMs, stat.ctimeMs)
    if (Number.isFinite(ms))
      return new Date(ms)
  }
  catch (err) {
    Log.error(`Error getting date for ${file}: ${errorMessage(err)}`)
  }

  try {
    const { birthtime } = await fs.lstat(file)
    Log.debug(`Falling back to creation time for ${file}`)
    return birthtime
  }
  catch (err) {
    Log.error(`Could not read creation time of ${file}: ${errorMessage(err)}`)
    return new Date()
  }
}

/**
 * Capture date from metadata, then filesystem timestamps. Never rejects.
 */
export async function resolveCaptureDate(
  file: string,
  metadata: Readonly<Record<string, unknown>>,
  fields: readonly string[] = PHOTO_DATE_FIELDS,
): Promise<Date> {
  const field = readDateField(metadata, fields)

  if (field instanceof Date)
    return field

  if (field !== null) {
    try {
      return parseCaptureDate(field)
    }
    catch (err) {
      Log.error(`Error getting date for ${file}: ${errorMessage(err)}`)
    }
  }

  const date = await fileSystemDate(file)
  Log.debug(`No usable metadata date for ${file}, using file timestamp ${date.toISOString()}`)
  return date
}
