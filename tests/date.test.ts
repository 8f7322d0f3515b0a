import { mkdtempSync, rmSync, utimesSync, writeFileSync } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  VIDEO_DATE_FIELDS,
  formatMonthDir,
  getDateParts,
  parseCaptureDate,
  parseExifDate,
  resolveCaptureDate,
} from '../src/helpers/date'
import { UnparseableDateError } from '../src/helpers/errors'

describe('helpers/date', () => {
  it('getDateParts pads values', () => {
    const d = new Date(2024, 0, 2, 3, 4, 5)
    expect(getDateParts(d)).toEqual({
      y: 2024,
      m: '01',
      d: '02',
      hh: '03',
      mm: '04',
      ss: '05',
    })
  })

  it('formatMonthDir prefixes the month name with its number', () => {
    expect(formatMonthDir(new Date(2021, 2, 5))).toBe('03-March')
    expect(formatMonthDir(new Date(2021, 11, 31))).toBe('12-December')
  })

  it('parseExifDate reads EXIF colon dates', () => {
    expect(parseExifDate('2024:01:02 03:04:05')).toEqual(new Date(2024, 0, 2, 3, 4, 5))
    expect(parseExifDate('nope')).toBeNull()
    expect(parseExifDate(undefined)).toBeNull()
  })
})

describe('helpers/date parseCaptureDate', () => {
  it('reads the colon-separated EXIF form', () => {
    expect(parseCaptureDate('2021:06:15 10:30:00')).toEqual(new Date(2021, 5, 15, 10, 30, 0))
  })

  it('reads the hyphen-separated form', () => {
    expect(parseCaptureDate('2021-06-15 10:30:00')).toEqual(new Date(2021, 5, 15, 10, 30, 0))
  })

  it('reads fractional seconds', () => {
    expect(parseCaptureDate('2021:06:15 10:30:00.5')).toEqual(new Date(2021, 5, 15, 10, 30, 0, 500))
    expect(parseCaptureDate('2021-06-15 10:30:00.123456')).toEqual(new Date(2021, 5, 15, 10, 30, 0, 123))
  })

  it('trims surrounding whitespace', () => {
    expect(parseCaptureDate('  2021:06:15 10:30:00 ')).toEqual(new Date(2021, 5, 15, 10, 30, 0))
  })

  it('reads ISO timestamps without a zone', () => {
    expect(parseCaptureDate('2021-06-15T10:30:00')).toEqual(new Date(2021, 5, 15, 10, 30, 0))
  })

  it('keeps the written wall-clock time of zoned ISO timestamps', () => {
    expect(parseCaptureDate('2020-01-02T03:04:05.000000Z')).toEqual(new Date(2020, 0, 2, 3, 4, 5))
    expect(parseCaptureDate('2020-01-02T03:04:05+02:00')).toEqual(new Date(2020, 0, 2, 3, 4, 5))
    expect(parseCaptureDate('2020-01-02T23:30:00-0500')).toEqual(new Date(2020, 0, 2, 23, 30, 0))
  })

  it('falls back to free-form parsing', () => {
    expect(parseCaptureDate('June 15, 2021 10:30:00')).toEqual(new Date(2021, 5, 15, 10, 30, 0))
  })

  it('throws when nothing matches', () => {
    expect(() => parseCaptureDate('not a date')).toThrow(UnparseableDateError)
  })
})

describe('helpers/date resolveCaptureDate', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'capture-date-'))
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it('uses DateTimeOriginal', async () => {
    const date = await resolveCaptureDate('a.jpg', { DateTimeOriginal: '2021:06:15 10:30:00' })
    expect(date).toEqual(new Date(2021, 5, 15, 10, 30, 0))
  })

  it('prefers DateTimeOriginal over DateTime', async () => {
    const date = await resolveCaptureDate('a.jpg', {
      DateTime: '2022:01:01 00:00:00',
      DateTimeOriginal: '2021:06:15 10:30:00',
    })
    expect(date).toEqual(new Date(2021, 5, 15, 10, 30, 0))
  })

  it('falls back to DateTime', async () => {
    const date = await resolveCaptureDate('a.jpg', { DateTime: '2022:01:01 08:00:00' })
    expect(date).toEqual(new Date(2022, 0, 1, 8, 0, 0))
  })

  it('takes Date values as they are', async () => {
    const original = new Date(2020, 4, 6, 7, 8, 9)
    await expect(resolveCaptureDate('a.mov', { CreationDate: original }, VIDEO_DATE_FIELDS)).resolves.toEqual(original)
  })

  it('reads video fields in their own order', async () => {
    const date = await resolveCaptureDate('a.mov', {
      MediaCreateDate: '2019:01:01 00:00:00',
      CreateDate: '2020:02:02 02:02:02',
    }, VIDEO_DATE_FIELDS)
    expect(date).toEqual(new Date(2020, 1, 2, 2, 2, 2))
  })

  it('uses the earlier of mtime and ctime without a metadata date', async () => {
    const file = path.join(dir, 'plain.jpg')
    writeFileSync(file, 'x')
    const mtime = new Date(2019, 0, 1, 12, 0, 0)
    utimesSync(file, mtime, mtime)

    const date = await resolveCaptureDate(file, {})
    expect(date.getTime()).toBe(mtime.getTime())
  })

  it('falls back to file times when the metadata date is unparseable', async () => {
    const file = path.join(dir, 'broken.jpg')
    writeFileSync(file, 'x')
    const mtime = new Date(2018, 6, 9, 12, 0, 0)
    utimesSync(file, mtime, mtime)

    const date = await resolveCaptureDate(file, { DateTimeOriginal: '0000:00:00 00:00:00' })
    expect(date.getTime()).toBe(mtime.getTime())
  })

  it('still produces a date for a file it cannot stat', async () => {
    const before = Date.now()
    const date = await resolveCaptureDate(path.join(dir, 'missing.jpg'), {})
    expect(date.getTime()).toBeGreaterThanOrEqual(before)
    expect(date.getTime()).toBeLessThanOrEqual(Date.now())
  })
})

describe('helpers/date outside UTC', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('files a video on the same day whichever extractor read it', async () => {
    vi.stubEnv('TZ', 'America/New_York')

    const fromExiftool = await resolveCaptureDate('a.mov', { CreateDate: '2020:01:02 03:04:05' }, VIDEO_DATE_FIELDS)
    const fromFfprobe = await resolveCaptureDate('a.mov', { CreationDate: '2020-01-02T03:04:05.000000Z' }, VIDEO_DATE_FIELDS)

    expect(fromFfprobe.getDate()).toBe(2)
    expect(fromFfprobe.getHours()).toBe(3)
    expect(getDateParts(fromFfprobe)).toEqual(getDateParts(fromExiftool))
  })
})
