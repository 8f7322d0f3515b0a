import path from 'node:path'
import { Semaphore } from 'async-mutex'
import { defaultWorkers, resolveGeocoderConfig } from './helpers/config'
import { DestinationBuilder } from './helpers/destination'
import type { FileOutcome } from './helpers/dispatcher'
import { processMediaFile } from './helpers/dispatcher'
import { InterruptedError, InvalidInputError, errorMessage } from './helpers/errors'
import { VIDEO_EXTRACTORS, photoExtractor } from './helpers/exif'
import { GeocodeCache } from './helpers/geocode-cache'
import { createGeocoder } from './helpers/geocoder'
import { ensureDir, isDirectory, walk } from './helpers/fs'
import { LocationResolver } from './helpers/location'
import Log from './helpers/logger'
import { normalizeTypes } from './helpers/media'
import { createProgressBar } from './helpers/progress'

/* ---------- TYPES ---------- */

export type SortOptions = {
  sourceDir: string
  targetDir: string
  workers?: number
  useCache?: boolean
  cacheDir?: string
  debug?: boolean
  types?: string[]
  includeDay?: boolean
  geocoder?: string
}

export type SortSummary = {
  total: number
  processed: number
  skipped: number
  errors: number
  seconds: number
  filesPerSecond: number
  cacheSize: number | null
}

/* ---------- MAIN ---------- */

export async function runMediaSorter(options: SortOptions, signal?: AbortSignal): Promise<SortSummary> {
  const { sourceDir, targetDir } = options
  const started = Date.now()

  if (!(await isDirectory(sourceDir)))
    throw new InvalidInputError(`Input folder does not exist or is not a directory: ${sourceDir}`)

  const workers = options.workers ?? defaultWorkers()
  if (!Number.isInteger(workers) || workers < 1)
    throw new InvalidInputError(`Worker count must be a positive integer, got ${workers}`)

  Log.info(`Starting media sort from ${sourceDir} to ${targetDir}`)
  await ensureDir(targetDir)

  const geocoder = createGeocoder(resolveGeocoderConfig(options.geocoder))
  if (!geocoder)
    Log.warn('No geocoder configured, every file goes to "Unknown Location"')
  else
    Log.debug(`Using ${geocoder.name} geocoder`)

  const cache = options.useCache === false ? null : new GeocodeCache(options.cacheDir)
  const location = new LocationResolver({ geocoder, cache })
  const outputRoot = path.resolve(targetDir)
  const destination = new DestinationBuilder(outputRoot, { includeDay: options.includeDay })
  const allowlist = options.types && options.types.length > 0 ? normalizeTypes(options.types) : undefined

  // an output folder nested in the input must not be fed back in
  const files = (await walk(sourceDir))
    .filter(file => !path.resolve(file).startsWith(outputRoot + path.sep))
  Log.info(`Found ${files.length} files`)

  const semaphore = new Semaphore(workers)
  const bar = createProgressBar(files.length, 'Processing media', !options.debug)
  const counts = { processed: 0, skipped: 0, errors: 0 }

  const record = (outcome: FileOutcome) => {
    switch (outcome.status) {
      case 'success':
        counts.processed++
        Log.debug(`Organized ${path.basename(outcome.file)} to ${outcome.destination}`)
        break
      case 'skipped':
        counts.skipped++
        Log.debug(`Skipped ${path.basename(outcome.file)}: ${outcome.reason}`)
        break
      case 'error':
        counts.errors++
        Log.debug(outcome.message)
        break
    }
    bar.tick(path.basename(outcome.file))
  }

  await Promise.all(files.map(file => semaphore.runExclusive(async () => {
    // queued files are dropped once interrupted; running ones finish
    if (signal?.aborted)
      return
    record(await processMediaFile(file, {
      extractors: { photo: [photoExtractor], video: VIDEO_EXTRACTORS },
      location,
      destination,
      allowlist,
    }))
  })))

  bar.stop()

  if (signal?.aborted)
    throw new InterruptedError()

  const seconds = (Date.now() - started) / 1000
  let cacheSize: number | null = null
  if (cache) {
    try {
      cacheSize = cache.size()
    }
    catch (err) {
      Log.warn(`Could not count geocoding cache entries: ${errorMessage(err)}`)
    }
  }

  const summary: SortSummary = {
    total: files.length,
    ...counts,
    seconds,
    filesPerSecond: seconds > 0 ? counts.processed / seconds : 0,
    cacheSize,
  }

  Log.info('Media sort summary:')
  Log.info(`Total files found: ${summary.total}`)
  Log.info(`Successfully processed: ${summary.processed}`)
  Log.info(`Skipped: ${summary.skipped}`)
  Log.info(`Errors: ${summary.errors}`)
  Log.info(`Total time: ${seconds.toFixed(2)} seconds`)
  Log.info(`Processing speed: ${summary.filesPerSecond.toFixed(2)} files/second`)
  if (cacheSize !== null)
    Log.info(`Geocoding cache size: ${cacheSize} locations`)

  return summary
}
