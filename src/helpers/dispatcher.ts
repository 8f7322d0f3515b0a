import path from 'node:path'
import type { Coordinate } from './coordinates'
import { readPhotoCoordinate, readVideoCoordinate } from './coordinates'
import { PHOTO_DATE_FIELDS, VIDEO_DATE_FIELDS, resolveCaptureDate } from './date'
import type { DestinationBuilder } from './destination'
import { CopyFailureError, UnsupportedFileTypeError, errorMessage } from './errors'
import type { MetadataExtractor, RawMetadata } from './exif'
import { extractWithFallback } from './exif'
import { copyPreservingTimes } from './fs'
import type { LocationResolver } from './location'
import Log from './logger'
import type { MediaKind } from './media'
import { classifyMedia } from './media'

export type FileOutcome =
  | { status: 'success', file: string, destination: string }
  | { status: 'skipped', file: string, reason: string }
  | { status: 'error', file: string, message: string }

export interface DispatcherDeps {
  extractors: Record<MediaKind, readonly MetadataExtractor[]>
  location: LocationResolver
  destination: DestinationBuilder
  allowlist?: ReadonlySet<string>
  copy?: (source: string, destination: string) => Promise<void>
}

function readCoordinate(kind: MediaKind, file: string, metadata: RawMetadata): Coordinate | null {
  try {
    return kind === 'photo' ? readPhotoCoordinate(metadata) : readVideoCoordinate(metadata)
  }
  catch (err) {
    Log.debug(`Error processing GPS coordinates of ${file}: ${errorMessage(err)}`)
    return null
  }
}

/**
 * Runs one file through extraction, date and place resolution, destination
 * allocation and copy. Never rejects: every failure becomes an outcome.
 */
export async function processMediaFile(file: string, deps: DispatcherDeps): Promise<FileOutcome> {
  const name = path.basename(file)
  const kind = classifyMedia(file, deps.allowlist)

  if (!kind) {
    const reason = new UnsupportedFileTypeError(name).message
    return { status: 'skipped', file, reason }
  }

  let destination: string | null = null
  try {
    const metadata = await extractWithFallback(file, deps.extractors[kind])
    const date = await resolveCaptureDate(file, metadata, kind === 'photo' ? PHOTO_DATE_FIELDS : VIDEO_DATE_FIELDS)
    const place = await deps.location.resolve(readCoordinate(kind, file, metadata))

    destination = await deps.destination.allocate(date, place, file)
    await (deps.copy ?? copyPreservingTimes)(file, destination)

    return { status: 'success', file, destination }
  }
  catch (err) {
    if (destination)
      deps.destination.release(destination)
    if (err instanceof CopyFailureError)
      return { status: 'error', file, message: err.message }
    Log.debug(`Error processing ${name}`, err)
    return { status: 'error', file, message: `Error processing ${name}: ${errorMessage(err)}` }
  }
}
