import { MalformedCoordinateError } from './errors'

export type Rational = readonly [numerator: number, denominator: number]

export type DmsTriple = readonly Rational[]

export interface Coordinate {
  latitude: number
  longitude: number
}

function rationalToNumber(value: Rational, part: string): number {
  const [num, den] = value
  if (!Number.isFinite(num) || !Number.isFinite(den))
    throw new MalformedCoordinateError(`Non-numeric ${part}: ${num}/${den}`)
  if (den === 0)
    throw new MalformedCoordinateError(`Zero denominator in ${part}: ${num}/${den}`)
  return num / den
}

/**
 * degrees + minutes/60 + seconds/3600
 */
export function toDecimalDegrees(triple: DmsTriple): number {
  if (triple.length < 3)
    throw new MalformedCoordinateError(`Expected degrees, minutes and seconds, got ${triple.length} component(s)`)

  const d = rationalToNumber(triple[0], 'degrees')
  const m = rationalToNumber(triple[1], 'minutes')
  const s = rationalToNumber(triple[2], 'seconds')

  return d + m / 60 + s / 3600
}

function applyReferences(latitude: number, latRef: string, longitude: number, lonRef: string): Coordinate {
  let lat = latitude
  let lon = longitude

  if (latRef.toUpperCase() === 'S')
    lat = -lat
  // W forces a negative longitude even when the source value is already signed
  if (lonRef.toUpperCase() === 'W')
    lon = -Math.abs(lon)

  if (lat < -90 || lat > 90 || lon < -180 || lon > 180)
    throw new MalformedCoordinateError(`Coordinate out of range: ${lat}, ${lon}`)

  return { latitude: lat, longitude: lon }
}

export function toCoordinate(
  latitude: DmsTriple,
  latRef: string | undefined,
  longitude: DmsTriple,
  lonRef: string | undefined,
): Coordinate {
  return applyReferences(
    toDecimalDegrees(latitude),
    latRef ?? 'N',
    toDecimalDegrees(longitude),
    lonRef ?? 'E',
  )
}

/**
 * Signed decimal degrees, as found in video containers.
 */
export function fromSignedDecimal(latitude: number, longitude: number): Coordinate {
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude))
    throw new MalformedCoordinateError(`Non-numeric coordinate: ${latitude}, ${longitude}`)

  return applyReferences(
    Math.abs(latitude),
    latitude >= 0 ? 'N' : 'S',
    Math.abs(longitude),
    longitude >= 0 ? 'E' : 'W',
  )
}

function isRational(value: unknown): value is Rational {
  return Array.isArray(value)
    && value.length === 2
    && typeof value[0] === 'number'
    && typeof value[1] === 'number'
}

function readTriple(value: unknown, tag: string): DmsTriple {
  if (!Array.isArray(value))
    throw new MalformedCoordinateError(`${tag} is not a rational triple`)

  const triple: Rational[] = []
  for (const part of value) {
    if (!isRational(part))
      throw new MalformedCoordinateError(`${tag} contains a non-rational component`)
    triple.push(part)
  }
  return triple
}

function readRef(value: unknown): string | undefined {
  if (typeof value === 'string')
    return value.trim()
  if (Array.isArray(value) && typeof value[0] === 'string')
    return value[0].trim()
  return undefined
}

/**
 * Reads the EXIF GPS tags of a photo. Returns null when the file carries no GPS
 * position; throws MalformedCoordinateError when it carries an unusable one.
 */
export function readPhotoCoordinate(metadata: Readonly<Record<string, unknown>>): Coordinate | null {
  if (metadata.GPSLatitude === undefined || metadata.GPSLongitude === undefined)
    return null

  return toCoordinate(
    readTriple(metadata.GPSLatitude, 'GPSLatitude'),
    readRef(metadata.GPSLatitudeRef),
    readTriple(metadata.GPSLongitude, 'GPSLongitude'),
    readRef(metadata.GPSLongitudeRef),
  )
}

function readNumber(value: unknown): number {
  if (typeof value === 'number')
    return value
  if (typeof value === 'string' && value.trim() !== '')
    return Number(value)
  return Number.NaN
}

/**
 * Reads signed decimal GPS fields of a video, matched loosely by key name.
 */
export function readVideoCoordinate(metadata: Readonly<Record<string, unknown>>): Coordinate | null {
  let latitude: number | undefined
  let longitude: number | undefined

  for (const [key, value] of Object.entries(metadata)) {
    const k = key.toLowerCase()
    if (!k.includes('gps'))
      continue
    if (k.includes('latitude') && !k.includes('ref'))
      latitude = readNumber(value)
    else if (k.includes('longitude') && !k.includes('ref'))
      longitude = readNumber(value)
  }

  if (latitude === undefined || longitude === undefined)
    return null

  return fromSignedDecimal(latitude, longitude)
}
