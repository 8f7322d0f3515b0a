/**
 * GPS rational data is absent, incomplete, or not numeric.
 * Callers treat the file as having no location.
 */
export class MalformedCoordinateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MalformedCoordinateError'
  }
}

export class UnparseableDateError extends Error {
  constructor(public readonly raw: string) {
    super(`Could not parse date string: ${raw}`)
    this.name = 'UnparseableDateError'
  }
}

/**
 * Reverse geocoding attempt exceeded its timeout. Retried by the location resolver.
 */
export class GeocodeTimeoutError extends Error {
  constructor(
    public readonly latitude: number,
    public readonly longitude: number,
    public readonly timeoutMs: number,
  ) {
    super(`Reverse geocoding ${latitude}, ${longitude} timed out after ${timeoutMs}ms`)
    this.name = 'GeocodeTimeoutError'
  }
}

/**
 * Any non-timeout geocoding failure. Stops the retry loop.
 */
export class GeocodeError extends Error {
  constructor(
    message: string,
    public readonly latitude: number,
    public readonly longitude: number,
    public readonly cause?: unknown,
  ) {
    super(message)
    this.name = 'GeocodeError'
  }
}

export class CopyFailureError extends Error {
  constructor(
    public readonly source: string,
    public readonly destination: string,
    public readonly cause?: unknown,
  ) {
    super(`Failed to copy ${source} to ${destination}: ${errorMessage(cause)}`)
    this.name = 'CopyFailureError'
  }
}

export class UnsupportedFileTypeError extends Error {
  constructor(public readonly file: string) {
    super(`Not a supported media file: ${file}`)
    this.name = 'UnsupportedFileTypeError'
  }
}

export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidInputError'
  }
}

export class InterruptedError extends Error {
  constructor() {
    super('Process interrupted by user')
    this.name = 'InterruptedError'
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error)
    return err.message
  return String(err)
}
