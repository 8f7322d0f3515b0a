import os from 'node:os'
import { InvalidInputError } from './errors'
import type { GeocoderConfig, GeocoderProvider } from './geocoder'

export const USER_AGENT = 'media-sorter/0.1 (reverse geocoding for photo folders)'

export const MAX_WORKERS = 32

export function defaultWorkers(cpus = os.cpus().length): number {
  return Math.max(1, Math.min(MAX_WORKERS, cpus * 2))
}

function isProvider(value: string): value is GeocoderProvider {
  return value === 'google' || value === 'nominatim'
}

/**
 * Picks the geocoding backend. An explicit choice (flag, then
 * MEDIA_SORTER_GEOCODER) wins; otherwise Google is used when
 * GOOGLE_MAPS_API_KEY is set and geocoding stays off when it is not.
 */
export function resolveGeocoderConfig(
  requested: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): GeocoderConfig {
  const apiKey = env.GOOGLE_MAPS_API_KEY?.trim() || undefined
  const choice = (requested ?? env.MEDIA_SORTER_GEOCODER)?.trim().toLowerCase()

  if (choice) {
    if (!isProvider(choice))
      throw new InvalidInputError(`Unknown geocoder "${choice}". Use "google" or "nominatim".`)
    return { provider: choice, apiKey, userAgent: USER_AGENT }
  }

  return { provider: apiKey ? 'google' : null, apiKey, userAgent: USER_AGENT }
}
