import { setTimeout as delay } from 'node:timers/promises'
import type { Coordinate } from './coordinates'
import { GeocodeTimeoutError, errorMessage } from './errors'
import type { AddressComponents, ReverseGeocoder } from './geocoder'
import { ADDRESS_FIELDS } from './geocoder'
import { coordinateKey } from './geocode-cache'
import Log from './logger'
import { LruMap } from './lru'

export const UNKNOWN_LOCATION = 'Unknown Location'

export const MAX_ATTEMPTS = 3
export const GEOCODE_TIMEOUT_MS = 10_000
export const EMPTY_RESPONSE_BACKOFF_MS = 1000
export const TIMEOUT_BACKOFF_MS = 2000
export const MEMO_CAPACITY = 1024

export interface GeocodeStore {
  lookup: (lat: number, lon: number) => string | null
  store: (lat: number, lon: number, location: string) => void
}

export interface LocationResolverOptions {
  geocoder: ReverseGeocoder | null
  cache?: GeocodeStore | null
  timeoutMs?: number
  memoCapacity?: number
  sleep?: (ms: number) => Promise<void>
}

/**
 * First present component in city > town > village > suburb > state > county order.
 */
export function extractPlaceName(address: AddressComponents): string {
  for (const field of ADDRESS_FIELDS) {
    const value = address[field]
    if (value)
      return value
  }
  return UNKNOWN_LOCATION
}

export class LocationResolver {
  private readonly geocoder: ReverseGeocoder | null
  private readonly cache: GeocodeStore | null
  private readonly timeoutMs: number
  private readonly sleep: (ms: number) => Promise<void>
  // positive hits only, so a later store is never masked
  private readonly memo: LruMap<string, string>

  constructor(options: LocationResolverOptions) {
    this.geocoder = options.geocoder
    this.cache = options.cache ?? null
    this.timeoutMs = options.timeoutMs ?? GEOCODE_TIMEOUT_MS
    this.sleep = options.sleep ?? (async (ms) => {
      await delay(ms)
    })
    this.memo = new LruMap(options.memoCapacity ?? MEMO_CAPACITY)
  }

  get enabled(): boolean {
    return this.geocoder !== null
  }

  async resolve(coordinate: Coordinate | null): Promise<string> {
    if (!coordinate)
      return UNKNOWN_LOCATION

    if (!this.geocoder) {
      Log.debug('Geocoding disabled, using sentinel location')
      return UNKNOWN_LOCATION
    }

    const { latitude: lat, longitude: lon } = coordinate

    const cached = this.lookupCached(lat, lon)
    if (cached) {
      Log.debug(`Found cached location for ${lat}, ${lon}: ${cached}`)
      return cached
    }

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      Log.debug(`Geocoding attempt ${attempt}/${MAX_ATTEMPTS} for ${lat}, ${lon}`)
      try {
        const address = await this.geocoder.reverseGeocode(lat, lon, this.timeoutMs)
        if (address) {
          const place = extractPlaceName(address)
          this.remember(lat, lon, place)
          return place
        }
        Log.debug(`Geocoder returned no results for ${lat}, ${lon}`)
        await this.sleep(EMPTY_RESPONSE_BACKOFF_MS)
      }
      catch (err) {
        if (err instanceof GeocodeTimeoutError) {
          Log.debug(`Geocoding timed out, attempt ${attempt}`)
          await this.sleep(TIMEOUT_BACKOFF_MS)
          continue
        }
        Log.error(`Error getting location name for ${lat}, ${lon}: ${errorMessage(err)}`)
        break
      }
    }

    return UNKNOWN_LOCATION
  }

  private lookupCached(lat: number, lon: number): string | null {
    const key = coordinateKey(lat, lon)
    const memoized = this.memo.get(key)
    if (memoized)
      return memoized

    if (!this.cache)
      return null

    let stored: string | null
    try {
      stored = this.cache.lookup(lat, lon)
    }
    catch (err) {
      Log.warn(`Could not read geocoding cache for ${lat}, ${lon}: ${errorMessage(err)}`)
      return null
    }
    if (stored)
      this.memo.set(key, stored)
    return stored
  }

  // the memo only mirrors names the durable store accepted
  private remember(lat: number, lon: number, place: string): void {
    if (this.cache) {
      try {
        this.cache.store(lat, lon, place)
      }
      catch (err) {
        Log.warn(`Could not write geocoding cache for ${lat}, ${lon}: ${errorMessage(err)}`)
        return
      }
    }
    this.memo.set(coordinateKey(lat, lon), place)
  }
}
