import axios from 'axios'
import { GeocodeError, GeocodeTimeoutError, errorMessage } from './errors'

export const ADDRESS_FIELDS = ['city', 'town', 'village', 'suburb', 'state', 'county'] as const

export type AddressField = typeof ADDRESS_FIELDS[number]

export type AddressComponents = Partial<Record<AddressField, string>>

export type GeocoderProvider = 'google' | 'nominatim'

/**
 * Reverse geocoding backend.
 * Resolves null for an empty response, rejects with GeocodeTimeoutError when the
 * attempt exceeds `timeoutMs` and with GeocodeError on any other failure.
 */
export interface ReverseGeocoder {
  readonly name: string
  reverseGeocode: (lat: number, lon: number, timeoutMs: number) => Promise<AddressComponents | null>
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT'])

function toGeocodeError(err: unknown, lat: number, lon: number, timeoutMs: number): Error {
  if (axios.isAxiosError(err)) {
    if (err.code && TIMEOUT_CODES.has(err.code))
      return new GeocodeTimeoutError(lat, lon, timeoutMs)
    if (err.response)
      return new GeocodeError(`HTTP ${err.response.status} from geocoder`, lat, lon, err)
  }
  return new GeocodeError(errorMessage(err), lat, lon, err)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function pickAddress(source: Record<string, unknown>): AddressComponents {
  const address: AddressComponents = {}
  for (const field of ADDRESS_FIELDS) {
    const value = source[field]
    if (typeof value === 'string' && value.trim() !== '')
      address[field] = value
  }
  return address
}

/* ---------- NOMINATIM ---------- */

export const NOMINATIM_URL = 'https://nominatim.openstreetmap.org/reverse'

export class NominatimGeocoder implements ReverseGeocoder {
  readonly name = 'nominatim' as const

  constructor(
    private readonly userAgent: string,
    private readonly baseUrl: string = NOMINATIM_URL,
  ) {}

  async reverseGeocode(lat: number, lon: number, timeoutMs: number): Promise<AddressComponents | null> {
    try {
      const response = await axios.get<unknown>(this.baseUrl, {
        params: { lat, lon, format: 'json', 'accept-language': 'en' },
        headers: { 'User-Agent': this.userAgent, 'Accept': 'application/json' },
        timeout: timeoutMs,
      })

      const data = response.data
      // Nominatim answers `{ error: "Unable to geocode" }` for open sea and the like
      if (!isRecord(data) || 'error' in data || !isRecord(data.address))
        return null

      return pickAddress(data.address)
    }
    catch (err) {
      throw toGeocodeError(err, lat, lon, timeoutMs)
    }
  }
}

/* ---------- GOOGLE ---------- */

export const GOOGLE_GEOCODE_URL = 'https://maps.googleapis.com/maps/api/geocode/json'

const GOOGLE_TYPE_TO_FIELD: Record<string, AddressField> = {
  locality: 'city',
  postal_town: 'town',
  sublocality: 'suburb',
  sublocality_level_1: 'suburb',
  neighborhood: 'suburb',
  administrative_area_level_1: 'state',
  administrative_area_level_2: 'county',
}

interface GoogleAddressComponent {
  long_name: string
  types: string[]
}

function isGoogleComponent(value: unknown): value is GoogleAddressComponent {
  return isRecord(value)
    && typeof value.long_name === 'string'
    && Array.isArray(value.types)
    && value.types.every(t => typeof t === 'string')
}

/**
 * Maps the first Google result's address_components onto the shared address fields.
 */
export function mapGoogleComponents(components: readonly GoogleAddressComponent[]): AddressComponents {
  const address: AddressComponents = {}
  for (const component of components) {
    for (const type of component.types) {
      const field = GOOGLE_TYPE_TO_FIELD[type]
      if (field && address[field] === undefined)
        address[field] = component.long_name
    }
  }
  return address
}

export class GoogleGeocoder implements ReverseGeocoder {
  readonly name = 'google' as const

  constructor(
    private readonly apiKey: string,
    private readonly baseUrl: string = GOOGLE_GEOCODE_URL,
  ) {}

  async reverseGeocode(lat: number, lon: number, timeoutMs: number): Promise<AddressComponents | null> {
    let data: unknown
    try {
      const response = await axios.get<unknown>(this.baseUrl, {
        params: { latlng: `${lat},${lon}`, key: this.apiKey, language: 'en' },
        timeout: timeoutMs,
      })
      data = response.data
    }
    catch (err) {
      throw toGeocodeError(err, lat, lon, timeoutMs)
    }

    if (!isRecord(data))
      return null
    if (data.status === 'ZERO_RESULTS')
      return null
    if (data.status !== 'OK') {
      const detail = typeof data.error_message === 'string' ? `: ${data.error_message}` : ''
      throw new GeocodeError(`Google geocoder returned ${String(data.status)}${detail}`, lat, lon)
    }

    const first = Array.isArray(data.results) ? data.results[0] : undefined
    if (!isRecord(first) || !Array.isArray(first.address_components))
      return null

    return mapGoogleComponents(first.address_components.filter(isGoogleComponent))
  }
}

/* ---------- FACTORY ---------- */

export interface GeocoderConfig {
  provider: GeocoderProvider | null
  apiKey?: string
  userAgent: string
}

/**
 * Null when geocoding is disabled. Google without an API key counts as disabled.
 */
export function createGeocoder(config: GeocoderConfig): ReverseGeocoder | null {
  switch (config.provider) {
    case 'google':
      return config.apiKey ? new GoogleGeocoder(config.apiKey) : null
    case 'nominatim':
      return new NominatimGeocoder(config.userAgent)
    default:
      return null
  }
}
