import { mkdirSync } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { Database } from 'node-sqlite3-wasm'

export const CACHE_FILE = 'geocoding_cache.db'

export function defaultCacheDir(): string {
  return process.env.MEDIA_SORTER_CACHE_DIR ?? path.join(os.homedir(), '.media-sorter')
}

export function coordinateKey(lat: number, lon: number): string {
  return `${lat},${lon}`
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

/**
 * Durable geocoding cache. Every call opens and closes its own connection so
 * concurrent workers never share a handle or hold a lock between calls.
 */
export class GeocodeCache {
  readonly dbPath: string

  constructor(cacheDir: string = defaultCacheDir()) {
    mkdirSync(cacheDir, { recursive: true })
    this.dbPath = path.join(cacheDir, CACHE_FILE)

    this.withDb((db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS geocoding_cache (
          coordinates TEXT PRIMARY KEY,
          location TEXT,
          timestamp DATETIME DEFAULT CURRENT_TIMESTAMP
        )
      `)
    })
  }

  private withDb<T>(fn: (db: Database) => T): T {
    const db = new Database(this.dbPath)
    try {
      return fn(db)
    }
    finally {
      db.close()
    }
  }

  lookup(lat: number, lon: number): string | null {
    const row: unknown = this.withDb(db =>
      db.get('SELECT location FROM geocoding_cache WHERE coordinates = ?', [coordinateKey(lat, lon)]))
    return isRow(row) && typeof row.location === 'string' ? row.location : null
  }

  store(lat: number, lon: number, location: string): void {
    this.withDb((db) => {
      db.run('INSERT OR REPLACE INTO geocoding_cache (coordinates, location) VALUES (?, ?)', [coordinateKey(lat, lon), location])
    })
  }

  size(): number {
    const row: unknown = this.withDb(db => db.get('SELECT COUNT(*) AS count FROM geocoding_cache'))
    return isRow(row) ? Number(row.count ?? 0) : 0
  }
}
