import path from 'node:path'

export type MediaKind = 'photo' | 'video'

export const PHOTO_EXT = new Set([
  '.jpg',
  '.jpeg',
  '.png',
  '.heic',
  '.heif',
  '.gif',
  '.webp',
  '.tif',
  '.tiff',
])

export const VIDEO_EXT = new Set([
  '.mov',
  '.mp4',
  '.m4v',
  '.avi',
  '.mkv',
])

/**
 * Normalizes an allowlist such as ["JPG", ".mov"] to [".jpg", ".mov"].
 */
export function normalizeTypes(types: readonly string[]): Set<string> {
  return new Set(
    types
      .map(t => t.trim().toLowerCase())
      .filter(Boolean)
      .map(t => (t.startsWith('.') ? t : `.${t}`)),
  )
}

/**
 * Returns null for files that are not supported or not in the allowlist.
 */
export function classifyMedia(file: string, allowlist?: ReadonlySet<string>): MediaKind | null {
  const ext = path.extname(file).toLowerCase()
  if (allowlist && allowlist.size > 0 && !allowlist.has(ext))
    return null
  if (PHOTO_EXT.has(ext))
    return 'photo'
  if (VIDEO_EXT.has(ext))
    return 'video'
  return null
}
