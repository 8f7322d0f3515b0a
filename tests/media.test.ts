import { describe, expect, it } from 'vitest'
import { classifyMedia, normalizeTypes } from '../src/helpers/media'

describe('helpers/media', () => {
  it('classifyMedia detects photos and videos case-insensitively', () => {
    expect(classifyMedia('C:\\x\\a.JPG')).toBe('photo')
    expect(classifyMedia('/x/b.heic')).toBe('photo')
    expect(classifyMedia('/x/c.MOV')).toBe('video')
    expect(classifyMedia('/x/d.mp4')).toBe('video')
  })

  it('classifyMedia rejects unsupported extensions', () => {
    expect(classifyMedia('C:\\x\\a.txt')).toBeNull()
    expect(classifyMedia('/x/Makefile')).toBeNull()
  })

  it('classifyMedia honours the allowlist', () => {
    const allow = normalizeTypes(['mov'])
    expect(classifyMedia('/x/a.jpg', allow)).toBeNull()
    expect(classifyMedia('/x/a.mov', allow)).toBe('video')
  })

  it('normalizeTypes lowercases and adds the dot', () => {
    expect([...normalizeTypes(['JPG', '.Mov', ' heic ', ''])]).toEqual(['.jpg', '.mov', '.heic'])
  })
})
