import { describe, expect, it } from 'vitest'
import { formatFileSize, formatPayload } from '../../utils/cli-helpers.js'

const encoder = new TextEncoder()

describe('CLI helpers', () => {
  it('should format file sizes', () => {
    expect(formatFileSize(100)).toBe('100.0 B')
    expect(formatFileSize(1536)).toBe('1.5 KB')
    expect(formatFileSize(3 * 1024 * 1024)).toBe('3.0 MB')
  })

  it('should quote payloads as JSON strings', () => {
    expect(formatPayload(encoder.encode('hello'))).toBe('"hello"')
    expect(formatPayload(encoder.encode('a "b"\n'))).toBe('"a \\"b\\"\\n"')
  })

  it('should truncate long payloads', () => {
    expect(formatPayload(encoder.encode('hello'), 3)).toBe('"hel"…')
    expect(formatPayload(encoder.encode('hello'), 5)).toBe('"hello"')
  })
})
