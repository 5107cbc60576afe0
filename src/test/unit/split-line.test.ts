import { describe, expect, it } from 'vitest'
import { splitLine } from '../../write/write.js'

describe('splitLine', () => {
  it('should split at the first space only', () => {
    expect(splitLine('alice some data')).toEqual(['alice', 'some data'])
  })

  it('should allow empty data', () => {
    expect(splitLine('alice ')).toEqual(['alice', ''])
  })

  it('should reject lines without a key', () => {
    expect(splitLine('nodata')).toBeUndefined()
    expect(splitLine(' leading')).toBeUndefined()
    expect(splitLine('')).toBeUndefined()
  })
})
