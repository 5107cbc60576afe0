import { describe, expect, it } from 'vitest'
import { createConfig } from '../../config.js'

describe('Config', () => {
  it('should create default config', () => {
    const config = createConfig()

    expect(config.logLevel).toBe('error')
    expect(config.verify).toBe(false)
    expect(config.chunkSize).toBe(65536)
  })

  it('should use environment variables when provided', () => {
    process.env.LOG_LEVEL = 'debug'
    process.env.CAR_VERIFY = '1'
    process.env.CAR_CHUNK_SIZE = '4096'

    const config = createConfig()

    expect(config.logLevel).toBe('debug')
    expect(config.verify).toBe(true)
    expect(config.chunkSize).toBe(4096)
  })

  it('should accept "true" for CAR_VERIFY and nothing else', () => {
    process.env.CAR_VERIFY = 'true'
    expect(createConfig().verify).toBe(true)

    process.env.CAR_VERIFY = 'yes'
    expect(createConfig().verify).toBe(false)
  })

  it('should fall back to the default chunk size for unusable values', () => {
    for (const value of ['0', '-5', 'lots', '']) {
      process.env.CAR_CHUNK_SIZE = value
      expect(createConfig().chunkSize).toBe(65536)
    }
  })
})
