import { DEFAULT_CHUNK_SIZE } from './core/car/byte-cursor.js'

export interface Config {
  logLevel: string
  /** Verify payload digests unless a command says otherwise */
  verify: boolean
  /** Read size used when scanning archives */
  chunkSize: number
}

function parseBoolean(value: string | undefined): boolean {
  return value === 'true' || value === '1'
}

function parseChunkSize(value: string | undefined): number {
  const size = Number.parseInt(value ?? '', 10)
  return Number.isSafeInteger(size) && size > 0 ? size : DEFAULT_CHUNK_SIZE
}

/**
 * Create configuration from environment variables
 *
 * - LOG_LEVEL: pino level for diagnostics on stderr (default: error)
 * - CAR_VERIFY: verify block digests by default when "true" or "1"
 * - CAR_CHUNK_SIZE: bytes per read when scanning an archive (default: 65536)
 */
export function createConfig(): Config {
  return {
    logLevel: process.env.LOG_LEVEL ?? 'error',
    verify: parseBoolean(process.env.CAR_VERIFY),
    chunkSize: parseChunkSize(process.env.CAR_CHUNK_SIZE),
  }
}
