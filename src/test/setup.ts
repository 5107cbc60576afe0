/**
 * Global test setup - runs before all test files
 *
 * This ensures tests have a clean environment without interference
 * from local development environment variables.
 */
import { beforeEach } from 'vitest'

// Tests should explicitly set these values when needed
beforeEach(() => {
  delete process.env.LOG_LEVEL
  delete process.env.CAR_VERIFY
  delete process.env.CAR_CHUNK_SIZE
})
