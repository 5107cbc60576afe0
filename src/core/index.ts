/**
 * Public API: CAR codec, reader and writer, index builder and seek.
 */

export * from './car/index.js'
export * from './cid/index.js'
export * from './errors.js'
export * from './rows/index.js'
export * from './seek/index.js'
