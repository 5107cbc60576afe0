/**
 * seekable-car: CARv1 codec, streaming reader and writer, and a sorted side
 * index for single-block random access.
 */

export * from './core/index.js'
