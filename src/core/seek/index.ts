export * from './car-index.js'
export * from './index-builder.js'
export * from './index-file.js'
export * from './seek.js'
