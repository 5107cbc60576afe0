export * from './byte-cursor.js'
export * from './car-file.js'
export * from './car-file-backend.js'
export * from './car-memory-backend.js'
export * from './car-reader.js'
export * from './car-storage-backend.js'
export * from './car-writer.js'
export * from './frame.js'
export * from './header.js'
