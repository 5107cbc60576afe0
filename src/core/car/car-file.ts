/**
 * Open and create CAR files on disk.
 */

import type { Logger } from 'pino'
import { FileByteSink, FileByteSource } from './car-file-backend.js'
import { CARReader, type CARReaderOptions } from './car-reader.js'
import { CARWriter, type CARWriterOptions } from './car-writer.js'

/**
 * Open a CAR file for sequential reading. `reader.close()` closes the file.
 */
export async function openCarFile(path: string, options: CARReaderOptions = {}): Promise<CARReader> {
  const source = await FileByteSource.open(path, options.logger)
  return await CARReader.fromOwnedSource(source, options)
}

/**
 * Create (or truncate) a CAR file and write its header
 */
export async function createCarFile(path: string, options: CARWriterOptions = {}): Promise<CARWriter> {
  const sink = await FileByteSink.create(path)
  try {
    return await CARWriter.create(sink, options)
  } catch (error) {
    await sink.close()
    throw error
  }
}

/**
 * Open a CAR file for positioned reads (index lookups)
 */
export async function openCarSource(path: string, logger?: Logger): Promise<FileByteSource> {
  return await FileByteSource.open(path, logger)
}
