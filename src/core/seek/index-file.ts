import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { CARIndex } from './car-index.js'

/**
 * Default index path for an archive: the archive path plus `.idx`
 */
export function defaultIndexPath(carPath: string): string {
  return `${carPath}.idx`
}

export async function saveIndexFile(path: string, index: CARIndex): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, index.encode())
}

export async function loadIndexFile(path: string): Promise<CARIndex> {
  const bytes = await readFile(path)
  return CARIndex.decode(bytes)
}
