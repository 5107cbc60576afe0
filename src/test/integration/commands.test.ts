import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { indexCommand } from '../../commands/index-car.js'
import { readCommand } from '../../commands/read.js'
import { seekCommand } from '../../commands/seek.js'
import { writeCommand } from '../../commands/write.js'
import { encodeRow } from '../../core/rows/index.js'
import { loadIndexFile } from '../../core/seek/index-file.js'

describe('commands', () => {
  let dir: string
  let printed: string[]
  let wasTTY: boolean

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'seekable-car-cmd-'))
    printed = []
    wasTTY = process.stdout.isTTY
    process.stdout.isTTY = false
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      printed.push(args.map(String).join(' '))
    })
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(async () => {
    process.stdout.isTTY = wasTTY
    vi.restoreAllMocks()
    await rm(dir, { recursive: true, force: true })
  })

  it('should run write, read, index and seek end to end', async () => {
    const carPath = join(dir, 'rows.car')
    const inputPath = join(dir, 'rows.txt')
    await writeFile(inputPath, 'alice 1\nbob 2\ncarol three\n')

    await writeCommand.parseAsync([carPath, '--input', inputPath, '--index'], { from: 'user' })
    const written = await loadIndexFile(`${carPath}.idx`)
    expect(written.size).toBe(3)

    await readCommand.parseAsync([carPath, '--rows', '--verify'], { from: 'user' })
    expect(printed).toContain('Read row: key = "carol", data = "three"')

    const indexPath = join(dir, 'rebuilt.idx')
    await indexCommand.parseAsync([carPath, '-o', indexPath], { from: 'user' })
    expect((await loadIndexFile(indexPath)).encode()).toEqual(written.encode())

    const carol = await encodeRow({ key: 'carol', data: new TextEncoder().encode('three') })
    await seekCommand.parseAsync([carPath, indexPath, carol.cid.toString(), '--rows'], { from: 'user' })
    expect(printed.slice(-2)).toEqual(['Row Key: carol', 'Data: "three"'])

    const { offset, length } = written.get(carol.cid)
    await seekCommand.parseAsync([carPath, '--offset', String(offset), '--length', String(length), '--rows'], {
      from: 'user',
    })
    expect(printed.slice(-2)).toEqual(['Row Key: carol', 'Data: "three"'])
  })
})
