import { describe, it, expect, afterEach } from 'vitest'
import { promises as fsp } from 'fs'
import os from 'os'
import { basename, join } from 'path'
import {
  fileExistsSync,
  makeTempFileName,
  readTextFileSync,
  removeFile,
} from '../../../L1-infra/fileSystem/fileSystem.js'

let tempDirs: string[] = []

async function makeTempDir(): Promise<string> {
  const dir = await fsp.mkdtemp(join(os.tmpdir(), 'cutline-fs-test-'))
  tempDirs.push(dir)
  return dir
}

afterEach(async () => {
  for (const d of tempDirs) {
    await fsp.rm(d, { recursive: true, force: true })
  }
  tempDirs = []
})

describe('readTextFileSync', () => {
  it('reads a file', async () => {
    const dir = await makeTempDir()
    const fp = join(dir, 'note.txt')
    await fsp.writeFile(fp, 'hello')
    expect(readTextFileSync(fp)).toBe('hello')
  })

  it('throws a descriptive error for a missing file', async () => {
    const dir = await makeTempDir()
    const fp = join(dir, 'missing.txt')
    expect(() => readTextFileSync(fp)).toThrow(`File not found: ${fp}`)
  })
})

describe('removeFile', () => {
  it('removes an existing file', async () => {
    const dir = await makeTempDir()
    const fp = join(dir, 'palette.png')
    await fsp.writeFile(fp, 'x')
    await removeFile(fp)
    expect(fileExistsSync(fp)).toBe(false)
  })

  it('ignores a file that is already gone', async () => {
    const dir = await makeTempDir()
    await expect(removeFile(join(dir, 'never-written.png'))).resolves.toBeUndefined()
  })
})

describe('makeTempFileName', () => {
  it('reserves a unique name with the given prefix and postfix without creating it', () => {
    const first = makeTempFileName('cutline-palette-', '.png')
    const second = makeTempFileName('cutline-palette-', '.png')

    expect(basename(first).startsWith('cutline-palette-')).toBe(true)
    expect(first.endsWith('.png')).toBe(true)
    expect(first).not.toBe(second)
    expect(fileExistsSync(first)).toBe(false)
  })
})
