import { promises as fsp, existsSync, readFileSync } from 'fs'
import tmp from 'tmp'

// Remove tmp resources on process exit
tmp.setGracefulCleanup()

function errnoCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined
  return typeof err.code === 'string' ? err.code : undefined
}

// ── Reads ──────────────────────────────────────────────────────

/** Read a UTF-8 text file (sync). Throws "File not found: <path>" on ENOENT. */
export function readTextFileSync(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8')
  } catch (err: unknown) {
    if (errnoCode(err) === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** Check if file/dir exists (sync). */
export function fileExistsSync(filePath: string): boolean {
  return existsSync(filePath)
}

// ── Writes ─────────────────────────────────────────────────────

/** Remove file (ignores ENOENT). */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fsp.unlink(filePath)
  } catch (err: unknown) {
    if (errnoCode(err) === 'ENOENT') return
    throw err
  }
}

// ── Temp Files ─────────────────────────────────────────────────

/**
 * Reserve a unique temp file name. Nothing is created on disk; the caller
 * writes it and is responsible for removing it.
 */
export function makeTempFileName(prefix: string, postfix: string): string {
  return tmp.tmpNameSync({ prefix, postfix })
}
