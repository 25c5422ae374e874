import { spawn as nodeSpawn } from 'child_process'
import type { SpawnOptions } from 'child_process'
import { createRequire } from 'module'

export type { SpawnOptions }

export interface SpawnResult {
  /** Exit code, or null when the process was killed by a signal */
  code: number | null
  signal: NodeJS.Signals | null
}

/**
 * Spawn a command with inherited stdio and wait for it to exit.
 * Rejects only when the process cannot be started (ENOENT, EACCES).
 */
export function spawnInherited(cmd: string, args: readonly string[], opts?: SpawnOptions): Promise<SpawnResult> {
  return new Promise((resolve, reject) => {
    const child = nodeSpawn(cmd, [...args], { stdio: 'inherit', ...opts })
    child.once('error', reject)
    child.once('close', (code, signal) => {
      resolve({ code, signal })
    })
  })
}

/**
 * Hold SIGINT while `task` runs. A child sharing the terminal receives the
 * same Ctrl+C and exits on its own; once `task` has settled (and its
 * cleanup has run) the signal is re-raised with the default handler.
 */
export async function deferInterrupt<T>(task: () => Promise<T>): Promise<T> {
  let interrupted = false
  const onInterrupt = (): void => {
    interrupted = true
  }
  process.on('SIGINT', onInterrupt)
  try {
    return await task()
  } finally {
    process.removeListener('SIGINT', onInterrupt)
    if (interrupted) process.kill(process.pid, 'SIGINT')
  }
}

/**
 * Create a require function for ESM modules to use CommonJS require().
 * Usage: const require = createModuleRequire(import.meta.url)
 */
export function createModuleRequire(metaUrl: string): NodeRequire {
  return createRequire(metaUrl)
}
