import { spawnInherited } from '../../L1-infra/process/process.js'
import type { SpawnResult } from '../../L1-infra/process/process.js'

export type { SpawnResult }

/**
 * Run one ffmpeg invocation with the terminal attached. Resolves with the
 * exit status; rejects when the binary cannot be started.
 */
export function runFFmpeg(program: string, args: readonly string[]): Promise<SpawnResult> {
  return spawnInherited(program, args)
}
