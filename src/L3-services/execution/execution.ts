import { runFFmpeg } from '../../L2-clients/ffmpeg/runner.js'
import type { SpawnResult } from '../../L2-clients/ffmpeg/runner.js'
import { formatPass } from '../../L0-pure/command/formatCommand.js'
import { EngineFailureError } from '../../L0-pure/errors/errors.js'
import { removeFile } from '../../L1-infra/fileSystem/fileSystem.js'
import { deferInterrupt } from '../../L1-infra/process/process.js'
import { waitForEnter } from '../../L1-infra/readline/readline.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import type { CommandPass, CompiledCommand } from '../../types/index.js'

export interface ExecuteOptions {
  /** Print the command at info level and wait for Enter before running */
  debug?: boolean
}

function describeExit(result: SpawnResult): string {
  return result.code === null ? `signal ${result.signal ?? 'unknown'}` : `exit code ${result.code}`
}

async function runPass(program: string, pass: CommandPass): Promise<void> {
  let result: SpawnResult
  try {
    result = await runFFmpeg(program, pass.args)
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err)
    throw new EngineFailureError(`Could not start ${program}: ${message}`, undefined, err)
  }

  if (result.code !== 0) {
    throw new EngineFailureError(
      `ffmpeg ${pass.label} pass failed with ${describeExit(result)}`,
      result.code ?? 1,
    )
  }
  logger.debug(`ffmpeg ${pass.label} pass finished → ${sanitizeForLog(pass.output)}`)
}

async function cleanup(files: readonly string[]): Promise<void> {
  for (const file of files) {
    try {
      await removeFile(file)
    } catch (err: unknown) {
      logger.warn(`Could not remove temporary file ${sanitizeForLog(file)}: ${err instanceof Error ? err.message : String(err)}`)
    }
  }
}

async function runPasses(compiled: CompiledCommand): Promise<void> {
  try {
    for (const pass of compiled.passes) {
      await runPass(compiled.program, pass)
    }
  } finally {
    await cleanup(compiled.temporaryFiles)
  }
}

/**
 * Run every pass of a compiled command in order, stopping at the first
 * failure. Temporary files are removed whatever the outcome, Ctrl+C during
 * a pass included: the interrupt is held until cleanup has run.
 *
 * @throws EngineFailureError when a pass exits non-zero or ffmpeg cannot start
 */
export async function executeCommand(compiled: CompiledCommand, options: ExecuteOptions = {}): Promise<void> {
  for (const pass of compiled.passes) {
    const line = sanitizeForLog(formatPass(compiled.program, pass))
    if (options.debug) logger.info(line)
    else logger.debug(line)
  }

  if (options.debug) {
    try {
      await waitForEnter('Press Enter to run ffmpeg, Ctrl+C to abort… ')
    } catch (err: unknown) {
      await cleanup(compiled.temporaryFiles)
      throw err
    }
  }

  await deferInterrupt(() => runPasses(compiled))
}
