import { CommanderError } from '../L1-infra/cli/cli.js'
import { initConfig } from '../L1-infra/config/environment.js'
import logger, { sanitizeForLog, setVerbose } from '../L1-infra/logger/configLogger.js'
import { compileOptions } from '../L3-services/compiler/compiler.js'
import { executeCommand } from '../L3-services/execution/execution.js'
import { EngineFailureError, isValidationError } from '../L0-pure/errors/errors.js'
import { parseCommandLine } from './program.js'

export const EXIT_OK = 0
export const EXIT_USAGE = 2
export const EXIT_LAUNCH_FAILURE = 127

/** Map a failure to the process exit code. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof CommanderError) return err.exitCode === 0 ? EXIT_OK : EXIT_USAGE
  if (isValidationError(err)) return EXIT_USAGE
  if (err instanceof EngineFailureError) return err.exitCode ?? EXIT_LAUNCH_FAILURE
  return 1
}

/**
 * Parse, compile and run. Resolves with the exit code; never rejects for
 * expected failures.
 */
export async function main(argv: readonly string[]): Promise<number> {
  try {
    const raw = parseCommandLine(argv)
    const config = initConfig({ debug: raw.debug })
    if (config.VERBOSE) setVerbose()

    const { bundle, command } = await compileOptions(raw)
    await executeCommand(command, { debug: bundle.debug })
    logger.info(`Wrote ${sanitizeForLog(command.output)}`)
    return EXIT_OK
  } catch (err: unknown) {
    const code = exitCodeFor(err)
    if (err instanceof CommanderError) return code
    const message = err instanceof Error ? err.message : String(err)
    logger.error(sanitizeForLog(message))
    return code
  }
}
