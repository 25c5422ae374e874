/**
 * Error taxonomy for the option compiler.
 *
 * Every validation-class error is raised synchronously while compiling, so
 * nothing reaches ffmpeg once one of them is thrown. `EngineFailureError` is
 * the only error raised after a process has been started.
 */

export type CutlineErrorCode =
  | 'INVALID_TIME_FORMAT'
  | 'INVALID_ARGUMENT'
  | 'CONFLICTING_OPTIONS'
  | 'INVALID_FADE_WINDOW'
  | 'ENGINE_FAILURE'

/** Base class for all cutline errors. `options` names the offending flags. */
export class CutlineError extends Error {
  public readonly code: CutlineErrorCode
  public readonly options: readonly string[]
  public readonly details?: Record<string, unknown>

  constructor(
    message: string,
    code: CutlineErrorCode,
    options: readonly string[] = [],
    details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'CutlineError'
    this.code = code
    this.options = options
    this.details = details
  }
}

export class InvalidTimeFormatError extends CutlineError {
  constructor(option: string, value: string) {
    super(
      `Invalid time for ${option}: "${value}" (expected [[HH:]MM:]SS[.fff] or seconds)`,
      'INVALID_TIME_FORMAT',
      [option],
      { value },
    )
    this.name = 'InvalidTimeFormatError'
  }
}

export class InvalidArgumentError extends CutlineError {
  constructor(option: string, message: string, value?: string) {
    super(
      `Invalid value for ${option}: ${message}`,
      'INVALID_ARGUMENT',
      [option],
      value === undefined ? undefined : { value },
    )
    this.name = 'InvalidArgumentError'
  }
}

export class ConflictingOptionsError extends CutlineError {
  constructor(options: readonly string[], message?: string) {
    super(
      message ?? `Options cannot be combined: ${options.join(', ')}`,
      'CONFLICTING_OPTIONS',
      options,
    )
    this.name = 'ConflictingOptionsError'
  }
}

export class InvalidFadeWindowError extends CutlineError {
  constructor(option: string, fadeSeconds: number, outputDuration: number | undefined) {
    super(
      outputDuration === undefined
        ? `${option} needs a known output duration; pass -t or -to`
        : `${option} of ${fadeSeconds}s is longer than the ${outputDuration}s output`,
      'INVALID_FADE_WINDOW',
      [option],
      { fadeSeconds, outputDuration },
    )
    this.name = 'InvalidFadeWindowError'
  }
}

/** ffmpeg exited non-zero (`exitCode`) or could not be launched (`exitCode` undefined). */
export class EngineFailureError extends CutlineError {
  public readonly exitCode: number | undefined

  constructor(message: string, exitCode?: number, cause?: unknown) {
    super(message, 'ENGINE_FAILURE', [], exitCode === undefined ? undefined : { exitCode })
    this.name = 'EngineFailureError'
    this.exitCode = exitCode
    if (cause !== undefined) this.cause = cause
  }
}

export function isCutlineError(err: unknown): err is CutlineError {
  return err instanceof CutlineError
}

/** True for errors detected while compiling, before any process starts. */
export function isValidationError(err: unknown): err is CutlineError {
  return isCutlineError(err) && err.code !== 'ENGINE_FAILURE'
}
