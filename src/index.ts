// Pure compiler
export { parseTimestamp, formatSeconds, roundSeconds, ceilEven } from './L0-pure/timestamp/timestamp.js'
export { validateOptions } from './L0-pure/options/validateOptions.js'
export { buildPipeline } from './L0-pure/pipeline/buildPipeline.js'
export { synthesizeCommand, compile } from './L0-pure/command/synthesizeCommand.js'
export { DEFAULT_ENCODER_SETTINGS } from './L0-pure/command/profiles.js'
export { formatCommand, quoteArg } from './L0-pure/command/formatCommand.js'
export {
  CutlineError,
  InvalidTimeFormatError,
  InvalidArgumentError,
  ConflictingOptionsError,
  InvalidFadeWindowError,
  EngineFailureError,
  isCutlineError,
  isValidationError,
} from './L0-pure/errors/errors.js'
export type { CutlineErrorCode } from './L0-pure/errors/errors.js'

// Services
export { compileOptions, needsProbe } from './L3-services/compiler/compiler.js'
export type { CompileResult } from './L3-services/compiler/compiler.js'
export { executeCommand } from './L3-services/execution/execution.js'
export type { ExecuteOptions } from './L3-services/execution/execution.js'

export * from './types/index.js'
