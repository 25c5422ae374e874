import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'

// ── Mock setup (L1, L3 only) ─────────────────────────────────────────────────

const mockCompileOptions = vi.hoisted(() => vi.fn())
vi.mock('../../../L3-services/compiler/compiler.js', () => ({
  compileOptions: mockCompileOptions,
}))

const mockExecuteCommand = vi.hoisted(() => vi.fn())
vi.mock('../../../L3-services/execution/execution.js', () => ({
  executeCommand: mockExecuteCommand,
}))

const mockInitConfig = vi.hoisted(() => vi.fn())
vi.mock('../../../L1-infra/config/environment.js', () => ({
  initConfig: mockInitConfig,
}))

// ── Import after mocks ───────────────────────────────────────────────────────

import logger, { setVerbose } from '../../../L1-infra/logger/configLogger.js'
import { CommanderError } from '../../../L1-infra/cli/cli.js'
import { exitCodeFor, main } from '../../../L7-app/main.js'
import {
  ConflictingOptionsError,
  EngineFailureError,
  InvalidTimeFormatError,
} from '../../../L0-pure/errors/errors.js'

const COMMAND = { program: 'ffmpeg', output: 'out.mp4', temporaryFiles: [], passes: [] }

describe('exitCodeFor', () => {
  it('maps validation errors to 2', () => {
    expect(exitCodeFor(new ConflictingOptionsError(['-t', '-to']))).toBe(2)
    expect(exitCodeFor(new InvalidTimeFormatError('-ss', 'x'))).toBe(2)
  })

  it('passes the engine exit code through', () => {
    expect(exitCodeFor(new EngineFailureError('failed', 69))).toBe(69)
  })

  it('maps a launch failure to 127', () => {
    expect(exitCodeFor(new EngineFailureError('Could not start ffmpeg'))).toBe(127)
  })

  it('maps usage errors to 2 and help to 0', () => {
    expect(exitCodeFor(new CommanderError(1, 'commander.unknownOption', 'unknown'))).toBe(2)
    expect(exitCodeFor(new CommanderError(0, 'commander.helpDisplayed', '(outputHelp)'))).toBe(0)
  })

  it('maps anything else to 1', () => {
    expect(exitCodeFor(new Error('boom'))).toBe(1)
  })
})

describe('main', () => {
  let spies: { mockRestore: () => void }[] = []

  beforeEach(() => {
    vi.clearAllMocks()
    mockInitConfig.mockReturnValue({ VERBOSE: false })
    mockCompileOptions.mockResolvedValue({ bundle: { debug: false }, command: COMMAND })
    mockExecuteCommand.mockResolvedValue(undefined)
    spies = [
      vi.spyOn(process.stdout, 'write').mockImplementation(() => true),
      vi.spyOn(process.stderr, 'write').mockImplementation(() => true),
    ]
  })

  afterEach(() => {
    for (const spy of spies) spy.mockRestore()
  })

  it('compiles and runs the command', async () => {
    await expect(main(['-i', 'in.mp4', '-vh', '720', 'out.mp4'])).resolves.toBe(0)

    expect(mockCompileOptions).toHaveBeenCalledWith(expect.objectContaining({
      input: 'in.mp4',
      output: 'out.mp4',
      geometry: [{ kind: 'height', value: '720' }],
    }))
    expect(mockExecuteCommand).toHaveBeenCalledWith(COMMAND, { debug: false })
    expect(logger.info).toHaveBeenCalledWith('Wrote out.mp4')
  })

  it('turns on verbose logging for --debug', async () => {
    mockInitConfig.mockReturnValue({ VERBOSE: true })
    mockCompileOptions.mockResolvedValue({ bundle: { debug: true }, command: COMMAND })

    await main(['-i', 'in.mp4', '--debug', 'out.mp4'])

    expect(mockInitConfig).toHaveBeenCalledWith({ debug: true })
    expect(setVerbose).toHaveBeenCalledTimes(1)
    expect(mockExecuteCommand).toHaveBeenCalledWith(COMMAND, { debug: true })
  })

  it('returns 2 and runs nothing on a validation error', async () => {
    mockCompileOptions.mockRejectedValue(new ConflictingOptionsError(['-t', '-to'], 'Options -t (duration) and -to (end position) cannot be combined'))

    await expect(main(['-i', 'in.mp4', '-t', '5', '-to', '10', 'out.mp4'])).resolves.toBe(2)

    expect(mockExecuteCommand).not.toHaveBeenCalled()
    expect(logger.error).toHaveBeenCalledWith('Options -t (duration) and -to (end position) cannot be combined')
  })

  it('returns the engine exit code when ffmpeg fails', async () => {
    mockExecuteCommand.mockRejectedValue(new EngineFailureError('ffmpeg encode pass failed with exit code 187', 187))
    await expect(main(['-i', 'in.mp4', 'out.mp4'])).resolves.toBe(187)
  })

  it('returns 2 for a usage error without compiling', async () => {
    await expect(main(['-i', 'in.mp4'])).resolves.toBe(2)
    expect(mockCompileOptions).not.toHaveBeenCalled()
  })

  it('returns 0 for --help', async () => {
    await expect(main(['--help'])).resolves.toBe(0)
    expect(mockCompileOptions).not.toHaveBeenCalled()
  })
})
