/**
 * Compile service: the only place the pure compiler meets the outside world.
 *
 * validate → probe (only when something needs source facts) → build → synthesize
 */

import { validateOptions } from '../../L0-pure/options/validateOptions.js'
import { buildPipeline } from '../../L0-pure/pipeline/buildPipeline.js'
import { synthesizeCommand } from '../../L0-pure/command/synthesizeCommand.js'
import { probeSource } from '../../L2-clients/ffmpeg/probe.js'
import { getFFmpegPath } from '../../L2-clients/ffmpeg/ffmpeg.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import type { AppEnvironment } from '../../L1-infra/config/environment.js'
import { makeTempFileName } from '../../L1-infra/fileSystem/fileSystem.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import type {
  CompiledCommand,
  EncoderSettings,
  FilterPipeline,
  OptionBundle,
  RawOptions,
  SourceInfo,
} from '../../types/index.js'

export interface CompileResult {
  bundle: OptionBundle
  source: SourceInfo
  pipeline: FilterPipeline
  command: CompiledCommand
}

export function encoderSettingsFromConfig(config: AppEnvironment): EncoderSettings {
  return {
    crfX264: config.CRF_X264,
    crfX265: config.CRF_X265,
    qpNvenc: config.QP_NVENC,
    preset: config.ENCODER_PRESET,
    audioBitrate: config.AUDIO_BITRATE,
    logLevel: config.FFMPEG_LOGLEVEL,
  }
}

/**
 * Whether the pipeline will need facts only ffprobe knows: a relative height
 * with no crop before it, the YouTube bitrate table, or a fade-out with no
 * explicit end.
 */
export function needsProbe(bundle: OptionBundle): boolean {
  const firstGeometry = bundle.geometry[0]
  if (firstGeometry?.kind === 'scale' && firstGeometry.isRelativeFactor) return true
  if (bundle.format.profile.kind === 'youtube') return true
  return bundle.fade.fadeOutSeconds !== undefined && bundle.trim.end.kind === 'unset'
}

function needsPalette(bundle: OptionBundle): boolean {
  const { profile } = bundle.format
  return profile.kind === 'gif' && profile.paletteSize !== undefined
}

/**
 * Turn raw CLI options into a ready-to-run command.
 *
 * @throws CutlineError (validation class) on any invalid option or combination
 */
export async function compileOptions(raw: RawOptions): Promise<CompileResult> {
  const bundle = validateOptions(raw)

  let source: SourceInfo = {}
  if (needsProbe(bundle)) {
    logger.debug(`Probing ${sanitizeForLog(bundle.input)}`)
    source = await probeSource(bundle.input)
  }

  const pipeline = buildPipeline(bundle, source)
  logger.debug(`Pipeline: ${pipeline.video.map((stage) => stage.kind).join(' → ') || '(no video filters)'}; audio ${pipeline.audio.kind}`)

  const command = synthesizeCommand(bundle, pipeline, {
    program: getFFmpegPath(),
    encoder: encoderSettingsFromConfig(getConfig()),
    paletteFile: needsPalette(bundle) ? makeTempFileName('cutline-palette-', '.png') : undefined,
  })

  return { bundle, source, pipeline, command }
}
