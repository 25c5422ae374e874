/**
 * Command Synthesizer: renders a filter pipeline and a format profile into
 * ffmpeg argument lists.
 *
 * Argument order within a pass:
 *   global → hardware input flags → trim + input → extra inputs →
 *   video filters → video codec → colour tags → profile output options →
 *   audio → metadata → passthrough → `-y <output>`
 *
 * Passthrough arguments come after everything synthesized; ffmpeg keeps the
 * last value of a repeated output option.
 *
 * Pure function: the same inputs always produce byte-identical arguments.
 */

import { ConflictingOptionsError } from '../errors/errors.js'
import { buildPipeline } from '../pipeline/buildPipeline.js'
import { formatSeconds } from '../timestamp/timestamp.js'
import {
  FULL_RANGE_COLOR_ARGS,
  HARDWARE_INPUT_ARGS,
  containerArgs,
  encoderArgs,
  isAnimatedImage,
  resolveEncoder,
  youtubeArgs,
} from './profiles.js'
import type { FormatProfile, GifDither, OptionBundle } from '../../types/options.js'
import type {
  AudioPlan,
  AudioStage,
  CommandPass,
  CompiledCommand,
  EncoderSettings,
  FilterPipeline,
  SourceInfo,
  SynthesisContext,
  TrimPlan,
  VideoStage,
} from '../../types/pipeline.js'

// ── Filter rendering ─────────────────────────────────────────────────────────

const SCALE_FLAGS = 'spline+accurate_rnd+full_chroma_int+full_chroma_inp'

/** Stage kinds with no CUDA counterpart; rejected under `--hardware`. */
const NO_GPU_PATH: Partial<Record<VideoStage['kind'], string>> = {
  crop: '-c',
  fullRange: '--fixrgb 2',
}

export function renderVideoStage(stage: VideoStage, hardware = false): string {
  switch (stage.kind) {
    case 'fps':
      return `fps=fps=${stage.rate}`
    case 'crop':
      return `crop=${stage.width}:${stage.height}:${stage.x}:${stage.y}`
    case 'scale':
      return hardware
        ? `scale_cuda=-2:${stage.height}`
        : `scale=-2:${stage.height}:flags=${SCALE_FLAGS}`
    case 'fade':
      return `fade=t=${stage.direction}:st=${formatSeconds(stage.start)}:d=${formatSeconds(stage.duration)}`
    case 'fullRange':
      return 'scale=in_range=tv:out_range=pc'
  }
}

export function renderAudioStage(stage: AudioStage): string {
  switch (stage.kind) {
    case 'volume':
      return `volume=${stage.factor}`
    case 'fade':
      return `afade=t=${stage.direction}:st=${formatSeconds(stage.start)}:d=${formatSeconds(stage.duration)}:curve=ihsin`
  }
}

/**
 * Render the video chain for a CUDA decode path. Frames stay on the GPU, so
 * each run of consecutive fades is bridged through system memory once.
 *
 * @throws ConflictingOptionsError for stages without a GPU path
 */
function renderHardwareChain(stages: readonly VideoStage[]): string[] {
  const filters: string[] = []
  let bridged: string[] = []

  const flush = (): void => {
    if (bridged.length === 0) return
    filters.push(['hwdownload', 'format=nv12', ...bridged, 'hwupload'].join(','))
    bridged = []
  }

  for (const stage of stages) {
    const flag = NO_GPU_PATH[stage.kind]
    if (flag !== undefined) {
      throw new ConflictingOptionsError(['--hardware', flag], `${flag} has no GPU-accelerated equivalent and cannot be combined with --hardware`)
    }
    if (stage.kind === 'fade') {
      bridged.push(renderVideoStage(stage, true))
      continue
    }
    flush()
    filters.push(renderVideoStage(stage, true))
  }
  flush()

  return filters
}

/** GIFs get an `unsharp` pass after geometry, ahead of fades and colour work. */
function withSharpen(filters: string[], stages: readonly VideoStage[]): string[] {
  const at = stages.findIndex((stage) => stage.kind === 'fade' || stage.kind === 'fullRange')
  const index = at === -1 ? filters.length : at
  return [...filters.slice(0, index), 'unsharp', ...filters.slice(index)]
}

/** Render the video filter chain for a profile, one entry per filter. */
export function renderVideoChain(stages: readonly VideoStage[], profile: FormatProfile): string[] {
  if (profile.kind === 'hardware') return renderHardwareChain(stages)
  const filters = stages.map((stage) => renderVideoStage(stage))
  return profile.kind === 'gif' ? withSharpen(filters, stages) : filters
}

// ── Argument sections ────────────────────────────────────────────────────────

function globalArgs(settings: EncoderSettings): string[] {
  return ['-hide_banner', '-loglevel', settings.logLevel]
}

/** Trim as input options, so every filter sees `t = 0` at the trimmed start. */
function inputArgs(input: string, trim: TrimPlan): string[] {
  const args: string[] = []
  if (trim.start > 0) args.push('-ss', formatSeconds(trim.start))
  if (trim.duration !== undefined) args.push('-t', formatSeconds(trim.duration))
  args.push('-i', input)
  return args
}

function audioArgs(plan: AudioPlan, profile: FormatProfile, settings: EncoderSettings): string[] {
  if (isAnimatedImage(profile.kind) || plan.kind === 'muted') return ['-an']
  if (plan.kind === 'copy') return ['-c:a', 'copy']

  const args = ['-c:a', 'aac', '-b:a', settings.audioBitrate]
  if (plan.stages.length > 0) {
    args.push('-af', plan.stages.map(renderAudioStage).join(','))
  }
  return args
}

function metadataArgs(title: string | undefined): string[] {
  return title === undefined ? [] : ['-metadata', `title=${title}`]
}

function paletteGen(paletteSize: number): string {
  return `palettegen=stats_mode=diff:reserve_transparent=0:max_colors=${paletteSize}`
}

function paletteUse(dither: GifDither): string {
  return `paletteuse=diff_mode=rectangle:bayer_scale=0:dither=${dither}`
}

/** Input 0 through the video chain, then mapped onto the palette in input 1. */
function palettedFilterGraph(chain: readonly string[], dither: GifDither): string {
  return `[0:v]${chain.join(',')}[v];[v][1:v]${paletteUse(dither)}`
}

export function defaultPaletteFile(output: string): string {
  return `${output}.palette.png`
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Merge the bundle, its pipeline and the active profile into the final
 * command. A GIF with a palette size compiles to two dependent passes:
 * palette generation, then a paletted encode that reads it back.
 *
 * @throws ConflictingOptionsError when the profile cannot honour a stage or codec
 * @throws InvalidArgumentError when the YouTube profile lacks source facts
 */
export function synthesizeCommand(
  bundle: OptionBundle,
  pipeline: FilterPipeline,
  context: SynthesisContext,
): CompiledCommand {
  const { profile } = bundle.format
  const settings = context.encoder
  const encoder = resolveEncoder(bundle.format)
  const chain = renderVideoChain(pipeline.video, profile)

  const base = [
    ...globalArgs(settings),
    ...(profile.kind === 'hardware' ? HARDWARE_INPUT_ARGS : []),
    ...inputArgs(bundle.input, pipeline.trim),
  ]

  const colorArgs = pipeline.colorTags && !isAnimatedImage(profile.kind) ? [...FULL_RANGE_COLOR_ARGS] : []
  const profileArgs = profile.kind === 'youtube'
    ? youtubeArgs(pipeline.frameHeight, pipeline.frameRate)
    : containerArgs(profile.kind)

  const tail = [
    '-c:v', encoder, ...encoderArgs(encoder, settings),
    ...colorArgs,
    ...profileArgs,
    ...audioArgs(pipeline.audio, profile, settings),
    ...metadataArgs(bundle.title),
    ...bundle.passthrough,
    '-y', bundle.output,
  ]

  if (profile.kind === 'gif' && profile.paletteSize !== undefined) {
    const paletteFile = context.paletteFile ?? defaultPaletteFile(bundle.output)
    const palettePass: CommandPass = {
      label: 'palette',
      args: [...base, '-vf', [...chain, paletteGen(profile.paletteSize)].join(','), '-an', '-y', paletteFile],
      output: paletteFile,
    }
    const encodePass: CommandPass = {
      label: 'encode',
      args: [...base, '-i', paletteFile, '-filter_complex', palettedFilterGraph(chain, profile.dither), ...tail],
      output: bundle.output,
    }
    return {
      program: context.program,
      passes: [palettePass, encodePass],
      output: bundle.output,
      temporaryFiles: [paletteFile],
    }
  }

  const videoFilterArgs = chain.length > 0 ? ['-vf', chain.join(',')] : []
  return {
    program: context.program,
    passes: [{ label: 'encode', args: [...base, ...videoFilterArgs, ...tail], output: bundle.output }],
    output: bundle.output,
    temporaryFiles: [],
  }
}

/** Build the pipeline and synthesize in one step. */
export function compile(bundle: OptionBundle, source: SourceInfo, context: SynthesisContext): CompiledCommand {
  return synthesizeCommand(bundle, buildPipeline(bundle, source), context)
}
