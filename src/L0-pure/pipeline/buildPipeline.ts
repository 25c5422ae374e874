/**
 * Filter Pipeline Builder: turns a validated bundle into ordered stages.
 *
 * Stage order:
 *   1. trim defines the time base (`t = 0` is the trimmed start)
 *   2. frame rate
 *   3. geometry, in the literal order the user typed it
 *   4. fades, timed against the trimmed output
 *   5. full-range colour conversion, last so resampling cannot undo it
 *
 * Audio is planned on its own and never touches the video chain.
 * Pure function, no I/O.
 */

import { InvalidArgumentError, InvalidFadeWindowError } from '../errors/errors.js'
import { ceilEven, roundSeconds } from '../timestamp/timestamp.js'
import type { OptionBundle } from '../../types/options.js'
import type {
  AudioPlan,
  AudioStage,
  FilterPipeline,
  SourceInfo,
  TrimPlan,
  VideoStage,
} from '../../types/pipeline.js'

// ── Trim ─────────────────────────────────────────────────────────────────────

export function planTrim(bundle: OptionBundle): TrimPlan {
  const start = bundle.trim.start.seconds
  const end = bundle.trim.end
  switch (end.kind) {
    case 'duration':
      return { start, duration: end.length.seconds }
    case 'end':
      return { start, duration: roundSeconds(end.at.seconds - start) }
    case 'unset':
      return { start }
  }
}

/** Explicit duration, else whatever is left of the probed source. */
export function resolveOutputDuration(trim: TrimPlan, source: SourceInfo): number | undefined {
  if (trim.duration !== undefined) return trim.duration
  if (source.duration === undefined) return undefined
  return roundSeconds(Math.max(source.duration - trim.start, 0))
}

// ── Geometry ─────────────────────────────────────────────────────────────────

interface GeometryResult {
  stages: VideoStage[]
  frameHeight?: number
}

/**
 * Walk the geometry list tracking the frame height, so a relative scale after
 * a crop is a factor of the cropped height rather than the source height.
 */
function planGeometry(bundle: OptionBundle, source: SourceInfo): GeometryResult {
  const stages: VideoStage[] = []
  let frameHeight = source.height

  for (const op of bundle.geometry) {
    if (op.kind === 'crop') {
      stages.push({ kind: 'crop', width: op.width, height: op.height, x: op.x, y: op.y })
      frameHeight = op.height
      continue
    }

    let height = op.targetHeight
    if (op.isRelativeFactor) {
      if (frameHeight === undefined) {
        throw new InvalidArgumentError('-vh', `a relative height (${op.targetHeight}x) needs the source height, which is unknown`)
      }
      height = ceilEven(Math.trunc(frameHeight * op.targetHeight))
      if (height <= 0) {
        throw new InvalidArgumentError('-vh', `${op.targetHeight}x of ${frameHeight}px leaves no picture`)
      }
    }
    stages.push({ kind: 'scale', height })
    frameHeight = height
  }

  return { stages, frameHeight }
}

// ── Fades ────────────────────────────────────────────────────────────────────

interface FadeWindow {
  direction: 'in' | 'out'
  start: number
  duration: number
}

function planFades(bundle: OptionBundle, outputDuration: number | undefined): FadeWindow[] {
  const { fadeInSeconds, fadeOutSeconds } = bundle.fade
  const windows: FadeWindow[] = []

  if (fadeInSeconds !== undefined) {
    if (outputDuration !== undefined && fadeInSeconds > outputDuration) {
      throw new InvalidFadeWindowError('-fi', fadeInSeconds, outputDuration)
    }
    windows.push({ direction: 'in', start: 0, duration: fadeInSeconds })
  }

  if (fadeOutSeconds !== undefined) {
    if (outputDuration === undefined || fadeOutSeconds > outputDuration) {
      throw new InvalidFadeWindowError('-fo', fadeOutSeconds, outputDuration)
    }
    windows.push({ direction: 'out', start: roundSeconds(outputDuration - fadeOutSeconds), duration: fadeOutSeconds })
  }

  return windows
}

// ── Audio ────────────────────────────────────────────────────────────────────

function planAudio(bundle: OptionBundle, fades: readonly FadeWindow[]): AudioPlan {
  const { muted, volumeFactor, forceReencode } = bundle.audio
  if (muted) return { kind: 'muted' }

  const stages: AudioStage[] = []
  if (volumeFactor !== undefined) stages.push({ kind: 'volume', factor: volumeFactor })
  for (const fade of fades) stages.push({ kind: 'fade', ...fade })

  if (stages.length === 0 && !forceReencode) return { kind: 'copy' }
  return { kind: 'reencode', stages }
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Build the ordered filter pipeline for a validated bundle.
 *
 * @param source - Probed facts about the input; pass `{}` when nothing was probed
 * @throws InvalidFadeWindowError when a fade does not fit the output
 * @throws InvalidArgumentError when a relative height cannot be resolved
 */
export function buildPipeline(bundle: OptionBundle, source: SourceInfo): FilterPipeline {
  const trim = planTrim(bundle)
  const outputDuration = resolveOutputDuration(trim, source)

  const video: VideoStage[] = []
  if (bundle.framerate !== undefined) {
    video.push({ kind: 'fps', rate: bundle.framerate.expression })
  }

  const geometry = planGeometry(bundle, source)
  video.push(...geometry.stages)

  const fades = planFades(bundle, outputDuration)
  for (const fade of fades) video.push({ kind: 'fade', ...fade })

  if (bundle.colorRange === 'fullRange') {
    video.push({ kind: 'fullRange' })
  }

  return {
    trim,
    outputDuration,
    frameHeight: geometry.frameHeight,
    frameRate: bundle.framerate?.fps ?? source.frameRate,
    video,
    audio: planAudio(bundle, fades),
    colorTags: bundle.colorRange !== 'none',
  }
}
