/**
 * Option Validator: turns raw CLI strings into a typed {@link OptionBundle}.
 *
 * One pass, no side effects. Either the whole bundle is valid or a single
 * validation error is thrown; nothing downstream ever sees a partial bundle.
 */

import { ConflictingOptionsError, InvalidArgumentError } from '../errors/errors.js'
import { ceilEven, parseTimestamp } from '../timestamp/timestamp.js'
import {
  GIF_DITHERS,
  type AudioSpec,
  type ColorRange,
  type FadeSpec,
  type FormatProfile,
  type FormatSelection,
  type FrameRate,
  type GeometryOperation,
  type GifDither,
  type OptionBundle,
  type RawGeometryOption,
  type RawOptions,
  type TrimEnd,
  type TrimWindow,
} from '../../types/options.js'

// ── Constants ────────────────────────────────────────────────────────────────

/** Suffixes that turn `-vh` into a multiplicative factor. */
const RELATIVE_MARKERS = ['x', 'X', '×'] as const

const DEFAULT_GIF_DITHER: GifDither = 'floyd_steinberg'

/** palettegen accepts 4–256 colours */
export const GIF_PALETTE_RANGE = { min: 4, max: 256 } as const

/** Profile flags that are mutually exclusive, with the name users type. */
const PROFILE_FLAGS = [
  ['youtube', '--youtube'],
  ['hardware', '--hardware'],
  ['x264', '--x264'],
  ['x265', '--x265'],
  ['gif', '--gif'],
  ['apng', '--apng'],
  ['webp', '--webp'],
] as const satisfies readonly (readonly [keyof RawOptions, string])[]

const INTEGER = /^\d+$/
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const RATIONAL = /^(\d+)\/(\d+)$/

// ── Scalar parsers ───────────────────────────────────────────────────────────

/** Parse a strictly positive, finite number. */
export function parsePositiveNumber(option: string, value: string): number {
  const trimmed = value.trim()
  const parsed = DECIMAL.test(trimmed) ? Number(trimmed) : Number.NaN
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(option, `expected a positive number, got "${value}"`, value)
  }
  return parsed
}

function parseNonNegativeInteger(option: string, value: string, label: string): number {
  const trimmed = value.trim()
  if (!INTEGER.test(trimmed)) {
    throw new InvalidArgumentError(option, `${label} must be a non-negative integer, got "${value}"`, value)
  }
  return Number(trimmed)
}

function parsePositiveInteger(option: string, value: string, label: string): number {
  const parsed = parseNonNegativeInteger(option, value, label)
  if (parsed === 0) {
    throw new InvalidArgumentError(option, `${label} must be greater than zero`, value)
  }
  return parsed
}

/**
 * `-r` takes a positive number or an ffmpeg rational such as `30000/1001`,
 * which is passed to the fps filter as written.
 */
export function parseOutputFrameRate(value: string): FrameRate {
  const rational = RATIONAL.exec(value.trim())
  if (rational) {
    const numerator = parsePositiveInteger('-r', rational[1] ?? '', 'numerator')
    const denominator = parsePositiveInteger('-r', rational[2] ?? '', 'denominator')
    return { fps: numerator / denominator, expression: `${numerator}/${denominator}` }
  }
  const fps = parsePositiveNumber('-r', value)
  return { fps, expression: String(fps) }
}

// ── Group validators ─────────────────────────────────────────────────────────

function validateTrim(raw: RawOptions): TrimWindow {
  if (raw.duration !== undefined && raw.to !== undefined) {
    throw new ConflictingOptionsError(['-t', '-to'], 'Options -t (duration) and -to (end position) cannot be combined')
  }

  const start = parseTimestamp(raw.start ?? '0', '-ss')

  let end: TrimEnd = { kind: 'unset' }
  if (raw.duration !== undefined) {
    const length = parseTimestamp(raw.duration, '-t')
    if (length.seconds === 0) {
      throw new InvalidArgumentError('-t', 'duration must be greater than zero', raw.duration)
    }
    end = { kind: 'duration', length }
  } else if (raw.to !== undefined) {
    const at = parseTimestamp(raw.to, '-to')
    if (at.seconds <= start.seconds) {
      throw new InvalidArgumentError('-to', `end position ${at.seconds}s must be after the start (${start.seconds}s)`, raw.to)
    }
    end = { kind: 'end', at }
  }

  return { start, end }
}

/**
 * A combined fade wins over the individual ones, which are then not even
 * validated.
 */
function validateFade(raw: RawOptions): FadeSpec {
  if (raw.fade !== undefined) {
    const both = parsePositiveNumber('-f', raw.fade)
    return { fadeInSeconds: both, fadeOutSeconds: both }
  }
  return {
    fadeInSeconds: raw.fadeIn === undefined ? undefined : parsePositiveNumber('-fi', raw.fadeIn),
    fadeOutSeconds: raw.fadeOut === undefined ? undefined : parsePositiveNumber('-fo', raw.fadeOut),
  }
}

export function parseCrop(value: string): GeometryOperation {
  const parts = value.split(':')
  if (parts.length !== 4) {
    throw new InvalidArgumentError('-c', `expected w:h:x:y, got "${value}"`, value)
  }
  const [w = '', h = '', x = '', y = ''] = parts
  return {
    kind: 'crop',
    width: parsePositiveInteger('-c', w, 'width'),
    height: parsePositiveInteger('-c', h, 'height'),
    x: parseNonNegativeInteger('-c', x, 'x offset'),
    y: parseNonNegativeInteger('-c', y, 'y offset'),
  }
}

/**
 * `-vh 720` is an absolute height (rounded up to even), `-vh 0.5x` a factor
 * of whatever height the frame has at that point in the chain.
 */
export function parseHeight(value: string): GeometryOperation {
  const trimmed = value.trim()
  const marker = RELATIVE_MARKERS.find((m) => trimmed.endsWith(m))

  if (marker) {
    const factor = parsePositiveNumber('-vh', trimmed.slice(0, -marker.length))
    return { kind: 'scale', targetHeight: factor, isRelativeFactor: true }
  }

  const pixels = parsePositiveInteger('-vh', trimmed, 'height')
  return { kind: 'scale', targetHeight: ceilEven(pixels), isRelativeFactor: false }
}

function validateGeometry(options: readonly RawGeometryOption[]): GeometryOperation[] {
  return options.map((option) => (option.kind === 'crop' ? parseCrop(option.value) : parseHeight(option.value)))
}

function validateColorRange(value: string | undefined): ColorRange {
  switch (value?.trim()) {
    case undefined:
    case '0':
      return 'none'
    case '1':
      return 'metadata'
    case '2':
      return 'fullRange'
    default:
      throw new InvalidArgumentError('--fixrgb', `expected 0, 1 or 2, got "${value}"`, value)
  }
}

function validateAudio(raw: RawOptions): AudioSpec {
  const muted = raw.mute ?? false
  const volumeFactor = raw.volume === undefined ? undefined : parsePositiveNumber('-av', raw.volume)
  return {
    muted,
    // Mute wins over volume
    volumeFactor: muted ? undefined : volumeFactor,
    forceReencode: raw.audioForce ?? false,
  }
}

function isGifDither(value: string): value is GifDither {
  return (GIF_DITHERS as readonly string[]).includes(value)
}

function validateGifProfile(raw: RawOptions): FormatProfile {
  let paletteSize: number | undefined
  if (raw.gifPalette !== undefined) {
    paletteSize = parsePositiveInteger('-gp', raw.gifPalette, 'palette size')
    if (paletteSize < GIF_PALETTE_RANGE.min || paletteSize > GIF_PALETTE_RANGE.max) {
      throw new InvalidArgumentError(
        '-gp',
        `palette size must be between ${GIF_PALETTE_RANGE.min} and ${GIF_PALETTE_RANGE.max}`,
        raw.gifPalette,
      )
    }
  }

  const dither = raw.gifDither ?? DEFAULT_GIF_DITHER
  if (!isGifDither(dither)) {
    throw new InvalidArgumentError('-gd', `expected one of ${GIF_DITHERS.join(', ')}`, dither)
  }

  return { kind: 'gif', paletteSize, dither }
}

/**
 * At most one profile flag. Overlaps are rejected rather than resolved
 * last-wins. Palette options are only looked at when `--gif` is active.
 */
export function validateFormat(raw: RawOptions): FormatSelection {
  const given = PROFILE_FLAGS.filter(([key]) => raw[key] === true).map(([, flag]) => flag)
  if (given.length > 1) {
    throw new ConflictingOptionsError(given, `Only one format profile may be selected, got ${given.join(', ')}`)
  }

  if (raw.youtube) return { profile: { kind: 'youtube' } }
  if (raw.hardware) return { profile: { kind: 'hardware' } }
  if (raw.gif) return { profile: validateGifProfile(raw) }
  if (raw.apng) return { profile: { kind: 'apng' } }
  if (raw.webp) return { profile: { kind: 'webp' } }
  if (raw.x265) return { profile: { kind: 'default' }, codec: 'h265' }
  if (raw.x264) return { profile: { kind: 'default' }, codec: 'h264' }
  return { profile: { kind: 'default' } }
}

function requirePath(option: string, value: string | undefined): string {
  if (value === undefined || value.trim() === '') {
    throw new InvalidArgumentError(option, 'a path is required')
  }
  return value
}

function splitPassthrough(value: string | undefined): string[] {
  if (value === undefined) return []
  return value.split(/\s+/).filter((arg) => arg !== '')
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Validate every option and build the immutable bundle.
 *
 * @throws ConflictingOptionsError, InvalidArgumentError, InvalidTimeFormatError
 */
export function validateOptions(raw: RawOptions): OptionBundle {
  // Exclusive groups first, so a conflict is reported before any value error
  const format = validateFormat(raw)
  const trim = validateTrim(raw)
  const input = requirePath('-i', raw.input)
  const output = requirePath('out', raw.output)

  const title = raw.title
  const framerate = raw.framerate === undefined ? undefined : parseOutputFrameRate(raw.framerate)

  return Object.freeze({
    input,
    output,
    trim,
    title,
    fade: validateFade(raw),
    geometry: Object.freeze(validateGeometry(raw.geometry ?? [])),
    framerate,
    colorRange: validateColorRange(raw.fixrgb),
    audio: validateAudio(raw),
    format,
    passthrough: Object.freeze(splitPassthrough(raw.passthrough)),
    debug: raw.debug ?? false,
  })
}
