/**
 * Option types: what the CLI hands to the validator, and the validated bundle
 * the validator hands to the compiler.
 *
 * ### Time convention
 * Every time value is in **seconds** (floating point, rounded to 4 decimals).
 * Positions (`-ss`, `-to`) are measured from the start of the source; once
 * trimmed, fade timings are measured from the start of the output.
 */

// ============================================================================
// RAW OPTIONS (as typed on the command line)
// ============================================================================

/** A geometry flag in the order it appeared on the command line. */
export type RawGeometryOption =
  | { kind: 'crop'; value: string }
  | { kind: 'height'; value: string }

/**
 * Unvalidated options. String values are exactly what the user typed;
 * booleans are presence flags.
 */
export interface RawOptions {
  input?: string
  output?: string
  start?: string
  duration?: string
  to?: string
  title?: string
  mute?: boolean
  fade?: string
  fadeIn?: string
  fadeOut?: string
  /** `-c` and `-vh` occurrences, in user order */
  geometry?: RawGeometryOption[]
  framerate?: string
  fixrgb?: string
  volume?: string
  audioForce?: boolean
  youtube?: boolean
  hardware?: boolean
  x264?: boolean
  x265?: boolean
  gif?: boolean
  apng?: boolean
  webp?: boolean
  gifPalette?: string
  gifDither?: string
  /** Raw `-ff` string, split on whitespace during validation */
  passthrough?: string
  debug?: boolean
}

// ============================================================================
// VALIDATED BUNDLE
// ============================================================================

/** A non-negative number of seconds parsed from user input. */
export interface TimeSpec {
  readonly seconds: number
}

/** How the trimmed range ends. `-t` and `-to` are exclusive by construction. */
export type TrimEnd =
  | { readonly kind: 'end'; readonly at: TimeSpec }
  | { readonly kind: 'duration'; readonly length: TimeSpec }
  | { readonly kind: 'unset' }

export interface TrimWindow {
  readonly start: TimeSpec
  readonly end: TrimEnd
}

/** A combined `-f` fills both fields with the same value. */
export interface FadeSpec {
  readonly fadeInSeconds?: number
  readonly fadeOutSeconds?: number
}

export interface CropOperation {
  readonly kind: 'crop'
  readonly width: number
  readonly height: number
  readonly x: number
  readonly y: number
}

/**
 * Scale to a height, keeping the aspect ratio.
 * - absolute: `targetHeight` is pixels, already rounded up to even
 * - relative: `targetHeight` is a multiplicative factor of the current height
 */
export interface ScaleOperation {
  readonly kind: 'scale'
  readonly targetHeight: number
  readonly isRelativeFactor: boolean
}

export type GeometryOperation = CropOperation | ScaleOperation

/**
 * `--fixrgb` levels:
 * - `none`: leave colour alone
 * - `metadata`: tag the output as full-range BT.709
 * - `fullRange`: convert TV range to PC range, then tag
 */
export type ColorRange = 'none' | 'metadata' | 'fullRange'

export interface AudioSpec {
  readonly muted: boolean
  /** Ignored when `muted` is set */
  readonly volumeFactor?: number
  readonly forceReencode: boolean
}

export const GIF_DITHERS = ['bayer', 'heckbert', 'floyd_steinberg', 'sierra2', 'sierra2_4a'] as const
export type GifDither = (typeof GIF_DITHERS)[number]

export type VideoCodec = 'h264' | 'h265'

/** Exactly one profile is active per invocation. */
export type FormatProfile =
  | { readonly kind: 'default' }
  | { readonly kind: 'youtube' }
  | { readonly kind: 'hardware' }
  | { readonly kind: 'gif'; readonly paletteSize?: number; readonly dither: GifDither }
  | { readonly kind: 'apng' }
  | { readonly kind: 'webp' }

export type FormatProfileKind = FormatProfile['kind']

export interface FormatSelection {
  readonly profile: FormatProfile
  /** Explicit `--x264` / `--x265`; only meaningful with the default profile */
  readonly codec?: VideoCodec
}

/** The validated, immutable option set threaded through the compiler. */
/** Output frame rate, numeric and as ffmpeg receives it (`24`, `30000/1001`). */
export interface FrameRate {
  readonly fps: number
  readonly expression: string
}

export interface OptionBundle {
  readonly input: string
  readonly output: string
  readonly trim: TrimWindow
  readonly title?: string
  readonly fade: FadeSpec
  readonly geometry: readonly GeometryOperation[]
  readonly framerate?: FrameRate
  readonly colorRange: ColorRange
  readonly audio: AudioSpec
  readonly format: FormatSelection
  readonly passthrough: readonly string[]
  readonly debug: boolean
}
