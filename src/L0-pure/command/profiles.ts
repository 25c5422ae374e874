/**
 * Format profiles: the codec, container and rate-control bundles each
 * profile implies.
 */

import { ConflictingOptionsError, InvalidArgumentError } from '../errors/errors.js'
import type { FormatProfileKind, FormatSelection, VideoCodec } from '../../types/options.js'
import type { EncoderSettings } from '../../types/pipeline.js'

// ── Defaults ─────────────────────────────────────────────────────────────────

export const DEFAULT_ENCODER_SETTINGS: EncoderSettings = {
  crfX264: 20,
  crfX265: 24,
  qpNvenc: 21,
  preset: 'slow',
  audioBitrate: '384k',
  logLevel: 'warning',
}

/** Tag values ffmpeg expects for a full-range BT.709 stream. */
export const FULL_RANGE_COLOR_ARGS = [
  '-colorspace', 'bt709',
  '-color_range', 'jpeg',
  '-color_primaries', 'bt709',
  '-color_trc', 'bt709',
] as const

export const HARDWARE_INPUT_ARGS = ['-hwaccel', 'cuda', '-hwaccel_output_format', 'cuda'] as const

// ── Codec selection ──────────────────────────────────────────────────────────

export type EncoderName = 'libx264' | 'libx265' | 'h264_nvenc' | 'gif' | 'apng' | 'libwebp'

/** Profiles that fix the encoder themselves. */
const PROFILE_ENCODERS: Record<Exclude<FormatProfileKind, 'default'>, EncoderName> = {
  youtube: 'libx264',
  hardware: 'h264_nvenc',
  gif: 'gif',
  apng: 'apng',
  webp: 'libwebp',
}

const CODEC_ENCODERS: Record<VideoCodec, EncoderName> = {
  h264: 'libx264',
  h265: 'libx265',
}

/**
 * Pick the encoder for a format selection. An explicit codec only applies to
 * the default profile; any other profile has already fixed it.
 *
 * @throws ConflictingOptionsError when an explicit codec meets a fixed-codec profile
 */
export function resolveEncoder(format: FormatSelection): EncoderName {
  const { profile, codec } = format
  if (profile.kind === 'default') {
    return codec ? CODEC_ENCODERS[codec] : 'libx264'
  }
  if (codec) {
    throw new ConflictingOptionsError(
      [`--${profile.kind}`, `--${codec === 'h264' ? 'x264' : 'x265'}`],
      `The ${profile.kind} profile chooses its own codec; drop --${codec === 'h264' ? 'x264' : 'x265'}`,
    )
  }
  return PROFILE_ENCODERS[profile.kind]
}

export function isAnimatedImage(kind: FormatProfileKind): boolean {
  return kind === 'gif' || kind === 'apng' || kind === 'webp'
}

/** Encoder options that follow `-c:v <encoder>`. */
export function encoderArgs(encoder: EncoderName, settings: EncoderSettings): string[] {
  switch (encoder) {
    case 'libx264':
      return ['-crf', String(settings.crfX264), '-preset', settings.preset, '-tune', 'film', '-profile:v', 'high', '-level', '5.2']
    case 'libx265':
      return ['-crf', String(settings.crfX265), '-preset', settings.preset, '-profile:v', 'main']
    case 'h264_nvenc':
      return [
        '-preset', settings.preset,
        '-profile:v', 'high',
        '-level', '5.2',
        '-rc', 'constqp',
        '-qp', String(settings.qpNvenc),
        '-strict_gop', 'true',
        '-rc-lookahead', '48',
        '-spatial-aq', 'true',
        '-temporal-aq', 'true',
        '-aq-strength', '8',
      ]
    case 'gif':
      return []
    case 'apng':
      return []
    case 'libwebp':
      return []
  }
}

/** Muxer flags for the animated-image containers. */
export function containerArgs(kind: FormatProfileKind): string[] {
  switch (kind) {
    case 'gif':
      return ['-f', 'gif', '-loop', '0']
    case 'apng':
      return ['-f', 'apng', '-plays', '0']
    case 'webp':
      return ['-f', 'webp', '-loop', '0']
    default:
      return []
  }
}

// ── YouTube ──────────────────────────────────────────────────────────────────

/**
 * Recommended upload bitrates in Mbit/s, by frame-rate class then by height.
 * A lookup takes the smallest key at or above the value, or the largest key
 * when the value is above them all.
 */
export const YOUTUBE_BITRATES: Readonly<Record<number, Readonly<Record<number, number>>>> = {
  30: { 360: 1, 480: 3, 720: 5, 1080: 8, 1440: 16, 2160: 45, 2880: 64 },
  60: { 360: 2, 480: 4, 720: 8, 1080: 12, 1440: 24, 2160: 64, 2880: 80 },
}

function closestAtOrAbove(value: number, keys: readonly number[]): number {
  const sorted = [...keys].sort((a, b) => a - b)
  return sorted.find((key) => key >= value) ?? sorted[sorted.length - 1] ?? value
}

function numericKeys(table: Readonly<Record<number, unknown>>): number[] {
  return Object.keys(table).map(Number)
}

/** Maximum bitrate in Mbit/s for an output of this height and frame rate. */
export function youtubeBitrate(height: number, frameRate: number): number {
  const rateClass = closestAtOrAbove(frameRate, numericKeys(YOUTUBE_BITRATES))
  const byHeight = YOUTUBE_BITRATES[rateClass] ?? {}
  const heightClass = closestAtOrAbove(height, numericKeys(byHeight))
  const bitrate = byHeight[heightClass]
  if (bitrate === undefined) {
    throw new InvalidArgumentError('--youtube', `no bitrate for ${height}p at ${frameRate} fps`)
  }
  return bitrate
}

/**
 * Output options the YouTube profile adds on top of the x264 bundle:
 * fast-start MP4, VBV cap from the bitrate table, a GOP of half the frame
 * rate, two B-frames and 4:2:0 chroma.
 *
 * @throws InvalidArgumentError when the output height or frame rate is unknown
 */
export function youtubeArgs(frameHeight: number | undefined, frameRate: number | undefined): string[] {
  if (frameHeight === undefined || frameRate === undefined) {
    throw new InvalidArgumentError('--youtube', 'the output height and frame rate are unknown; the source could not be probed')
  }
  const maxrate = youtubeBitrate(frameHeight, frameRate)
  return [
    '-movflags', '+faststart',
    '-maxrate', `${maxrate}M`,
    '-bufsize', `${Math.round(maxrate * 1.5)}M`,
    '-g', String(Math.max(1, Math.round(frameRate / 2))),
    '-bf', '2',
    '-pix_fmt', 'yuv420p',
  ]
}
