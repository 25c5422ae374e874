import { ffprobe } from './ffmpeg.js'
import type { FfprobeData } from './ffmpeg.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import type { SourceInfo } from '../../types/index.js'

// ── Helpers ──────────────────────────────────────────────────────────────────

/** ffprobe reports numbers as strings or numbers depending on the field. */
function toPositiveNumber(value: unknown): number | undefined {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : Number.NaN
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
}

/**
 * Parse an ffprobe rate such as `30000/1001` or `25/1` into frames per second,
 * rounded to 3 decimals. `0/0` and garbage give `undefined`.
 */
export function parseFrameRate(rate: string | undefined): number | undefined {
  if (!rate) return undefined
  const [num, den = '1'] = rate.split('/')
  const numerator = toPositiveNumber(num)
  const denominator = toPositiveNumber(den)
  if (numerator === undefined || denominator === undefined) return undefined
  return Math.round((numerator / denominator) * 1000) / 1000
}

/** Map ffprobe output to the facts the pipeline builder uses. */
export function toSourceInfo(data: FfprobeData): SourceInfo {
  const video = data.streams.find((stream) => stream.codec_type === 'video')
  return {
    height: toPositiveNumber(video?.height),
    duration: toPositiveNumber(data.format.duration) ?? toPositiveNumber(video?.duration),
    frameRate: parseFrameRate(video?.r_frame_rate),
  }
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Probe the first video stream of `filePath`.
 * Never throws: a failed probe is logged and reported as "nothing known".
 */
export async function probeSource(filePath: string): Promise<SourceInfo> {
  try {
    const info = toSourceInfo(await ffprobe(filePath))
    logger.debug(`Probed ${sanitizeForLog(filePath)}: ${JSON.stringify(info)}`)
    return info
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err)
    logger.warn(`Could not probe ${sanitizeForLog(filePath)}: ${sanitizeForLog(message)}`)
    return {}
  }
}
