import { join } from '../paths/paths.js'
import { fileExistsSync } from '../fileSystem/fileSystem.js'
import { loadEnvFile } from './env.js'

// Load .env from the working directory
const envPath = join(process.cwd(), '.env')
if (fileExistsSync(envPath)) {
  loadEnvFile(envPath)
}

export interface AppEnvironment {
  /** Explicit ffmpeg binary; empty means resolve it */
  FFMPEG_PATH: string
  /** Explicit ffprobe binary; empty means resolve it */
  FFPROBE_PATH: string
  FFMPEG_LOGLEVEL: string
  CRF_X264: number
  CRF_X265: number
  QP_NVENC: number
  ENCODER_PRESET: string
  AUDIO_BITRATE: string
  VERBOSE: boolean
}

export interface CLIOptions {
  debug?: boolean
}

const FFMPEG_LOG_LEVELS = ['quiet', 'panic', 'fatal', 'error', 'warning', 'info', 'verbose', 'debug', 'trace'] as const

let config: AppEnvironment | null = null

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase())
}

/** Read a non-negative integer from the environment, else the fallback. */
function envInteger(name: string, fallback: number): number {
  const raw = process.env[name]?.trim()
  if (!raw) return fallback
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Invalid ${name}: expected a non-negative integer, got "${raw}"`)
  }
  return Number(raw)
}

function envLogLevel(): string {
  const raw = process.env.FFMPEG_LOGLEVEL?.trim() || 'warning'
  if (!FFMPEG_LOG_LEVELS.some((level) => level === raw)) {
    throw new Error(`Invalid FFMPEG_LOGLEVEL: expected one of ${FFMPEG_LOG_LEVELS.join(', ')}, got "${raw}"`)
  }
  return raw
}

/** Merge CLI options → env vars → defaults. Call before getConfig(). */
export function initConfig(cli: CLIOptions = {}): AppEnvironment {
  config = {
    FFMPEG_PATH: process.env.FFMPEG_PATH || '',
    FFPROBE_PATH: process.env.FFPROBE_PATH || '',
    FFMPEG_LOGLEVEL: envLogLevel(),
    CRF_X264: envInteger('CRF_X264', 20),
    CRF_X265: envInteger('CRF_X265', 24),
    QP_NVENC: envInteger('QP_NVENC', 21),
    ENCODER_PRESET: process.env.ENCODER_PRESET || 'slow',
    AUDIO_BITRATE: process.env.AUDIO_BITRATE || '384k',
    VERBOSE: cli.debug === true || isTruthy(process.env.VERBOSE),
  }

  return config
}

export function getConfig(): AppEnvironment {
  if (config) {
    return config
  }

  // Fallback: init with no CLI options (pure env-var mode)
  return initConfig()
}
