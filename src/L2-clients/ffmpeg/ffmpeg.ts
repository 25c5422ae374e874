import { fluentFfmpeg as ffmpegLib } from '../../L1-infra/ffmpeg/ffmpeg.js'
import type { FfprobeData } from '../../L1-infra/ffmpeg/ffmpeg.js'
import { createModuleRequire } from '../../L1-infra/process/process.js'
import { fileExistsSync } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { getConfig } from '../../L1-infra/config/environment.js'

const require = createModuleRequire(import.meta.url)

function hasBinaryPath(mod: unknown): mod is { path: string } {
  return typeof mod === 'object' && mod !== null && 'path' in mod && typeof mod.path === 'string'
}

/** Path exported by an installer package, when the package and its binary are present. */
function installerBinary(packageName: string): string | undefined {
  let mod: unknown
  try {
    mod = require(packageName)
  } catch (err: unknown) {
    logger.debug(`${packageName} not available: ${err instanceof Error ? err.message : String(err)}`)
    return undefined
  }
  if (hasBinaryPath(mod) && fileExistsSync(mod.path)) return mod.path
  return undefined
}

/** Get the resolved path to the FFmpeg binary. */
export function getFFmpegPath(): string {
  const config = getConfig()
  if (config.FFMPEG_PATH) {
    logger.debug(`FFmpeg: using FFMPEG_PATH config: ${config.FFMPEG_PATH}`)
    return config.FFMPEG_PATH
  }
  const installed = installerBinary('@ffmpeg-installer/ffmpeg')
  if (installed) {
    logger.debug(`FFmpeg: using @ffmpeg-installer/ffmpeg: ${installed}`)
    return installed
  }
  logger.debug('FFmpeg: falling back to system PATH')
  return 'ffmpeg'
}

/** Get the resolved path to the FFprobe binary. */
export function getFFprobePath(): string {
  const config = getConfig()
  if (config.FFPROBE_PATH) {
    logger.debug(`FFprobe: using FFPROBE_PATH config: ${config.FFPROBE_PATH}`)
    return config.FFPROBE_PATH
  }
  const installed = installerBinary('@ffprobe-installer/ffprobe')
  if (installed) {
    logger.debug(`FFprobe: using @ffprobe-installer/ffprobe: ${installed}`)
    return installed
  }
  logger.debug('FFprobe: falling back to system PATH')
  return 'ffprobe'
}

/** Promisified ffprobe: get media file metadata. */
export function ffprobe(filePath: string): Promise<FfprobeData> {
  return new Promise((resolve, reject) => {
    ffmpegLib.setFfprobePath(getFFprobePath())
    ffmpegLib.ffprobe(filePath, (err, data) => {
      if (err) reject(err)
      else resolve(data)
    })
  })
}

export type { FfprobeData } from '../../L1-infra/ffmpeg/ffmpeg.js'
