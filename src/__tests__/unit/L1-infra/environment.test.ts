import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { initConfig, getConfig } from '../../../L1-infra/config/environment.js'

describe('initConfig', () => {
  beforeEach(() => {
    for (const key of ['FFMPEG_PATH', 'FFPROBE_PATH', 'FFMPEG_LOGLEVEL', 'CRF_X264', 'CRF_X265', 'QP_NVENC', 'ENCODER_PRESET', 'AUDIO_BITRATE', 'VERBOSE']) {
      vi.stubEnv(key, '')
    }
    initConfig()
  })

  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('returns defaults when no env vars are set', () => {
    expect(initConfig()).toEqual({
      FFMPEG_PATH: '',
      FFPROBE_PATH: '',
      FFMPEG_LOGLEVEL: 'warning',
      CRF_X264: 20,
      CRF_X265: 24,
      QP_NVENC: 21,
      ENCODER_PRESET: 'slow',
      AUDIO_BITRATE: '384k',
      VERBOSE: false,
    })
  })

  it('reads encoder tunables from env vars', () => {
    vi.stubEnv('CRF_X264', '18')
    vi.stubEnv('ENCODER_PRESET', 'veryslow')
    vi.stubEnv('AUDIO_BITRATE', '192k')
    initConfig()

    const cfg = getConfig()
    expect(cfg.CRF_X264).toBe(18)
    expect(cfg.ENCODER_PRESET).toBe('veryslow')
    expect(cfg.AUDIO_BITRATE).toBe('192k')
  })

  it('reads binary overrides', () => {
    vi.stubEnv('FFMPEG_PATH', '/opt/ffmpeg/ffmpeg')
    expect(initConfig().FFMPEG_PATH).toBe('/opt/ffmpeg/ffmpeg')
  })

  it('rejects a non-integer CRF', () => {
    vi.stubEnv('CRF_X265', 'high')
    expect(() => initConfig()).toThrow('Invalid CRF_X265: expected a non-negative integer, got "high"')
  })

  it('rejects an unknown ffmpeg log level', () => {
    vi.stubEnv('FFMPEG_LOGLEVEL', 'loud')
    expect(() => initConfig()).toThrow(/Invalid FFMPEG_LOGLEVEL/)
  })

  it('accepts a known ffmpeg log level', () => {
    vi.stubEnv('FFMPEG_LOGLEVEL', 'error')
    expect(initConfig().FFMPEG_LOGLEVEL).toBe('error')
  })

  it('turns on VERBOSE from --debug', () => {
    expect(initConfig({ debug: true }).VERBOSE).toBe(true)
  })

  it('turns on VERBOSE from the env var', () => {
    vi.stubEnv('VERBOSE', 'true')
    expect(initConfig().VERBOSE).toBe(true)
  })

  it('getConfig returns the last initialised config', () => {
    vi.stubEnv('QP_NVENC', '25')
    const cfg = initConfig()
    expect(getConfig()).toBe(cfg)
  })
})
