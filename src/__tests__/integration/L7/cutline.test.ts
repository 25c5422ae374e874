import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'

// ── Mock setup (L2 only: no real ffmpeg or ffprobe) ──────────────────────────

const mockRunFFmpeg = vi.hoisted(() => vi.fn())
vi.mock('../../../L2-clients/ffmpeg/runner.js', () => ({
  runFFmpeg: mockRunFFmpeg,
}))

const mockProbeSource = vi.hoisted(() => vi.fn())
vi.mock('../../../L2-clients/ffmpeg/probe.js', () => ({
  probeSource: mockProbeSource,
}))

// ── Import after mocks ───────────────────────────────────────────────────────

import { main } from '../../../L7-app/main.js'

const ENV_KEYS = ['FFPROBE_PATH', 'FFMPEG_LOGLEVEL', 'CRF_X264', 'CRF_X265', 'QP_NVENC', 'ENCODER_PRESET', 'AUDIO_BITRATE', 'VERBOSE']
const SCALE_FLAGS = 'flags=spline+accurate_rnd+full_chroma_int+full_chroma_inp'

function runArgs(call: number): string[] {
  const args: unknown = mockRunFFmpeg.mock.calls[call]?.[1]
  return Array.isArray(args) ? args.map(String) : []
}

describe('cutline end to end', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    for (const key of ENV_KEYS) vi.stubEnv(key, '')
    vi.stubEnv('FFMPEG_PATH', 'ffmpeg')
    mockRunFFmpeg.mockResolvedValue({ code: 0, signal: null })
    mockProbeSource.mockResolvedValue({ height: 1080, duration: 600, frameRate: 30 })
  })

  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('trims, scales, fades and titles in a single ffmpeg run', async () => {
    const code = await main(['-i', 'in.mp4', '-ss', '2:35', '-t', '35.5', '-vh', '720', '-fo', '0.5', '-vt', 'title', 'out.mp4'])

    expect(code).toBe(0)
    expect(mockProbeSource).not.toHaveBeenCalled()
    expect(mockRunFFmpeg).toHaveBeenCalledTimes(1)
    expect(mockRunFFmpeg).toHaveBeenCalledWith('ffmpeg', [
      '-hide_banner', '-loglevel', 'warning',
      '-ss', '155', '-t', '35.5', '-i', 'in.mp4',
      '-vf', `scale=-2:720:${SCALE_FLAGS},fade=t=out:st=35:d=0.5`,
      '-c:v', 'libx264', '-crf', '20', '-preset', 'slow', '-tune', 'film', '-profile:v', 'high', '-level', '5.2',
      '-c:a', 'aac', '-b:a', '384k', '-af', 'afade=t=out:st=35:d=0.5:curve=ihsin',
      '-metadata', 'title=title',
      '-y', 'out.mp4',
    ])
  })

  it('produces identical commands for identical invocations', async () => {
    const argv = ['-i', 'in.mp4', '-to', '1:30', '-c', '1280:720:0:0', '-vh', '0.5x', '-f', '1', 'out.mp4']
    await main(argv)
    await main(argv)

    expect(runArgs(1)).toEqual(runArgs(0))
  })

  it('rejects -t with -to before anything runs', async () => {
    await expect(main(['-i', 'in.mp4', '-to', '10', '-t', '5', 'out.mp4'])).resolves.toBe(2)
    expect(mockRunFFmpeg).not.toHaveBeenCalled()
  })

  it('rejects two profile flags', async () => {
    await expect(main(['-i', 'in.mp4', '--gif', '--webp', 'out.gif'])).resolves.toBe(2)
    expect(mockRunFFmpeg).not.toHaveBeenCalled()
  })

  it('resolves a relative height against the probed source', async () => {
    await expect(main(['-i', 'in.mp4', '-vh', '0.5x', 'out.mp4'])).resolves.toBe(0)
    expect(runArgs(0)).toContain(`scale=-2:540:${SCALE_FLAGS}`)
  })

  it('fails a fade-out when the source cannot be probed', async () => {
    mockProbeSource.mockResolvedValue({})
    await expect(main(['-i', 'in.mp4', '-fo', '1', 'out.mp4'])).resolves.toBe(2)
    expect(mockRunFFmpeg).not.toHaveBeenCalled()
  })

  it('sizes YouTube rate control from the probe', async () => {
    await expect(main(['-i', 'in.mp4', '-yt', 'out.mp4'])).resolves.toBe(0)
    const args = runArgs(0)
    const maxrate = args.indexOf('-maxrate')
    expect(args.slice(maxrate, maxrate + 4)).toEqual(['-maxrate', '8M', '-bufsize', '12M'])
  })

  it('runs a paletted GIF as two passes sharing one palette file', async () => {
    await expect(main(['-i', 'in.mp4', '--gif', '-gp', '64', '-vh', '320', 'out.gif'])).resolves.toBe(0)

    expect(mockRunFFmpeg).toHaveBeenCalledTimes(2)
    const palettePass = runArgs(0)
    const encodePass = runArgs(1)
    const palette = palettePass[palettePass.length - 1]
    expect(palette).toMatch(/cutline-palette-.*\.png$/)
    expect(encodePass.slice(3, 7)).toEqual(['-i', 'in.mp4', '-i', palette])
  })

  it('hands a rational frame rate to the fps filter as written', async () => {
    await expect(main(['-i', 'in.mp4', '-r', '30000/1001', 'out.mp4'])).resolves.toBe(0)
    expect(runArgs(0).slice(5, 7)).toEqual(['-vf', 'fps=fps=30000/1001'])
  })

  it('passes ffmpeg arguments through at the end', async () => {
    await main(['-i', 'in.mp4', '-ff', '-threads 2', 'out.mp4'])
    expect(runArgs(0).slice(-4)).toEqual(['-threads', '2', '-y', 'out.mp4'])
  })

  it('returns the ffmpeg exit code on engine failure', async () => {
    mockRunFFmpeg.mockResolvedValue({ code: 69, signal: null })
    await expect(main(['-i', 'in.mp4', 'out.mp4'])).resolves.toBe(69)
  })

  it('returns 127 when ffmpeg cannot be launched', async () => {
    mockRunFFmpeg.mockRejectedValue(new Error('spawn ffmpeg ENOENT'))
    await expect(main(['-i', 'in.mp4', 'out.mp4'])).resolves.toBe(127)
  })

  it('honours encoder settings from the environment', async () => {
    vi.stubEnv('CRF_X265', '30')
    vi.stubEnv('FFMPEG_LOGLEVEL', 'error')

    await main(['-i', 'in.mp4', '--x265', 'out.mp4'])

    expect(runArgs(0).slice(0, 13)).toEqual([
      '-hide_banner', '-loglevel', 'error', '-i', 'in.mp4',
      '-c:v', 'libx265', '-crf', '30', '-preset', 'slow', '-profile:v', 'main',
    ])
  })
})
