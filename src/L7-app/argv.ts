/**
 * Multi-letter single-dash flags (`-ss`, `-vh`, `-ff`, …) are not something
 * commander can parse: it reads `-ss` as `-s -s`. They are rewritten to their
 * long forms before parsing. Option values are copied through untouched.
 */

/** Single-dash spellings and the long flag each one stands for. */
export const SHORT_FLAG_ALIASES: Readonly<Record<string, string>> = {
  '-ss': '--start',
  '-to': '--to',
  '-vt': '--title',
  '-fi': '--fadein',
  '-fo': '--fadeout',
  '-vh': '--height',
  '-av': '--volume',
  '-af': '--audio-force',
  '-yt': '--youtube',
  '-nv': '--hardware',
  '-gp': '--gif-palette',
  '-gd': '--gif-dither',
  '-ff': '--ffmpeg',
}

/** Long flags whose next argument is their value. */
const VALUE_FLAGS: ReadonlySet<string> = new Set([
  '-i', '--input',
  '-t', '--duration',
  '-f', '--fade',
  '-c', '--crop',
  '-r', '--framerate',
  '--start',
  '--to',
  '--title',
  '--fadein',
  '--fadeout',
  '--height',
  '--volume',
  '--fixrgb',
  '--gif-palette',
  '--gif-dither',
  '--ffmpeg',
])

export function normalizeArgv(argv: readonly string[]): string[] {
  const out: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (token === undefined) continue

    if (token === '--') {
      out.push(...argv.slice(i))
      break
    }

    const flag = SHORT_FLAG_ALIASES[token] ?? token
    out.push(flag)

    const value = argv[i + 1]
    if (VALUE_FLAGS.has(flag) && value !== undefined) {
      out.push(value)
      i++
    }
  }

  return out
}
