import { Command, Option } from '../L1-infra/cli/cli.js'
import type { OptionValues } from '../L1-infra/cli/cli.js'
import { readTextFileSync } from '../L1-infra/fileSystem/fileSystem.js'
import { projectRoot, join } from '../L1-infra/paths/paths.js'
import { normalizeArgv } from './argv.js'
import type { RawGeometryOption, RawOptions } from '../types/index.js'

// ── Version ──────────────────────────────────────────────────────────────────

export function readPackageVersion(): string {
  const pkg: unknown = JSON.parse(readTextFileSync(join(projectRoot(), 'package.json')))
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version
  }
  return '0.0.0'
}

// ── Program ──────────────────────────────────────────────────────────────────

/**
 * Build a fresh commander program. `geometry` receives every `-c`/`-vh`
 * occurrence in the order typed, since commander itself only keeps the last.
 */
export function buildProgram(geometry: RawGeometryOption[], version = readPackageVersion()): Command {
  const program = new Command()

  program
    .name('cutline')
    .description('Compile trim, crop, scale, fade and format options into one validated ffmpeg command and run it')
    .version(version, '-V, --version')
    .argument('<output>', 'Output file')
    .requiredOption('-i, --input <path>', 'Input file')
    .option('--start <time>', 'Start position, [[HH:]MM:]SS[.fff] or seconds (-ss)')
    .option('-t, --duration <time>', 'Output duration')
    .option('--to <time>', 'End position in the source (-to)')
    .option('--title <title>', 'Title metadata (-vt)')
    .option('-m, --mute', 'Drop the audio track')
    .option('-f, --fade <seconds>', 'Fade in and out, overrides --fadein/--fadeout')
    .option('--fadein <seconds>', 'Fade in from black (-fi)')
    .option('--fadeout <seconds>', 'Fade out to black (-fo)')
    .option('-c, --crop <w:h:x:y>', 'Crop; repeatable, applied in order with --height')
    .option('--height <pixels|factor>', 'Scale to a height such as 720 or 0.5x (-vh)')
    .option('-r, --framerate <fps>', 'Output frame rate')
    .option('--fixrgb <mode>', '0 none, 1 tag as full-range BT.709, 2 convert to full range')
    .option('--volume <factor>', 'Audio volume factor (-av)')
    .option('--audio-force', 'Re-encode audio even without audio filters (-af)')
    .option('--youtube', 'YouTube upload profile (-yt)')
    .option('--hardware', 'NVIDIA hardware encoding (-nv)')
    .addOption(new Option('--nvidia', 'Alias for --hardware').hideHelp())
    .option('--x264', 'Encode with libx264')
    .option('--x265', 'Encode with libx265')
    .option('--gif', 'Animated GIF')
    .option('--gif-palette <colors>', 'GIF palette size (4-256), enables a palette pass (-gp)')
    .option('--gif-dither <mode>', 'GIF dither: bayer, heckbert, floyd_steinberg, sierra2, sierra2_4a (-gd)')
    .option('--apng', 'Animated PNG')
    .option('--webp', 'Animated WebP')
    .option('--ffmpeg <args>', 'Extra ffmpeg arguments, appended last (-ff)')
    .option('--debug', 'Print the ffmpeg command and wait for Enter before running')
    .allowExcessArguments(false)
    .exitOverride()

  program.on('option:crop', (value: string) => {
    geometry.push({ kind: 'crop', value })
  })
  program.on('option:height', (value: string) => {
    geometry.push({ kind: 'height', value })
  })

  return program
}

// ── Parsing ──────────────────────────────────────────────────────────────────

function stringOption(values: OptionValues, key: string): string | undefined {
  const value: unknown = values[key]
  return typeof value === 'string' ? value : undefined
}

function flagOption(values: OptionValues, key: string): boolean | undefined {
  const value: unknown = values[key]
  return value === true ? true : undefined
}

/** Map commander's parsed values onto the validator's input. */
export function toRawOptions(values: OptionValues, output: string | undefined, geometry: RawGeometryOption[]): RawOptions {
  return {
    input: stringOption(values, 'input'),
    output,
    start: stringOption(values, 'start'),
    duration: stringOption(values, 'duration'),
    to: stringOption(values, 'to'),
    title: stringOption(values, 'title'),
    mute: flagOption(values, 'mute'),
    fade: stringOption(values, 'fade'),
    fadeIn: stringOption(values, 'fadein'),
    fadeOut: stringOption(values, 'fadeout'),
    geometry,
    framerate: stringOption(values, 'framerate'),
    fixrgb: stringOption(values, 'fixrgb'),
    volume: stringOption(values, 'volume'),
    audioForce: flagOption(values, 'audioForce'),
    youtube: flagOption(values, 'youtube'),
    hardware: flagOption(values, 'hardware') ?? flagOption(values, 'nvidia'),
    x264: flagOption(values, 'x264'),
    x265: flagOption(values, 'x265'),
    gif: flagOption(values, 'gif'),
    apng: flagOption(values, 'apng'),
    webp: flagOption(values, 'webp'),
    gifPalette: stringOption(values, 'gifPalette'),
    gifDither: stringOption(values, 'gifDither'),
    passthrough: stringOption(values, 'ffmpeg'),
    debug: flagOption(values, 'debug'),
  }
}

/**
 * Parse user arguments (no node/script prefix) into raw options.
 *
 * @throws CommanderError on usage errors, and for --help / --version
 */
export function parseCommandLine(argv: readonly string[], configure?: (program: Command) => void): RawOptions {
  const geometry: RawGeometryOption[] = []
  const program = buildProgram(geometry)
  configure?.(program)
  program.parse(normalizeArgv(argv), { from: 'user' })
  return toRawOptions(program.opts(), program.args[0], geometry)
}
