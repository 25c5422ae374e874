import { InvalidTimeFormatError } from '../errors/errors.js'
import type { TimeSpec } from '../../types/options.js'

// ── Patterns ─────────────────────────────────────────────────────────────────

interface TimestampPattern {
  regex: RegExp
  fields: readonly ('H' | 'M' | 'S' | 'f')[]
}

const H = '(\\d{1,2})'
const M = '(\\d{1,2})'
const S = '(\\d{1,2})'
const F = '(\\d{1,6})'

/** Tried in order; first match wins. */
export const TIMESTAMP_PATTERNS: readonly TimestampPattern[] = [
  { regex: new RegExp(`^${H}:${M}:${S}\\.${F}$`), fields: ['H', 'M', 'S', 'f'] },
  { regex: new RegExp(`^${H}:${M}:${S}$`), fields: ['H', 'M', 'S'] },
  { regex: new RegExp(`^${M}:${S}\\.${F}$`), fields: ['M', 'S', 'f'] },
  { regex: new RegExp(`^${M}:${S}$`), fields: ['M', 'S'] },
  { regex: new RegExp(`^${S}\\.${F}$`), fields: ['S', 'f'] },
  { regex: new RegExp(`^${S}$`), fields: ['S'] },
]

const FIELD_LIMITS = { H: 23, M: 59, S: 61 } as const

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

// ── Helpers ──────────────────────────────────────────────────────────────────

/** Round to 4 decimal places, the canonical precision for every TimeSpec. */
export function roundSeconds(value: number): number {
  return Math.round(value * 10_000) / 10_000
}

/** Round up to the nearest even integer (`721` → `722`). */
export function ceilEven(value: number): number {
  return Math.ceil(value / 2) * 2
}

/**
 * Render seconds for an ffmpeg argument: at most 4 decimals, no trailing
 * zeros (`155`, `35.5`, `0.3333`).
 */
export function formatSeconds(seconds: number): string {
  return String(roundSeconds(seconds))
}

function matchPattern(pattern: TimestampPattern, token: string): number | undefined {
  const match = pattern.regex.exec(token)
  if (!match) return undefined

  let total = 0
  for (let i = 0; i < pattern.fields.length; i++) {
    const field = pattern.fields[i]
    const raw = match[i + 1] ?? '0'
    if (field === 'f') {
      // %f is a fraction of a second, right-padded to microseconds
      total += Number(raw.padEnd(6, '0')) / 1_000_000
      continue
    }
    const value = Number(raw)
    if (value > FIELD_LIMITS[field]) return undefined
    if (field === 'H') total += value * 3600
    else if (field === 'M') total += value * 60
    else total += value
  }
  return total
}

// ── Public API ───────────────────────────────────────────────────────────────

/**
 * Parse seconds from a clock-style token or a plain number.
 *
 * A bare integer such as `"90"` is seconds: it is too large for `%S` and
 * falls through to the numeric parse, so it is never read as minutes.
 *
 * @param option - Flag name used in the error message (e.g. `-ss`)
 * @throws InvalidTimeFormatError when nothing matches or the value is negative
 */
export function parseTimestamp(token: string | number, option = 'time'): TimeSpec {
  if (typeof token === 'number') {
    if (!Number.isFinite(token) || token < 0) {
      throw new InvalidTimeFormatError(option, String(token))
    }
    return { seconds: roundSeconds(token) }
  }

  const trimmed = token.trim()
  for (const pattern of TIMESTAMP_PATTERNS) {
    const seconds = matchPattern(pattern, trimmed)
    if (seconds !== undefined) return { seconds: roundSeconds(seconds) }
  }

  if (DECIMAL.test(trimmed)) {
    const seconds = Number(trimmed)
    if (Number.isFinite(seconds) && seconds >= 0) {
      return { seconds: roundSeconds(seconds) }
    }
  }

  throw new InvalidTimeFormatError(option, token)
}
