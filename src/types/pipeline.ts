/**
 * Pipeline and command types: the filter stages the builder produces and the
 * compiled command the synthesizer hands to the execution shim.
 */

// ============================================================================
// SOURCE
// ============================================================================

/**
 * What ffprobe reported about the first video stream. Every field is
 * optional: probing is skipped when nothing needs it, and a broken container
 * may not report a duration.
 */
export interface SourceInfo {
  readonly height?: number
  /** Seconds */
  readonly duration?: number
  /** Frames per second, from `r_frame_rate` */
  readonly frameRate?: number
}

// ============================================================================
// FILTER STAGES
// ============================================================================

export type FadeDirection = 'in' | 'out'

/** A video transformation step, in output order. */
export type VideoStage =
  | { readonly kind: 'fps'; readonly rate: string }
  | { readonly kind: 'crop'; readonly width: number; readonly height: number; readonly x: number; readonly y: number }
  | { readonly kind: 'scale'; readonly height: number }
  | { readonly kind: 'fade'; readonly direction: FadeDirection; readonly start: number; readonly duration: number }
  | { readonly kind: 'fullRange' }

export type VideoStageKind = VideoStage['kind']

export type AudioStage =
  | { readonly kind: 'volume'; readonly factor: number }
  | { readonly kind: 'fade'; readonly direction: FadeDirection; readonly start: number; readonly duration: number }

/** Audio is planned apart from the video chain. */
export type AudioPlan =
  | { readonly kind: 'muted' }
  | { readonly kind: 'copy' }
  | { readonly kind: 'reencode'; readonly stages: readonly AudioStage[] }

export interface TrimPlan {
  /** Seconds into the source */
  readonly start: number
  /** Seconds of output, when `-t` or `-to` was given */
  readonly duration?: number
}

export interface FilterPipeline {
  readonly trim: TrimPlan
  /** Known when `-t`/`-to` was given or the source duration was probed */
  readonly outputDuration?: number
  /** Frame height after every geometry stage, when known */
  readonly frameHeight?: number
  /** Output frame rate, when known */
  readonly frameRate?: number
  readonly video: readonly VideoStage[]
  readonly audio: AudioPlan
  /** Tag the output as full-range BT.709 */
  readonly colorTags: boolean
}

// ============================================================================
// ENCODER SETTINGS
// ============================================================================

/** Tunables that come from configuration rather than from flags. */
export interface EncoderSettings {
  readonly crfX264: number
  readonly crfX265: number
  readonly qpNvenc: number
  readonly preset: string
  readonly audioBitrate: string
  readonly logLevel: string
}

// ============================================================================
// COMPILED COMMAND
// ============================================================================

/** One ffmpeg run. `args` excludes the program name. */
export interface CommandPass {
  readonly label: string
  readonly args: readonly string[]
  readonly output: string
}

/**
 * The final, immutable product of the compiler. Consumed only by the
 * execution shim, which runs `passes` in order and deletes `temporaryFiles`.
 */
export interface CompiledCommand {
  readonly program: string
  readonly passes: readonly CommandPass[]
  readonly output: string
  readonly temporaryFiles: readonly string[]
}

export interface SynthesisContext {
  readonly program: string
  readonly encoder: EncoderSettings
  /** Where the GIF palette pass writes; defaults to `<output>.palette.png` */
  readonly paletteFile?: string
}
