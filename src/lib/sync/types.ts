/**
 * Timing synchronization types.
 *
 * All times are in seconds. Input types are immutable; the aligned types are
 * builders owned by a single synchronization run and mutated stage by stage.
 */

/** A lyric line with correct text and an approximate start time */
export interface ReferenceLine {
  readonly text: string
  readonly nominalStart: number
}

/** A word emitted by speech recognition, with reliable timing */
export interface RecognizedWord {
  readonly surfaceText: string
  readonly start: number
  readonly end: number
}

export interface AlignedWord {
  surfaceText: string
  start: number
  end: number
  /** True once the word has a timestamp, whether matched or interpolated */
  matched: boolean
}

export interface AlignedLine {
  text: string
  start: number
  end: number
  words: AlignedWord[]
}

export interface SyncConfigValues {
  /** Shortest time a line stays on screen */
  readonly minLineDuration: number
  /** Detected offsets at or below this magnitude are ignored */
  readonly globalOffsetThreshold: number
  /** Slack added on both sides of a line's search window */
  readonly windowMargin: number
  /** Tokens shorter than this are ignored when estimating the global offset */
  readonly minTokenLength: number
  /** Assumed span of the last line's window, and of a degenerate window */
  readonly defaultLineGap: number
  /** Assumed span of the last line when interpolating */
  readonly lastLineDuration: number
  /** Smallest gap handed to interpolation, and smallest span of a pushed line */
  readonly minGapDuration: number
}

export const DEFAULT_SYNC_CONFIG: SyncConfigValues = {
  minLineDuration: 1.2,
  globalOffsetThreshold: 2.0,
  windowMargin: 1.0,
  minTokenLength: 3,
  defaultLineGap: 5.0,
  lastLineDuration: 3.0,
  minGapDuration: 0.5,
}

export interface GlobalOffset {
  /** Recognizer time minus reference time at the longest shared block */
  readonly offset: number
  /** Length in tokens of the block the offset was measured on */
  readonly blockSize: number
  readonly applied: boolean
}

export interface SyncReport {
  readonly offset: GlobalOffset
  readonly totalWords: number
  /** Words that took their timing from a recognized word */
  readonly anchoredWords: number
  /** 0-100 percentage of words anchored */
  readonly coverage: number
  /** Lines where no word matched and timing was spread evenly */
  readonly unmatchedLines: readonly number[]
}

export interface SyncResult {
  readonly lines: AlignedLine[]
  readonly report: SyncReport
}
