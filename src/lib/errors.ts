/**
 * Centralized error definitions for input loading and synchronization runs
 *
 * The timing engine itself (src/lib/sync) has no failure modes: bad or
 * missing data degrades timing quality instead. These errors belong to the
 * boundaries around it.
 */

import { Data } from "effect"

// ============================================================================
// Input Errors
// ============================================================================

/**
 * A transcript JSON document does not have the expected shape
 */
export class TranscriptParseError extends Data.TaggedClass("TranscriptParseError")<{
  readonly path: string
  readonly message: string
}> {}

/**
 * An input file could not be read or decoded
 */
export class InputReadError extends Data.TaggedClass("InputReadError")<{
  readonly file: string
  readonly cause: unknown
}> {}

export type InputErrors = TranscriptParseError | InputReadError

// ============================================================================
// Synchronization Errors
// ============================================================================

/**
 * A configuration override is out of range
 */
export class InvalidSyncConfigError extends Data.TaggedClass("InvalidSyncConfigError")<{
  readonly key: string
  readonly value: number
  readonly message: string
}> {}

/**
 * Neither reference lyrics nor a transcript were available
 */
export class NoLyricsError extends Data.TaggedClass("NoLyricsError")<object> {}

export type SyncErrors = InvalidSyncConfigError | NoLyricsError

// ============================================================================
// Error Union
// ============================================================================

export type LyricSyncError = InputErrors | SyncErrors
