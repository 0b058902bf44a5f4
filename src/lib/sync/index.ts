/**
 * Timing synchronization engine.
 *
 * Merges line-timed reference lyrics with word-timed speech recognition into
 * render-ready karaoke lines.
 */

export { synchronize, timeReferenceOnly } from "./synchronize"
export { applyGlobalOffset, estimateGlobalOffset } from "./global-offset"
export { alignLineWords, computeSearchWindow, selectCandidates } from "./line-window"
export type { SearchWindow } from "./line-window"
export { interpolateLine, nominalSpan } from "./interpolate"
export type { NominalSpan } from "./interpolate"
export { clampWordsToLine, resolveOverlaps } from "./resolve-overlaps"
export { normalizeToken, tokenizeLine } from "./normalize"
export { SequenceMatcher } from "./sequence-matcher"
export type { MatchBlock, Opcode, OpcodeTag, SequenceMatcherOptions } from "./sequence-matcher"
export {
  formatLrcTime,
  formatSrtTime,
  generateEnhancedLrc,
  generateLrc,
  generateSrt,
} from "./export"
export type {
  AlignedLine,
  AlignedWord,
  GlobalOffset,
  RecognizedWord,
  ReferenceLine,
  SyncConfigValues,
  SyncReport,
  SyncResult,
} from "./types"
export { DEFAULT_SYNC_CONFIG } from "./types"
