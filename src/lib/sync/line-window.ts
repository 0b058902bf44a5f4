/**
 * Per-line word alignment inside a bounded time window.
 *
 * Aligning against the whole song would let a repeated chorus word minutes
 * away claim a match. Each line only sees the recognized words that overlap
 * its own window; words that drifted outside it are left to interpolation.
 */

import { normalizeToken, tokenizeLine } from "./normalize"
import { SequenceMatcher } from "./sequence-matcher"
import {
  type AlignedWord,
  DEFAULT_SYNC_CONFIG,
  type RecognizedWord,
  type ReferenceLine,
  type SyncConfigValues,
} from "./types"

export interface SearchWindow {
  readonly start: number
  readonly end: number
}

/**
 * Search window for line `index`: from a margin before its nominal start to a
 * margin after the next line's nominal start (or an assumed gap for the last
 * line). A window that ends before it starts is widened by the default gap.
 */
export function computeSearchWindow(
  lines: readonly ReferenceLine[],
  index: number,
  config: SyncConfigValues = DEFAULT_SYNC_CONFIG,
): SearchWindow {
  const line = lines[index]
  if (!line) return { start: 0, end: config.defaultLineGap }

  const next = lines[index + 1]
  const start = Math.max(0, line.nominalStart - config.windowMargin)
  let end =
    (next ? next.nominalStart : line.nominalStart + config.defaultLineGap) + config.windowMargin

  if (end <= start) {
    end = start + config.defaultLineGap
  }

  return { start, end }
}

/**
 * Recognized words whose interval overlaps the window, in recognizer order.
 */
export function selectCandidates(
  words: readonly RecognizedWord[],
  window: SearchWindow,
): RecognizedWord[] {
  return words.filter(word => word.start < window.end && word.end > window.start)
}

/**
 * Align one reference line against its candidate pool.
 *
 * Every word in an "equal" run takes the start/end of the candidate it lines
 * up with and is marked matched. All other words come back unmatched with
 * zero timestamps.
 */
export function alignLineWords(
  text: string,
  candidates: readonly RecognizedWord[],
): AlignedWord[] {
  const words: AlignedWord[] = tokenizeLine(text).map(surfaceText => ({
    surfaceText,
    start: 0,
    end: 0,
    matched: false,
  }))

  if (words.length === 0 || candidates.length === 0) return words

  const lineTokens = words.map(w => normalizeToken(w.surfaceText))
  const candidateTokens = candidates.map(c => normalizeToken(c.surfaceText))
  const matcher = new SequenceMatcher(lineTokens, candidateTokens)

  for (const op of matcher.getOpcodes()) {
    if (op.tag !== "equal") continue

    const count = Math.min(op.aEnd - op.aStart, op.bEnd - op.bStart)
    for (let k = 0; k < count; k++) {
      const word = words[op.aStart + k]
      const candidate = candidates[op.bStart + k]
      // Punctuation-only words normalize to "" and would pair with noise
      if (!word || !candidate || lineTokens[op.aStart + k] === "") continue

      word.start = candidate.start
      word.end = candidate.end
      word.matched = true
    }
  }

  return words
}
