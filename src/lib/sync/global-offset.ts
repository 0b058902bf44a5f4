/**
 * Song-wide drift estimation between reference lyrics and recognized words.
 *
 * ASR silence trimming or a different intro length commonly shifts the whole
 * timeline. The longest run of words both sources agree on gives one offset
 * that is applied to every reference line before per-line alignment.
 */

import { normalizeToken, tokenizeLine } from "./normalize"
import { SequenceMatcher } from "./sequence-matcher"
import {
  DEFAULT_SYNC_CONFIG,
  type GlobalOffset,
  type RecognizedWord,
  type ReferenceLine,
  type SyncConfigValues,
} from "./types"

interface TimedToken {
  readonly token: string
  readonly time: number
}

function referenceTokens(lines: readonly ReferenceLine[], minLength: number): TimedToken[] {
  const tokens: TimedToken[] = []
  for (const line of lines) {
    for (const word of tokenizeLine(line.text)) {
      const token = normalizeToken(word)
      if (token.length >= minLength) {
        tokens.push({ token, time: line.nominalStart })
      }
    }
  }
  return tokens
}

function recognizedTokens(words: readonly RecognizedWord[], minLength: number): TimedToken[] {
  const tokens: TimedToken[] = []
  for (const word of words) {
    const token = normalizeToken(word.surfaceText)
    if (token.length >= minLength) {
      tokens.push({ token, time: word.start })
    }
  }
  return tokens
}

/**
 * Estimate the offset (recognizer time - reference time) at the longest block
 * of tokens both sequences share.
 *
 * Short tokens are dropped on both sides so filler words ("a", "oh") cannot
 * anchor the estimate. Returns an offset of 0 when either side is empty or
 * nothing matches. `applied` reports whether the offset clears the threshold.
 */
export function estimateGlobalOffset(
  lines: readonly ReferenceLine[],
  words: readonly RecognizedWord[],
  config: SyncConfigValues = DEFAULT_SYNC_CONFIG,
): GlobalOffset {
  const ref = referenceTokens(lines, config.minTokenLength)
  const rec = recognizedTokens(words, config.minTokenLength)

  if (ref.length === 0 || rec.length === 0) {
    return { offset: 0, blockSize: 0, applied: false }
  }

  const matcher = new SequenceMatcher(
    ref.map(t => t.token),
    rec.map(t => t.token),
  )
  const block = matcher.findLongestMatch()

  const refAnchor = ref[block.a]
  const recAnchor = rec[block.b]
  if (block.size === 0 || !refAnchor || !recAnchor) {
    return { offset: 0, blockSize: 0, applied: false }
  }

  const offset = recAnchor.time - refAnchor.time
  return {
    offset,
    blockSize: block.size,
    applied: Math.abs(offset) > config.globalOffsetThreshold,
  }
}

/**
 * Shift every line's nominal start by `offset`. Returns new lines; the input
 * is left untouched.
 */
export function applyGlobalOffset(
  lines: readonly ReferenceLine[],
  offset: number,
): ReferenceLine[] {
  return lines.map(line => ({ text: line.text, nominalStart: line.nominalStart + offset }))
}
