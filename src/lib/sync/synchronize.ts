/**
 * Timing synchronization pipeline.
 *
 * Combines line-timed reference lyrics (correct text, drifting timing) with
 * recognized words (unreliable text, accurate timing) into lines that carry
 * the reference text and the recognizer's timing:
 *
 * 1. Estimate and apply a global offset
 * 2. Align each line against the recognized words in its time window
 * 3. Interpolate the words left unmatched
 * 4. Enforce minimum durations and remove overlaps
 *
 * The pipeline never fails. Missing or mismatched input degrades to evenly
 * spread timing.
 */

import { applyGlobalOffset, estimateGlobalOffset } from "./global-offset"
import { interpolateLine, nominalSpan } from "./interpolate"
import { alignLineWords, computeSearchWindow, selectCandidates } from "./line-window"
import { resolveOverlaps } from "./resolve-overlaps"
import {
  type AlignedLine,
  DEFAULT_SYNC_CONFIG,
  type RecognizedWord,
  type ReferenceLine,
  type SyncConfigValues,
  type SyncResult,
} from "./types"

/**
 * Synchronize reference lines with recognized words.
 *
 * @param reference - Lyric lines ordered by nominal start
 * @param recognized - Recognized words ordered by start
 * @returns One aligned line per reference line, plus a report of the run
 */
export function synchronize(
  reference: readonly ReferenceLine[],
  recognized: readonly RecognizedWord[],
  config: SyncConfigValues = DEFAULT_SYNC_CONFIG,
): SyncResult {
  const offset = estimateGlobalOffset(reference, recognized, config)
  const lines = offset.applied ? applyGlobalOffset(reference, offset.offset) : reference

  const aligned: AlignedLine[] = []
  const unmatchedLines: number[] = []
  let totalWords = 0
  let anchoredWords = 0

  lines.forEach((line, index) => {
    const window = computeSearchWindow(lines, index, config)
    const words = alignLineWords(line.text, selectCandidates(recognized, window))

    const anchored = words.filter(w => w.matched).length
    totalWords += words.length
    anchoredWords += anchored
    if (anchored === 0) unmatchedLines.push(index)

    aligned.push(interpolateLine(line.text, words, nominalSpan(lines, index, config), config))
  })

  resolveOverlaps(aligned, config)

  return {
    lines: aligned,
    report: {
      offset,
      totalWords,
      anchoredWords,
      coverage: totalWords > 0 ? (anchoredWords / totalWords) * 100 : 0,
      unmatchedLines,
    },
  }
}

/**
 * Time reference lines without any recognized words: each line's words are
 * spread over its nominal span, then overlaps are resolved.
 */
export function timeReferenceOnly(
  reference: readonly ReferenceLine[],
  config: SyncConfigValues = DEFAULT_SYNC_CONFIG,
): AlignedLine[] {
  const lines = reference.map(line =>
    interpolateLine(
      line.text,
      alignLineWords(line.text, []),
      { start: line.nominalStart, end: line.nominalStart + config.lastLineDuration },
      config,
    ),
  )
  return resolveOverlaps(lines, config)
}
