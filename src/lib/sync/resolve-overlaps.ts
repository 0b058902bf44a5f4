/**
 * Post-alignment cleanup: minimum visible duration and no overlap between
 * consecutive lines.
 *
 * A single left-to-right pass. Later lines always yield to earlier ones, so a
 * push can cascade forward but an earlier line is never pulled back.
 */

import { type AlignedLine, DEFAULT_SYNC_CONFIG, type SyncConfigValues } from "./types"

function enforceMinDuration(line: AlignedLine, minDuration: number): void {
  if (line.end - line.start < minDuration) {
    line.end = line.start + minDuration
  }
}

/**
 * Keep every word inside its line's bounds, with `start <= end`.
 */
export function clampWordsToLine(line: AlignedLine): void {
  for (const word of line.words) {
    word.start = Math.min(Math.max(word.start, line.start), line.end)
    word.end = Math.min(Math.max(word.end, word.start), line.end)
  }
}

/**
 * Resolve overlaps in place and return the same array.
 *
 * For each adjacent pair: extend the earlier line to the minimum duration,
 * push the later line's start to the earlier line's end when they overlap,
 * keep the pushed line at least `minGapDuration` long and clamp its words up
 * to the new start. Each line is finalized (minimum duration, words clamped
 * into its bounds) before its successor is touched.
 */
export function resolveOverlaps(
  lines: AlignedLine[],
  config: SyncConfigValues = DEFAULT_SYNC_CONFIG,
): AlignedLine[] {
  for (let i = 0; i < lines.length - 1; i++) {
    const current = lines[i]
    const next = lines[i + 1]
    if (!current || !next) continue

    enforceMinDuration(current, config.minLineDuration)

    if (current.end > next.start) {
      next.start = current.end
      next.end = Math.max(next.end, next.start + config.minGapDuration)

      for (const word of next.words) {
        if (word.start < next.start) word.start = next.start
        if (word.end < next.start) word.end = next.start
      }
    }

    clampWordsToLine(current)
  }

  const last = lines[lines.length - 1]
  if (last) {
    enforceMinDuration(last, config.minLineDuration)
    clampWordsToLine(last)
  }

  return lines
}
