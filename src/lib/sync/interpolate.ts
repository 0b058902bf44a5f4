/**
 * Gap interpolation for reference words the recognizer never matched.
 *
 * Matched words act as anchors; each run of unmatched words is spread evenly
 * between the anchors around it. A line with no anchor at all is spread over
 * its nominal span.
 */

import {
  type AlignedLine,
  type AlignedWord,
  DEFAULT_SYNC_CONFIG,
  type ReferenceLine,
  type SyncConfigValues,
} from "./types"

export interface NominalSpan {
  readonly start: number
  readonly end: number
}

/**
 * Nominal span of line `index`: its start up to the next line's start, or an
 * assumed duration for the last line.
 */
export function nominalSpan(
  lines: readonly ReferenceLine[],
  index: number,
  config: SyncConfigValues = DEFAULT_SYNC_CONFIG,
): NominalSpan {
  const line = lines[index]
  const start = line?.nominalStart ?? 0
  const next = lines[index + 1]
  return { start, end: next ? next.nominalStart : start + config.lastLineDuration }
}

function spreadEvenly(words: readonly AlignedWord[], start: number, end: number): void {
  const step = (end - start) / words.length
  words.forEach((word, i) => {
    word.start = start + i * step
    word.end = i === words.length - 1 ? end : start + (i + 1) * step
    word.matched = true
  })
}

/**
 * Fill in timestamps for unmatched words and derive the line's bounds.
 *
 * Mutates `words` and returns the finished line. After this every word is
 * marked matched; matched-by-alignment and interpolated words are no longer
 * distinguishable.
 */
export function interpolateLine(
  text: string,
  words: AlignedWord[],
  span: NominalSpan,
  config: SyncConfigValues = DEFAULT_SYNC_CONFIG,
): AlignedLine {
  if (words.length === 0) {
    return { text, start: span.start, end: span.end, words }
  }

  if (!words.some(w => w.matched)) {
    const duration = span.end - span.start > 0 ? span.end - span.start : config.lastLineDuration
    spreadEvenly(words, span.start, span.start + duration)
  } else {
    let lastEnd = span.start
    let k = 0

    while (k < words.length) {
      const word = words[k]
      if (!word) break

      if (word.matched) {
        lastEnd = word.end
        k++
        continue
      }

      let m = k
      while (m < words.length && !words[m]?.matched) m++

      const gapStart = lastEnd
      const nextAnchor = words[m]
      const gapEnd = Math.max(
        nextAnchor ? nextAnchor.start : span.end,
        gapStart + config.minGapDuration,
      )

      spreadEvenly(words.slice(k, m), gapStart, gapEnd)
      lastEnd = gapEnd
      k = m
    }
  }

  const first = words[0]
  const last = words[words.length - 1]
  return {
    text,
    start: first ? first.start : span.start,
    end: last ? last.end : span.end,
    words,
  }
}
