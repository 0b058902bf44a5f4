/**
 * Speech recognition transcript adapter
 *
 * Converts segment-level ASR output (Whisper-style JSON) into the flat,
 * word-level sequence the timing engine consumes.
 */

import { type AlignedLine, type AlignedWord, type RecognizedWord, tokenizeLine } from "@/lib/sync"
import { Effect } from "effect"
import { TranscriptParseError } from "./errors"

export interface TranscriptWord {
  readonly word: string
  readonly start: number
  readonly end: number
}

export interface TranscriptSegment {
  readonly text: string
  readonly start: number
  readonly end: number
  readonly words?: readonly TranscriptWord[]
}

// --- Validation ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

const readSeconds = (
  record: Record<string, unknown>,
  key: "start" | "end",
): number | undefined => {
  const value = record[key] ?? record[`${key}_seconds`]
  return typeof value === "number" && Number.isFinite(value) ? value : undefined
}

const fail = (path: string, message: string) =>
  Effect.fail(new TranscriptParseError({ path, message }))

/**
 * Validate a decoded JSON value as a transcript.
 *
 * Accepts either an array of segments or an object with a `segments` array.
 * Times may be given as `start`/`end` or `start_seconds`/`end_seconds`.
 */
export const parseTranscript = (
  value: unknown,
): Effect.Effect<TranscriptSegment[], TranscriptParseError> =>
  Effect.gen(function* () {
    const rawSegments = isRecord(value) ? value.segments : value
    if (!Array.isArray(rawSegments)) {
      return yield* fail("segments", "expected an array of segments")
    }

    const segments: TranscriptSegment[] = []

    for (let i = 0; i < rawSegments.length; i++) {
      const raw: unknown = rawSegments[i]
      const path = `segments[${i}]`
      if (!isRecord(raw)) {
        return yield* fail(path, "expected an object")
      }

      const text = typeof raw.text === "string" ? raw.text : ""
      const start = readSeconds(raw, "start")
      const end = readSeconds(raw, "end")
      if (start === undefined || end === undefined) {
        return yield* fail(path, "start and end must be finite numbers")
      }
      if (end < start) {
        return yield* fail(path, "end must not be before start")
      }

      if (raw.words === undefined) {
        segments.push({ text, start, end })
        continue
      }
      const rawWords = raw.words
      if (!Array.isArray(rawWords)) {
        return yield* fail(`${path}.words`, "expected an array of words")
      }

      const words: TranscriptWord[] = []
      for (let j = 0; j < rawWords.length; j++) {
        const rawWord: unknown = rawWords[j]
        const wordPath = `${path}.words[${j}]`
        if (!isRecord(rawWord) || typeof rawWord.word !== "string") {
          return yield* fail(wordPath, "expected an object with a string word")
        }
        const wordStart = readSeconds(rawWord, "start")
        const wordEnd = readSeconds(rawWord, "end")
        if (wordStart === undefined || wordEnd === undefined || wordEnd < wordStart) {
          return yield* fail(wordPath, "start and end must be finite numbers with end >= start")
        }
        words.push({ word: rawWord.word, start: wordStart, end: wordEnd })
      }

      segments.push({ text, start, end, words })
    }

    return segments
  })

// --- Conversion ---

/**
 * Split a segment's text evenly across its time range.
 */
function splitSegmentEvenly(segment: TranscriptSegment): TranscriptWord[] {
  const words = tokenizeLine(segment.text)
  if (words.length === 0) return []

  const step = (segment.end - segment.start) / words.length
  return words.map((word, i) => ({
    word,
    start: segment.start + i * step,
    end: i === words.length - 1 ? segment.end : segment.start + (i + 1) * step,
  }))
}

function segmentWords(segment: TranscriptSegment): TranscriptWord[] {
  return segment.words && segment.words.length > 0
    ? [...segment.words]
    : splitSegmentEvenly(segment)
}

/**
 * Flatten segments into recognized words ordered by start time.
 *
 * Segments that carry no word-level timing are split evenly across their
 * range. Words that are blank after trimming are dropped.
 */
export function flattenTranscript(segments: readonly TranscriptSegment[]): RecognizedWord[] {
  const words: RecognizedWord[] = []
  for (const segment of segments) {
    for (const word of segmentWords(segment)) {
      const surfaceText = word.word.trim()
      if (!surfaceText) continue
      words.push({ surfaceText, start: word.start, end: word.end })
    }
  }
  // Stable sort keeps recognizer order for equal starts
  return words.sort((a, b) => a.start - b.start)
}

/**
 * Use the transcript itself as the lyrics: one line per non-blank segment,
 * timed by its own words.
 */
export function transcriptToLines(segments: readonly TranscriptSegment[]): AlignedLine[] {
  const lines: AlignedLine[] = []

  for (const segment of segments) {
    const text = segment.text.trim()
    if (!text) continue

    const words: AlignedWord[] = segmentWords(segment)
      .map(w => ({ surfaceText: w.word.trim(), start: w.start, end: w.end, matched: true }))
      .filter(w => w.surfaceText.length > 0)

    const first = words[0]
    const last = words[words.length - 1]
    lines.push({
      text,
      start: first ? Math.min(first.start, segment.start) : segment.start,
      end: last ? Math.max(last.end, segment.end) : segment.end,
      words,
    })
  }

  return lines
}
