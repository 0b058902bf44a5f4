/**
 * Synchronization service
 *
 * Wraps the pure timing engine with configuration, logging and the fallback
 * chain used when one of the two sources is missing:
 *
 * - reference + transcript: full synchronization
 * - transcript only: the transcript's own segments become the lines
 * - reference only: each line is spread evenly from its nominal start
 * - neither: NoLyricsError
 */

import { NoLyricsError } from "@/lib/errors"
import {
  type AlignedLine,
  type RecognizedWord,
  type ReferenceLine,
  type SyncReport,
  type SyncResult,
  resolveOverlaps,
  synchronize,
  timeReferenceOnly,
} from "@/lib/sync"
import { type TranscriptSegment, flattenTranscript, transcriptToLines } from "@/lib/transcript"
import { Context, Effect, Layer } from "effect"
import { SyncConfig } from "./sync-config"

export type TimelineMethod = "synced" | "transcript-only" | "reference-only"

export interface Timeline {
  readonly method: TimelineMethod
  readonly lines: AlignedLine[]
  /** Present for synchronized timelines */
  readonly report?: SyncReport
}

export interface TimelineSources {
  readonly reference?: readonly ReferenceLine[] | null
  readonly transcript?: readonly TranscriptSegment[] | null
}

export class SyncService extends Context.Tag("SyncService")<
  SyncService,
  {
    readonly synchronize: (
      reference: readonly ReferenceLine[],
      recognized: readonly RecognizedWord[],
    ) => Effect.Effect<SyncResult>
    readonly resolveTimeline: (sources: TimelineSources) => Effect.Effect<Timeline, NoLyricsError>
  }
>() {}

export const SyncServiceLive = Layer.effect(
  SyncService,
  Effect.gen(function* () {
    const config = yield* SyncConfig

    const synchronizeLines = (
      reference: readonly ReferenceLine[],
      recognized: readonly RecognizedWord[],
    ) =>
      Effect.gen(function* () {
        if (recognized.length === 0) {
          yield* Effect.logWarning("No recognized words, spreading lines over nominal timing")
        }

        const result = synchronize(reference, recognized, config)
        const { offset } = result.report

        if (offset.applied) {
          yield* Effect.logInfo(`Applied global offset of ${offset.offset.toFixed(2)}s`).pipe(
            Effect.annotateLogs({ blockSize: offset.blockSize }),
          )
        } else if (offset.blockSize > 0) {
          yield* Effect.logDebug(
            `Global offset ${offset.offset.toFixed(2)}s within threshold, not applied`,
          )
        }

        if (result.report.unmatchedLines.length > 0) {
          yield* Effect.logDebug("Lines without any matched word").pipe(
            Effect.annotateLogs({ lines: result.report.unmatchedLines.join(",") }),
          )
        }

        yield* Effect.logInfo("Synchronization complete").pipe(
          Effect.annotateLogs({
            lines: result.lines.length,
            coverage: result.report.coverage.toFixed(1),
          }),
        )

        return result
      }).pipe(
        Effect.annotateLogs({
          referenceLines: reference.length,
          recognizedWords: recognized.length,
        }),
      )

    const resolveTimeline = (sources: TimelineSources) =>
      Effect.gen(function* () {
        const reference = sources.reference ?? []
        const transcript = sources.transcript ?? []

        if (reference.length > 0 && transcript.length > 0) {
          const result = yield* synchronizeLines(reference, flattenTranscript(transcript))
          const timeline: Timeline = {
            method: "synced",
            lines: result.lines,
            report: result.report,
          }
          return timeline
        }

        if (transcript.length > 0) {
          yield* Effect.logWarning("No reference lyrics, using transcript text (may be inaccurate)")
          const timeline: Timeline = {
            method: "transcript-only",
            lines: resolveOverlaps(transcriptToLines(transcript), config),
          }
          return timeline
        }

        if (reference.length > 0) {
          yield* Effect.logWarning("No transcript, using reference timing (may drift)")
          const timeline: Timeline = {
            method: "reference-only",
            lines: timeReferenceOnly(reference, config),
          }
          return timeline
        }

        return yield* Effect.fail(new NoLyricsError())
      })

    return {
      synchronize: synchronizeLines,
      resolveTimeline,
    }
  }),
)
