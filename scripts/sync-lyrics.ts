#!/usr/bin/env tsx
/**
 * CLI script to synchronize LRC lyrics with a speech recognition transcript.
 *
 * Usage:
 *   tsx scripts/sync-lyrics.ts --lyrics <file.lrc> --transcript <file.json> [options]
 *
 * Example:
 *   tsx scripts/sync-lyrics.ts --lyrics ./song.lrc --transcript ./song.whisper.json --format srt
 *
 * This script:
 * 1. Reads and parses the LRC lyrics (correct text, line timing)
 * 2. Reads and validates the transcript JSON (word timing)
 * 3. Synchronizes them, or falls back to whichever source is present
 * 4. Prints the timeline to stdout; logs go to stderr
 */

import { readFile } from "node:fs/promises"
import { Console, Effect } from "effect"
import { type CliOptions, USAGE, parseCliArgs } from "../src/lib/cli-args"
import { InputReadError } from "../src/lib/errors"
import { parseLRC } from "../src/lib/lyrics-parser"
import { generateEnhancedLrc, generateLrc, generateSrt } from "../src/lib/sync"
import { parseTranscript } from "../src/lib/transcript"
import { makeAppLayer } from "../src/services/app-layer"
import { SyncService, type Timeline } from "../src/services/sync-service"

const readText = (file: string) =>
  Effect.tryPromise({
    try: () => readFile(file, "utf-8"),
    catch: cause => new InputReadError({ file, cause }),
  })

const readJson = (file: string) =>
  readText(file).pipe(
    Effect.flatMap(content =>
      Effect.try({
        try: (): unknown => JSON.parse(content),
        catch: cause => new InputReadError({ file, cause }),
      }),
    ),
  )

function render(timeline: Timeline, format: CliOptions["format"]): string {
  switch (format) {
    case "enhanced":
      return generateEnhancedLrc(timeline.lines)
    case "lrc":
      return generateLrc(timeline.lines)
    case "srt":
      return generateSrt(timeline.lines)
    case "json":
      return JSON.stringify(
        {
          method: timeline.method,
          report: timeline.report,
          lines: timeline.lines.map(line => ({
            text: line.text,
            start: line.start,
            end: line.end,
            words: line.words.map(w => ({ text: w.surfaceText, start: w.start, end: w.end })),
          })),
        },
        null,
        2,
      )
  }
}

const run = (options: CliOptions) =>
  Effect.gen(function* () {
    const reference = options.lyricsPath
      ? parseLRC(yield* readText(options.lyricsPath)).lines
      : null
    const transcript = options.transcriptPath
      ? yield* parseTranscript(yield* readJson(options.transcriptPath))
      : null

    const sync = yield* SyncService
    const timeline = yield* sync.resolveTimeline({ reference, transcript })

    yield* Effect.logInfo(`Timeline built (${timeline.method})`)
    yield* Console.log(render(timeline, options.format))
  }).pipe(
    Effect.provide(
      makeAppLayer({ sync: options.sync, config: { LOG_LEVEL: options.logLevel } }),
    ),
  )

const program = parseCliArgs(process.argv.slice(2)).pipe(
  Effect.flatMap(run),
  Effect.catchAll(error =>
    Effect.gen(function* () {
      switch (error._tag) {
        case "UsageError":
          yield* Console.error(`${error.message}\n\n${USAGE}`)
          break
        case "InputReadError":
          yield* Console.error(`Could not read ${error.file}: ${String(error.cause)}`)
          break
        case "TranscriptParseError":
          yield* Console.error(`Invalid transcript at ${error.path}: ${error.message}`)
          break
        case "InvalidSyncConfigError":
          yield* Console.error(`Invalid setting ${error.key}=${error.value}: ${error.message}`)
          break
        case "NoLyricsError":
          yield* Console.error("No lyrics found in the given inputs")
          break
        default:
          yield* Console.error(`Configuration error: ${String(error)}`)
      }
      process.exitCode = 1
    }),
  ),
)

Effect.runPromise(program).catch((error: unknown) => {
  console.error("Unexpected failure:", error)
  process.exitCode = 1
})
