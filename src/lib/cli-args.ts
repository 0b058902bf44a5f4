/**
 * Argument parsing for the sync-lyrics CLI.
 */

import type { SyncConfigValues } from "@/lib/sync"
import { Data, Effect } from "effect"

export type OutputFormat = "enhanced" | "lrc" | "srt" | "json"

const OUTPUT_FORMATS: readonly OutputFormat[] = ["enhanced", "lrc", "srt", "json"]

export interface CliOptions {
  readonly lyricsPath?: string
  readonly transcriptPath?: string
  readonly format: OutputFormat
  readonly logLevel?: string
  readonly sync: Partial<SyncConfigValues>
}

export class UsageError extends Data.TaggedClass("UsageError")<{
  readonly message: string
}> {}

const NUMERIC_FLAGS = {
  "--min-line-duration": "minLineDuration",
  "--offset-threshold": "globalOffsetThreshold",
  "--window-margin": "windowMargin",
  "--min-token-length": "minTokenLength",
  "--default-line-gap": "defaultLineGap",
  "--last-line-duration": "lastLineDuration",
  "--min-gap": "minGapDuration",
} as const satisfies Record<string, keyof SyncConfigValues>

type NumericFlag = keyof typeof NUMERIC_FLAGS

const isNumericFlag = (flag: string): flag is NumericFlag => Object.hasOwn(NUMERIC_FLAGS, flag)

const isOutputFormat = (value: string): value is OutputFormat =>
  OUTPUT_FORMATS.some(format => format === value)

export const USAGE = `Usage: sync-lyrics [--lyrics <file.lrc>] [--transcript <file.json>] [options]

Options:
  --format <enhanced|lrc|srt|json>  Output format (default: enhanced)
  --log-level <level>               debug, info, warn, error or none
  --min-line-duration <seconds>     Shortest time a line stays visible
  --offset-threshold <seconds>      Smallest global offset that gets applied
  --window-margin <seconds>         Slack around each line's search window
  --min-token-length <chars>        Shortest token used for the global offset
  --default-line-gap <seconds>      Window span assumed for the last line
  --last-line-duration <seconds>    Interpolation span assumed for the last line
  --min-gap <seconds>               Smallest interpolation gap`

/**
 * Parse CLI arguments (without the node and script entries).
 */
export const parseCliArgs = (argv: readonly string[]): Effect.Effect<CliOptions, UsageError> =>
  Effect.gen(function* () {
    let lyricsPath: string | undefined
    let transcriptPath: string | undefined
    let format: OutputFormat = "enhanced"
    let logLevel: string | undefined
    const sync: Partial<Record<keyof SyncConfigValues, number>> = {}

    for (let i = 0; i < argv.length; i++) {
      const flag = argv[i]
      if (flag === undefined) continue

      const value = argv[i + 1]
      if (value === undefined) {
        return yield* Effect.fail(new UsageError({ message: `Missing value for ${flag}` }))
      }
      i++

      if (flag === "--lyrics") {
        lyricsPath = value
      } else if (flag === "--transcript") {
        transcriptPath = value
      } else if (flag === "--format") {
        if (!isOutputFormat(value)) {
          return yield* Effect.fail(new UsageError({ message: `Unknown format: ${value}` }))
        }
        format = value
      } else if (flag === "--log-level") {
        logLevel = value === "none" ? "off" : value
      } else if (isNumericFlag(flag)) {
        const parsed = Number(value)
        if (value.trim() === "" || !Number.isFinite(parsed)) {
          return yield* Effect.fail(
            new UsageError({ message: `${flag} expects a number, got ${value}` }),
          )
        }
        sync[NUMERIC_FLAGS[flag]] = parsed
      } else {
        return yield* Effect.fail(new UsageError({ message: `Unknown option: ${flag}` }))
      }
    }

    if (!lyricsPath && !transcriptPath) {
      return yield* Effect.fail(
        new UsageError({ message: "At least one of --lyrics or --transcript is required" }),
      )
    }

    return { lyricsPath, transcriptPath, format, logLevel, sync }
  })
