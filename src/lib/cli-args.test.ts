import { Effect } from "effect"
import { describe, expect, it } from "vitest"
import { parseCliArgs } from "./cli-args"

const parse = (argv: string[]) => Effect.runSync(parseCliArgs(argv))
const usageError = (argv: string[]) => Effect.runSync(Effect.flip(parseCliArgs(argv)))

describe("parseCliArgs", () => {
  it("reads both inputs and defaults to enhanced output", () => {
    expect(parse(["--lyrics", "song.lrc", "--transcript", "song.json"])).toEqual({
      lyricsPath: "song.lrc",
      transcriptPath: "song.json",
      format: "enhanced",
      logLevel: undefined,
      sync: {},
    })
  })

  it("reads format and engine overrides", () => {
    const options = parse([
      "--transcript",
      "song.json",
      "--format",
      "srt",
      "--min-line-duration",
      "2",
      "--min-token-length",
      "4",
    ])

    expect(options.format).toBe("srt")
    expect(options.lyricsPath).toBeUndefined()
    expect(options.sync).toEqual({ minLineDuration: 2, minTokenLength: 4 })
  })

  it("maps log level none to off", () => {
    expect(parse(["--lyrics", "a.lrc", "--log-level", "none"]).logLevel).toBe("off")
    expect(parse(["--lyrics", "a.lrc", "--log-level", "debug"]).logLevel).toBe("debug")
  })

  it("requires at least one input", () => {
    expect(usageError(["--format", "lrc"]).message).toBe(
      "At least one of --lyrics or --transcript is required",
    )
  })

  it("rejects an unknown format", () => {
    expect(usageError(["--lyrics", "a.lrc", "--format", "vtt"]).message).toBe(
      "Unknown format: vtt",
    )
  })

  it("rejects an unknown option", () => {
    expect(usageError(["--lyrics", "a.lrc", "--speed", "2"]).message).toBe(
      "Unknown option: --speed",
    )
  })

  it("rejects a flag without a value", () => {
    expect(usageError(["--lyrics"]).message).toBe("Missing value for --lyrics")
  })

  it("rejects a non-numeric engine value", () => {
    expect(usageError(["--lyrics", "a.lrc", "--window-margin", "wide"]).message).toBe(
      "--window-margin expects a number, got wide",
    )
  })
})
