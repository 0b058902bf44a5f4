import { DEFAULT_SYNC_CONFIG } from "@/lib/sync"
import { Effect, Exit, Layer, LogLevel, Logger } from "effect"
import { describe, expect, test } from "vitest"
import { AppLayer, makeAppLayer } from "../app-layer"
import { SyncConfigLive, makeSyncConfig, makeSyncConfigLayer } from "../sync-config"
import { SyncService, SyncServiceLive, type TimelineSources } from "../sync-service"

const QuietLayer = Logger.minimumLogLevel(LogLevel.None)

const TestLayer = Layer.mergeAll(SyncServiceLive.pipe(Layer.provide(SyncConfigLive)), QuietLayer)

const resolve = (
  sources: TimelineSources,
  layer: Layer.Layer<SyncService, unknown> = TestLayer,
) =>
  Effect.runPromise(
    Effect.gen(function* () {
      const sync = yield* SyncService
      return yield* sync.resolveTimeline(sources)
    }).pipe(Effect.provide(layer)),
  )

const reference = [
  { text: "hello world", nominalStart: 0 },
  { text: "goodbye now", nominalStart: 5 },
]

const transcript = [
  {
    text: "hello world",
    start: 0.1,
    end: 0.9,
    words: [
      { word: "hello", start: 0.1, end: 0.4 },
      { word: "world", start: 0.4, end: 0.9 },
    ],
  },
  {
    text: "goodbye now",
    start: 5.2,
    end: 6.0,
    words: [
      { word: "goodbye", start: 5.2, end: 5.6 },
      { word: "now", start: 5.6, end: 6.0 },
    ],
  },
]

describe("makeSyncConfig", () => {
  test("returns the defaults without overrides", async () => {
    const config = await Effect.runPromise(makeSyncConfig())
    expect(config).toEqual(DEFAULT_SYNC_CONFIG)
  })

  test("merges overrides onto the defaults", async () => {
    const config = await Effect.runPromise(makeSyncConfig({ minLineDuration: 2, windowMargin: 0 }))
    expect(config).toEqual({ ...DEFAULT_SYNC_CONFIG, minLineDuration: 2, windowMargin: 0 })
  })

  test("rejects negative values", async () => {
    const error = await Effect.runPromise(Effect.flip(makeSyncConfig({ windowMargin: -1 })))
    expect(error._tag).toBe("InvalidSyncConfigError")
    expect(error.key).toBe("windowMargin")
    expect(error.value).toBe(-1)
    expect(error.message).toBe("must be a finite, non-negative number")
  })

  test("rejects non-finite values", async () => {
    const error = await Effect.runPromise(
      Effect.flip(makeSyncConfig({ defaultLineGap: Number.NaN })),
    )
    expect(error.key).toBe("defaultLineGap")
  })

  test("rejects a fractional token length", async () => {
    const error = await Effect.runPromise(Effect.flip(makeSyncConfig({ minTokenLength: 2.5 })))
    expect(error.key).toBe("minTokenLength")
    expect(error.message).toBe("must be an integer")
  })

  test("rejects a zero minimum line duration", async () => {
    const error = await Effect.runPromise(Effect.flip(makeSyncConfig({ minLineDuration: 0 })))
    expect(error.key).toBe("minLineDuration")
    expect(error.message).toBe("must be greater than zero")
  })
})

describe("SyncService.resolveTimeline", () => {
  test("synchronizes when both sources are present", async () => {
    const timeline = await resolve({ reference, transcript })

    expect(timeline.method).toBe("synced")
    expect(timeline.report?.anchoredWords).toBe(4)
    expect(timeline.report?.coverage).toBe(100)
    expect(timeline.lines[0]?.start).toBe(0.1)
    expect(timeline.lines[1]?.start).toBe(5.2)
  })

  test("uses the transcript when there is no reference", async () => {
    const timeline = await resolve({
      reference: null,
      transcript: [
        {
          text: "Hi there",
          start: 0,
          end: 0.5,
          words: [
            { word: "Hi", start: 0, end: 0.2 },
            { word: "there", start: 0.2, end: 0.5 },
          ],
        },
        { text: "Again", start: 0.4, end: 1.0 },
      ],
    })

    expect(timeline.method).toBe("transcript-only")
    expect(timeline.report).toBeUndefined()
    expect(timeline.lines.map(l => l.text)).toEqual(["Hi there", "Again"])
    expect(timeline.lines[0]?.start).toBe(0)
    expect(timeline.lines[0]?.end).toBe(1.2)
    expect(timeline.lines[1]?.start).toBe(1.2)
    expect(timeline.lines[1]?.end).toBeCloseTo(2.4)
    expect(timeline.lines[1]?.words[0]?.start).toBe(1.2)
  })

  test("spreads reference lines when there is no transcript", async () => {
    const timeline = await resolve({ reference: [{ text: "one two three", nominalStart: 2 }] })

    expect(timeline.method).toBe("reference-only")
    expect(timeline.lines[0]?.words.map(w => [w.start, w.end])).toEqual([
      [2, 3],
      [3, 4],
      [4, 5],
    ])
  })

  test("treats an empty transcript as missing", async () => {
    const timeline = await resolve({ reference, transcript: [] })

    expect(timeline.method).toBe("reference-only")
  })

  test("fails with NoLyricsError when both sources are missing", async () => {
    const error = await Effect.runPromise(
      Effect.flip(
        Effect.flatMap(SyncService, sync =>
          sync.resolveTimeline({ reference: [], transcript: null }),
        ).pipe(Effect.provide(TestLayer)),
      ),
    )

    expect(error._tag).toBe("NoLyricsError")
  })

  test("uses configured constants", async () => {
    const layer = Layer.mergeAll(
      SyncServiceLive.pipe(Layer.provide(makeSyncConfigLayer({ minLineDuration: 2 }))),
      QuietLayer,
    )

    const timeline = await resolve({ reference, transcript }, layer)

    expect(timeline.lines[0]?.end).toBeCloseTo(2.1)
    expect(timeline.lines[1]?.end).toBeCloseTo(7.2)
  })

  test("fails to build with invalid configuration", async () => {
    const layer = Layer.mergeAll(
      SyncServiceLive.pipe(Layer.provide(makeSyncConfigLayer({ minGapDuration: -0.5 }))),
      QuietLayer,
    )

    const exit = await Effect.runPromiseExit(
      Effect.flatMap(SyncService, sync => sync.resolveTimeline({ reference })).pipe(
        Effect.provide(layer),
      ),
    )

    expect(Exit.isFailure(exit)).toBe(true)
  })
})

describe("SyncService.synchronize", () => {
  test("returns the engine result", async () => {
    const result = await Effect.runPromise(
      Effect.flatMap(SyncService, sync => sync.synchronize(reference, [])).pipe(
        Effect.provide(TestLayer),
      ),
    )

    expect(result.report.unmatchedLines).toEqual([0, 1])
    expect(result.lines[0]?.words.map(w => [w.start, w.end])).toEqual([
      [0, 2.5],
      [2.5, 5],
    ])
  })
})

describe("AppLayer", () => {
  test("provides a working service with default settings", async () => {
    const timeline = await resolve({ reference, transcript }, AppLayer)

    expect(timeline.method).toBe("synced")
    expect(timeline.lines).toHaveLength(2)
  })

  test("applies sync overrides and config entries", async () => {
    const layer = makeAppLayer({ sync: { minLineDuration: 2 }, config: { LOG_LEVEL: "off" } })

    const timeline = await resolve({ reference, transcript }, layer)

    expect(timeline.lines[0]?.end).toBeCloseTo(2.1)
  })
})
