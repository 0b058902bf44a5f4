import { describe, expect, it } from "vitest"
import { clampWordsToLine, resolveOverlaps } from "./resolve-overlaps"
import type { AlignedLine, AlignedWord } from "./types"

const w = (surfaceText: string, start: number, end: number): AlignedWord => ({
  surfaceText,
  start,
  end,
  matched: true,
})

const line = (start: number, end: number, words: AlignedWord[] = []): AlignedLine => ({
  text: words.map(word => word.surfaceText).join(" "),
  start,
  end,
  words,
})

describe("resolveOverlaps", () => {
  it("extends short lines to the minimum duration", () => {
    const lines = resolveOverlaps([line(0, 0.5, [w("hi", 0, 0.5)]), line(5, 7)])

    expect(lines[0]?.start).toBe(0)
    expect(lines[0]?.end).toBe(1.2)
    expect(lines[0]?.words[0]).toEqual(w("hi", 0, 0.5))
    expect(lines[1]?.start).toBe(5)
    expect(lines[1]?.end).toBe(7)
  })

  it("pushes an overlapping line to start where the previous one ends", () => {
    const lines = resolveOverlaps([
      line(0, 2, [w("first", 0, 2)]),
      line(1.5, 3, [w("a", 1.5, 2), w("b", 2, 3)]),
    ])

    expect(lines[1]?.start).toBe(2)
    expect(lines[1]?.end).toBeCloseTo(3.2)
    expect(lines[1]?.words).toEqual([w("a", 2, 2), w("b", 2, 3)])
  })

  it("cascades pushes through a cluster of lines", () => {
    const lines = resolveOverlaps([
      line(0, 2.0, [w("one", 0, 2.0)]),
      line(0.5, 2.5, [w("two", 0.5, 2.5)]),
      line(0.6, 3.0, [w("three", 0.6, 3.0)]),
    ])

    expect(lines[0]?.start).toBe(0)
    expect(lines[0]?.end).toBe(2)
    expect(lines[1]?.start).toBe(2)
    expect(lines[1]?.end).toBeCloseTo(3.2)
    expect(lines[2]?.start).toBeCloseTo(3.2)
    expect(lines[2]?.end).toBeCloseTo(4.4)
    expect(lines[2]?.words[0]?.start).toBeCloseTo(3.2)
    expect(lines[2]?.words[0]?.end).toBeCloseTo(3.2)
  })

  it("extends the last line to the minimum duration", () => {
    const lines = resolveOverlaps([line(3, 3.5)])

    expect(lines[0]?.end).toBeCloseTo(4.2)
  })

  it("returns the same array", () => {
    const input = [line(0, 1)]

    expect(resolveOverlaps(input)).toBe(input)
  })

  it("handles an empty timeline", () => {
    expect(resolveOverlaps([])).toEqual([])
  })
})

describe("clampWordsToLine", () => {
  it("keeps words inside the line with start before end", () => {
    const target = line(1, 2, [w("early", 0.5, 0.8), w("late", 1.5, 2.5), w("ok", 1.2, 1.4)])

    clampWordsToLine(target)

    expect(target.words).toEqual([w("early", 1, 1), w("late", 1.5, 2), w("ok", 1.2, 1.4)])
  })
})
