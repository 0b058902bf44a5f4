/**
 * LRC lyrics file parser
 *
 * Parses line-timed LRC content into reference lines for synchronization.
 * Reference: https://en.wikipedia.org/wiki/LRC_(file_format)
 */

import type { ReferenceLine } from "@/lib/sync"

/**
 * LRC metadata that can be extracted from the file
 */
export interface LRCMetadata {
  readonly title?: string
  readonly artist?: string
  readonly album?: string
  readonly length?: string
  /** Milliseconds; positive values make the lyrics appear earlier */
  readonly offsetMs?: number
}

export interface ParsedLRC {
  readonly metadata: LRCMetadata
  readonly lines: ReferenceLine[]
}

/**
 * Parse a timestamp string [mm:ss.xx] to seconds
 */
export function parseTimestamp(timestamp: string): number {
  const match = timestamp.match(/\[(\d+):(\d+)(?:\.(\d+))?\]/)
  if (!match) return 0

  const minutes = Number.parseInt(match[1] ?? "0", 10)
  const seconds = Number.parseInt(match[2] ?? "0", 10)
  const millis = Number.parseInt((match[3] ?? "0").padEnd(3, "0").slice(0, 3), 10)

  return (minutes * 60000 + seconds * 1000 + millis) / 1000
}

/**
 * Parse LRC content into reference lines ordered by start time.
 *
 * Lines carrying several timestamps produce one reference line per timestamp.
 * Timestamped lines without text (instrumental breaks) are skipped.
 */
export function parseLRC(content: string): ParsedLRC {
  const metadata: {
    title?: string
    artist?: string
    album?: string
    length?: string
    offsetMs?: number
  } = {}
  const lyricLines: Array<{ time: number; text: string }> = []

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim()
    if (!trimmed) continue

    // Parse metadata tags
    const metaMatch = trimmed.match(/^\[(\w+):(.+)\]$/)
    if (metaMatch && !trimmed.match(/^\[\d+:\d+/)) {
      const [, tag, value] = metaMatch
      if (tag && value) {
        switch (tag.toLowerCase()) {
          case "ti":
            metadata.title = value.trim()
            break
          case "ar":
            metadata.artist = value.trim()
            break
          case "al":
            metadata.album = value.trim()
            break
          case "length":
            metadata.length = value.trim()
            break
          case "offset": {
            const offsetMs = Number.parseInt(value.trim(), 10)
            if (Number.isFinite(offsetMs)) metadata.offsetMs = offsetMs
            break
          }
        }
      }
      continue
    }

    // Format: [mm:ss.xx]text or [mm:ss.xx][mm:ss.xx]text (multiple timestamps)
    const timestampRegex = /\[(\d+:\d+(?:\.\d+)?)\]/g
    const timestamps: number[] = []
    let match: RegExpExecArray | null
    let lastIndex = 0

    while ((match = timestampRegex.exec(trimmed)) !== null) {
      if (match.index !== lastIndex) break
      timestamps.push(parseTimestamp(match[0]))
      lastIndex = match.index + match[0].length
    }

    const text = trimmed.slice(lastIndex).trim()
    if (timestamps.length === 0 || !text) continue

    for (const time of timestamps) {
      lyricLines.push({ time, text })
    }
  }

  lyricLines.sort((a, b) => a.time - b.time)

  const shift = (metadata.offsetMs ?? 0) / 1000
  return {
    metadata,
    lines: lyricLines.map(({ time, text }) => ({
      text,
      nominalStart: Math.max(0, time - shift),
    })),
  }
}

/**
 * Format seconds to LRC timestamp format [mm:ss.xx]
 */
export function formatTimestamp(seconds: number): string {
  const totalCentis = Math.round(seconds * 100)
  const mins = Math.floor(totalCentis / 6000)
  const secs = Math.floor((totalCentis % 6000) / 100)
  const pad = (n: number) => n.toString().padStart(2, "0")
  return `[${pad(mins)}:${pad(secs)}.${pad(totalCentis % 100)}]`
}
