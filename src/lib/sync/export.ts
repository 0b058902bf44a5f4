/**
 * Caption export for synchronized lines.
 *
 * Renders aligned lines as plain LRC, Enhanced LRC (word-level timing) or SRT.
 */

import type { AlignedLine } from "./types"

const pad = (value: number, length = 2) => value.toString().padStart(length, "0")

/**
 * Format seconds as mm:ss.xx
 */
export function formatLrcTime(seconds: number): string {
  const totalCentis = Math.max(0, Math.round(seconds * 100))
  const minutes = Math.floor(totalCentis / 6000)
  const secs = Math.floor((totalCentis % 6000) / 100)
  return `${pad(minutes)}:${pad(secs)}.${pad(totalCentis % 100)}`
}

/**
 * Format seconds as HH:MM:SS,mmm
 */
export function formatSrtTime(seconds: number): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000))
  const hours = Math.floor(totalMs / 3600000)
  const minutes = Math.floor((totalMs % 3600000) / 60000)
  const secs = Math.floor((totalMs % 60000) / 1000)
  return `${pad(hours)}:${pad(minutes)}:${pad(secs)},${pad(totalMs % 1000, 3)}`
}

/**
 * Line-level LRC: one `[mm:ss.xx] text` entry per line.
 */
export function generateLrc(lines: readonly AlignedLine[]): string {
  return lines.map(line => `[${formatLrcTime(line.start)}] ${line.text}`).join("\n")
}

/**
 * Generate Enhanced LRC format with word-level timing.
 *
 * Format: [mm:ss.xx] word1 <mm:ss.xx>word2 <mm:ss.xx>word3 ...
 * The first word's timestamp is left out when it renders the same as the
 * line's. Lines without words fall back to their text.
 */
export function generateEnhancedLrc(lines: readonly AlignedLine[]): string {
  return lines
    .map(line => {
      const lineStamp = formatLrcTime(line.start)
      if (line.words.length === 0) return `[${lineStamp}] ${line.text}`

      const words = line.words.map((word, i) => {
        const wordStamp = formatLrcTime(word.start)
        return i === 0 && wordStamp === lineStamp
          ? word.surfaceText
          : `<${wordStamp}>${word.surfaceText}`
      })
      return `[${lineStamp}] ${words.join(" ")}`
    })
    .join("\n")
}

/**
 * SRT subtitles: numbered cues spanning each line's start and end.
 */
export function generateSrt(lines: readonly AlignedLine[]): string {
  return lines
    .map(
      (line, index) =>
        `${index + 1}\n${formatSrtTime(line.start)} --> ${formatSrtTime(line.end)}\n${line.text}\n`,
    )
    .join("\n")
}
