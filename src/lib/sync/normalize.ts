/**
 * Token normalization shared by reference lyrics and recognized words.
 */

/**
 * Normalize a token for comparison: lowercase, then drop everything that is
 * not a letter or a number. May return an empty string.
 */
export function normalizeToken(s: string): string {
  return s.toLowerCase().replace(/[^\p{L}\p{N}]/gu, "")
}

/**
 * Split a lyric line into its surface words.
 */
export function tokenizeLine(text: string): string[] {
  return text.split(/\s+/).filter(word => word.length > 0)
}
