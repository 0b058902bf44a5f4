/**
 * Sequence matcher over token arrays.
 *
 * Finds the longest contiguous matching block between two sequences and,
 * recursively, the full set of matching blocks and the edit opcodes that turn
 * `a` into `b`. Used both for the song-wide drift estimate and for the
 * per-line word alignment.
 */

export interface MatchBlock {
  /** Start index in `a` */
  readonly a: number
  /** Start index in `b` */
  readonly b: number
  readonly size: number
}

export type OpcodeTag = "equal" | "replace" | "delete" | "insert"

export interface Opcode {
  readonly tag: OpcodeTag
  readonly aStart: number
  readonly aEnd: number
  readonly bStart: number
  readonly bEnd: number
}

export interface SequenceMatcherOptions {
  /**
   * Skip elements that make up more than 1% of a long `b` (200+ entries) when
   * seeding matches. Defaults to true.
   */
  readonly autoJunk?: boolean
}

const AUTO_JUNK_MIN_LENGTH = 200

export class SequenceMatcher {
  private readonly b2j = new Map<string, number[]>()
  private matchingBlocks: MatchBlock[] | null = null
  private opcodes: Opcode[] | null = null

  constructor(
    private readonly a: readonly string[],
    private readonly b: readonly string[],
    options: SequenceMatcherOptions = {},
  ) {
    b.forEach((elt, j) => {
      const indices = this.b2j.get(elt)
      if (indices) {
        indices.push(j)
      } else {
        this.b2j.set(elt, [j])
      }
    })

    const autoJunk = options.autoJunk ?? true
    if (autoJunk && b.length >= AUTO_JUNK_MIN_LENGTH) {
      const limit = Math.floor(b.length / 100) + 1
      for (const [elt, indices] of [...this.b2j]) {
        if (indices.length > limit) this.b2j.delete(elt)
      }
    }
  }

  /**
   * Longest block with `a[i..i+size) == b[j..j+size)` inside the given bounds.
   *
   * Ties go to the block starting earliest in `a`, then earliest in `b`.
   * Returns a block of size 0 at `(alo, blo)` when nothing matches.
   */
  findLongestMatch(
    alo = 0,
    ahi: number = this.a.length,
    blo = 0,
    bhi: number = this.b.length,
  ): MatchBlock {
    const { a, b } = this
    let bestI = alo
    let bestJ = blo
    let bestSize = 0

    // j2len.get(j) = length of the match ending at a[i-1], b[j]
    let j2len = new Map<number, number>()
    for (let i = alo; i < ahi; i++) {
      const next = new Map<number, number>()
      const ai = a[i]
      const indices = ai === undefined ? undefined : this.b2j.get(ai)
      for (const j of indices ?? []) {
        if (j < blo) continue
        if (j >= bhi) break
        const k = (j2len.get(j - 1) ?? 0) + 1
        next.set(j, k)
        if (k > bestSize) {
          bestI = i - k + 1
          bestJ = j - k + 1
          bestSize = k
        }
      }
      j2len = next
    }

    // Popular elements never seed a match but may still extend one
    while (bestI > alo && bestJ > blo && a[bestI - 1] === b[bestJ - 1]) {
      bestI--
      bestJ--
      bestSize++
    }
    while (
      bestI + bestSize < ahi &&
      bestJ + bestSize < bhi &&
      a[bestI + bestSize] === b[bestJ + bestSize]
    ) {
      bestSize++
    }

    return { a: bestI, b: bestJ, size: bestSize }
  }

  /**
   * Non-overlapping matching blocks in increasing order, adjacent blocks
   * merged, terminated by a `{ a: a.length, b: b.length, size: 0 }` sentinel.
   */
  getMatchingBlocks(): readonly MatchBlock[] {
    if (this.matchingBlocks) return this.matchingBlocks

    const la = this.a.length
    const lb = this.b.length
    const queue: Array<[number, number, number, number]> = [[0, la, 0, lb]]
    const found: MatchBlock[] = []

    while (queue.length > 0) {
      const bounds = queue.pop()
      if (!bounds) break
      const [alo, ahi, blo, bhi] = bounds
      const match = this.findLongestMatch(alo, ahi, blo, bhi)
      if (match.size === 0) continue

      found.push(match)
      if (alo < match.a && blo < match.b) {
        queue.push([alo, match.a, blo, match.b])
      }
      if (match.a + match.size < ahi && match.b + match.size < bhi) {
        queue.push([match.a + match.size, ahi, match.b + match.size, bhi])
      }
    }

    found.sort((x, y) => x.a - y.a || x.b - y.b)

    const merged: MatchBlock[] = []
    let current: MatchBlock = { a: 0, b: 0, size: 0 }
    for (const block of found) {
      if (current.a + current.size === block.a && current.b + current.size === block.b) {
        current = { a: current.a, b: current.b, size: current.size + block.size }
      } else {
        if (current.size > 0) merged.push(current)
        current = block
      }
    }
    if (current.size > 0) merged.push(current)
    merged.push({ a: la, b: lb, size: 0 })

    this.matchingBlocks = merged
    return merged
  }

  /**
   * Runs describing how to turn `a` into `b`. Consecutive opcodes are
   * contiguous and together cover both sequences completely.
   */
  getOpcodes(): readonly Opcode[] {
    if (this.opcodes) return this.opcodes

    const opcodes: Opcode[] = []
    let i = 0
    let j = 0

    for (const block of this.getMatchingBlocks()) {
      let tag: OpcodeTag | null = null
      if (i < block.a && j < block.b) tag = "replace"
      else if (i < block.a) tag = "delete"
      else if (j < block.b) tag = "insert"

      if (tag) {
        opcodes.push({ tag, aStart: i, aEnd: block.a, bStart: j, bEnd: block.b })
      }

      i = block.a + block.size
      j = block.b + block.size
      if (block.size > 0) {
        opcodes.push({ tag: "equal", aStart: block.a, aEnd: i, bStart: block.b, bEnd: j })
      }
    }

    this.opcodes = opcodes
    return opcodes
  }
}
