import type { FragmentFraming } from './budget'
import type { Fragment, TokenMeter } from './fragment'
import { fragmentCost, framingCost, NO_OVERHEAD } from './budget'
import { ConfigError } from './errors'
import { createFragment, orderFragments, sourcePath, subFragmentPath } from './fragment'

/**
 * Fragments dispatched together in one selector call
 */
export interface Group {
  readonly index: number
  readonly fragments: readonly Fragment[]
  /** Estimated request size: fixed tokens plus every member's cost */
  readonly tokens: number
}

export interface PartitionLimits extends FragmentFraming {
  /** Selector usable ceiling */
  ceiling: number
  /** Overview, question and per-call prompt overhead */
  fixedTokens: number
}

export interface Partition {
  groups: Group[]
  /** Pieces that cannot fit a call even alone; never dispatched */
  oversized: Fragment[]
}

export interface SplitResult {
  /** Pieces within `maxTokens`, in line order */
  pieces: Fragment[]
  /** Pieces that exceed `maxTokens` alone (single overlong lines) */
  oversized: Fragment[]
}

interface Line {
  text: string
  /** 1-based line number in the source file */
  number: number
  tokens: number
}

/**
 * Split a fragment by line ranges so that each piece costs at most
 * `maxTokens` (content plus framing, including the piece's own path when
 * `framing.countsPaths` is set). Per-line counts drive the greedy cut; each
 * piece is then re-measured as a whole and bisected when the counter
 * disagrees with the sum of its lines.
 */
export function splitFragment(
  fragment: Fragment,
  maxTokens: number,
  meter: TokenMeter,
  framing: FragmentFraming = NO_OVERHEAD,
): SplitResult {
  if (fragmentCost(fragment, meter, framing) <= maxTokens)
    return { pieces: [fragment], oversized: [] }

  const file = sourcePath(fragment)
  const firstLine = fragment.origin?.startLine ?? 1
  const lines: Line[] = fragment.content
    .split(/(?<=\n)/)
    .map((text, i) => ({ text, number: firstLine + i, tokens: meter.count(text) }))
  // No piece path is longer than the one naming the last line twice.
  const lastLine = firstLine + lines.length - 1
  const framingBound = framingCost(subFragmentPath(file, lastLine, lastLine), meter, framing)

  const result: SplitResult = { pieces: [], oversized: [] }
  const emit = (chunk: Line[]): void => {
    const first = chunk[0]
    const last = chunk[chunk.length - 1]
    if (!first || !last)
      return
    const content = chunk.map(l => l.text).join('')
    const tokens = meter.count(content)
    const piecePath = subFragmentPath(file, first.number, last.number)
    const cost = tokens + framingCost(piecePath, meter, framing)
    if (cost > maxTokens && chunk.length > 1) {
      const mid = Math.ceil(chunk.length / 2)
      emit(chunk.slice(0, mid))
      emit(chunk.slice(mid))
      return
    }
    const piece = createFragment({
      path: piecePath,
      content,
      tokenCount: tokens,
      origin: { path: file, startLine: first.number, endLine: last.number },
    })
    if (cost > maxTokens)
      result.oversized.push(piece)
    else
      result.pieces.push(piece)
  }

  let chunk: Line[] = []
  let chunkTokens = 0
  for (const line of lines) {
    if (chunk.length > 0 && chunkTokens + line.tokens + framingBound > maxTokens) {
      emit(chunk)
      chunk = []
      chunkTokens = 0
    }
    chunk.push(line)
    chunkTokens += line.tokens
  }
  emit(chunk)

  return result
}

/**
 * Pack candidates, in path order, into groups that each fit the selector
 * ceiling. Every candidate ends up in exactly one group, either whole or as
 * split pieces, or in `oversized`.
 */
export function partitionFragments(
  candidates: readonly Fragment[],
  meter: TokenMeter,
  limits: PartitionLimits,
): Partition {
  const room = limits.ceiling - limits.fixedTokens
  if (room <= limits.perFragment) {
    throw new ConfigError(
      `Selector ceiling ${limits.ceiling} leaves no room for content after ${limits.fixedTokens} fixed tokens`,
    )
  }

  const groups: Group[] = []
  const oversized: Fragment[] = []
  let current: Fragment[] = []
  let currentTokens = 0

  const close = (): void => {
    if (current.length === 0)
      return
    groups.push(Object.freeze({
      index: groups.length,
      fragments: Object.freeze(current),
      tokens: limits.fixedTokens + currentTokens,
    }))
    current = []
    currentTokens = 0
  }

  for (const candidate of orderFragments(candidates)) {
    const { pieces, oversized: tooBig } = splitFragment(candidate, room, meter, limits)
    oversized.push(...tooBig)
    for (const piece of pieces) {
      const cost = fragmentCost(piece, meter, limits)
      if (current.length > 0 && currentTokens + cost > room)
        close()
      current.push(piece)
      currentTokens += cost
    }
  }
  close()

  return { groups, oversized }
}
