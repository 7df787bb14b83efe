import type { TokenCounter } from '@reposieve/utils/token-counter'
import { Buffer } from 'node:buffer'
import { normalizeTokenCounter } from '@reposieve/utils/token-counter'

/**
 * Line range of a sub-fragment inside its source file (1-based, inclusive).
 */
export interface FragmentOrigin {
  path: string
  startLine: number
  endLine: number
}

/**
 * A piece of repository content. `path` is the identity; sub-fragments cut
 * from a larger file use `<file>#L<start>-L<end>`.
 */
export interface Fragment {
  readonly path: string
  readonly content: string
  readonly byteLength: number
  /** Precomputed token count, trusted as-is when present */
  readonly tokenCount?: number
  readonly origin?: Readonly<FragmentOrigin>
}

export interface FragmentInit {
  path: string
  content: string
  byteLength?: number
  tokenCount?: number
  origin?: FragmentOrigin
}

export function createFragment(init: FragmentInit): Fragment {
  return Object.freeze({
    path: init.path,
    content: init.content,
    byteLength: init.byteLength ?? Buffer.byteLength(init.content, 'utf8'),
    ...(init.tokenCount !== undefined && { tokenCount: init.tokenCount }),
    ...(init.origin && { origin: Object.freeze({ ...init.origin }) }),
  })
}

export function subFragmentPath(path: string, startLine: number, endLine: number): string {
  return `${path}#L${startLine}-L${endLine}`
}

/** Path of the file a fragment was read from. */
export function sourcePath(fragment: Fragment): string {
  return fragment.origin?.path ?? fragment.path
}

function compareStrings(a: string, b: string): number {
  if (a < b)
    return -1
  return a > b ? 1 : 0
}

/**
 * Path order: by source file, then by line range, then by identity.
 * Uses code-unit comparison so the order never depends on locale.
 */
export function compareFragments(a: Fragment, b: Fragment): number {
  return compareStrings(sourcePath(a), sourcePath(b))
    || (a.origin?.startLine ?? 0) - (b.origin?.startLine ?? 0)
    || compareStrings(a.path, b.path)
}

export function orderFragments(fragments: readonly Fragment[]): Fragment[] {
  return [...fragments].sort(compareFragments)
}

/**
 * Memoizing front for a TokenCounter. One meter belongs to one run; a
 * fragment's count is computed at most once.
 */
export class TokenMeter {
  private readonly counter: TokenCounter
  private readonly cache = new WeakMap<Fragment, number>()

  constructor(counter: TokenCounter) {
    this.counter = normalizeTokenCounter(counter)
  }

  count(text: string): number {
    return this.counter.count(text)
  }

  measure(fragment: Fragment): number {
    if (fragment.tokenCount !== undefined)
      return fragment.tokenCount
    const cached = this.cache.get(fragment)
    if (cached !== undefined)
      return cached
    const tokens = this.counter.count(fragment.content)
    this.cache.set(fragment, tokens)
    return tokens
  }
}
