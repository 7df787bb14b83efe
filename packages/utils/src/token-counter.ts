import type { Tiktoken, TiktokenEncoding } from 'js-tiktoken'
import { getEncoding } from 'js-tiktoken'

/**
 * Counts tokens in a piece of text.
 *
 * Implementations must be side-effect free and roughly monotonic in the
 * text length; exact tokenization is not required because every budget
 * carries headroom.
 */
export interface TokenCounter {
  count: (text: string) => number
}

/** Characters per token for the default estimate. */
export const CHARS_PER_TOKEN = 4

/**
 * Estimate token count as `ceil(length / 4)`.
 */
export function estimateTokenCount(text: string): number {
  if (!text)
    return 0
  return Math.ceil(text.length / CHARS_PER_TOKEN)
}

export const estimatingTokenCounter: TokenCounter = {
  count: estimateTokenCount,
}

/**
 * Counts BPE tokens with a tiktoken encoding (default: cl100k_base). Text
 * that spells a special token, such as `<|endoftext|>`, counts as ordinary
 * text. The encoding is built on first use.
 */
export function tiktokenCounter(encoding: TiktokenEncoding = 'cl100k_base'): TokenCounter {
  let encoder: Tiktoken | undefined
  return {
    count: (text: string) => {
      if (!text)
        return 0
      encoder ??= getEncoding(encoding)
      return encoder.encode(text, [], []).length
    },
  }
}

/**
 * Wrap a counter so that a misbehaving implementation can never yield a
 * negative or fractional count.
 */
export function normalizeTokenCounter(counter: TokenCounter): TokenCounter {
  return {
    count: (text: string) => {
      const n = counter.count(text)
      if (!Number.isFinite(n) || n < 0)
        throw new RangeError(`Token counter returned an invalid count: ${n}`)
      return Math.ceil(n)
    },
  }
}
