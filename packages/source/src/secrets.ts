import path from 'node:path'
import { globMatch } from './discover'

/** Basename globs of files that usually hold credentials */
export const SECRET_GLOBS = [
  '.env*',
  '*.pem',
  'id_rsa*',
  'secrets.*',
  '*.key',
  '*.p12',
  '*.keystore',
] as const

/** Path fragments of cloud credential stores */
const CREDENTIAL_STORES = ['aws/credentials', 'gcp/', 'gcloud/'] as const

export const REDACTION_MARKER = '‹REDACTED›'

export interface EntropyOptions {
  /** Shortest token considered (default: 20) */
  minLength?: number
  /** Bits per character at or above which a token is redacted (default: 3.7) */
  threshold?: number
}

/**
 * Whether a repository path names a credential file that must never reach a model.
 */
export function isSecretPath(filePath: string): boolean {
  const posix = filePath.replaceAll('\\', '/')
  const base = path.posix.basename(posix)
  if (SECRET_GLOBS.some(pattern => globMatch(base, pattern)))
    return true
  const lower = posix.toLowerCase()
  return CREDENTIAL_STORES.some(store => lower.includes(store))
}

/**
 * Shannon entropy of `text` in bits per character.
 */
export function shannonEntropy(text: string): number {
  const chars = [...text]
  if (chars.length === 0)
    return 0
  const freq = new Map<string, number>()
  for (const ch of chars)
    freq.set(ch, (freq.get(ch) ?? 0) + 1)
  let entropy = 0
  for (const count of freq.values()) {
    const p = count / chars.length
    entropy -= p * Math.log2(p)
  }
  return entropy
}

const TOKEN_CHARS = /[\p{L}\p{N}_\-.+/=]+/gu

/**
 * Spans `[start, end)` of key-like tokens: runs of letters, digits and
 * `_-.+/=` long enough and random enough to look like a credential.
 */
export function findHighEntropySpans(text: string, options: EntropyOptions = {}): Array<[number, number]> {
  const minLength = options.minLength ?? 20
  const threshold = options.threshold ?? 3.7
  const spans: Array<[number, number]> = []
  for (const match of text.matchAll(TOKEN_CHARS)) {
    const token = match[0]
    if ([...token].length < minLength || shannonEntropy(token) < threshold)
      continue
    const start = match.index ?? 0
    spans.push([start, start + token.length])
  }
  return spans
}

/**
 * Replace every high-entropy token with {@link REDACTION_MARKER}. Line
 * structure is preserved.
 */
export function redactHighEntropy(text: string, options?: EntropyOptions): { text: string, count: number } {
  const spans = findHighEntropySpans(text, options)
  if (spans.length === 0)
    return { text, count: 0 }

  let out = ''
  let last = 0
  for (const [start, end] of spans) {
    out += text.slice(last, start) + REDACTION_MARKER
    last = end
  }
  out += text.slice(last)
  return { text: out, count: spans.length }
}
