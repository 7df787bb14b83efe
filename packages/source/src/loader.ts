import type { Fragment } from '@reposieve/core/fragment'
import type { DiscoverFilesOptions } from './discover'
import { readFile, stat } from 'node:fs/promises'
import path from 'node:path'
import { runConcurrent } from '@reposieve/core/concurrency'
import { createFragment, orderFragments } from '@reposieve/core/fragment'
import { humanSize } from '@reposieve/utils/format'
import { createLogger } from '@reposieve/utils/logger'
import { discoverFiles } from './discover'
import { isSecretPath, redactHighEntropy } from './secrets'

const log = createLogger('loadFragments')

export const DEFAULT_FILE_CAP_BYTES = 512 * 1024

export interface LoadFragmentsOptions extends DiscoverFilesOptions {
  /** Files larger than this are skipped (default: 512 KiB) */
  fileCapBytes?: number
  /** Load files on the secret blocklist (default: false) */
  allowSecrets?: boolean
  /** Replace high-entropy tokens in loaded content (default: true) */
  redact?: boolean
  /** Files read in parallel (default: 16) */
  concurrency?: number
  signal?: AbortSignal
}

export interface SkippedFile {
  path: string
  size: number
  cap: number
}

export interface RedactedFile {
  path: string
  count: number
}

export interface UnreadableFile {
  path: string
  reason: string
}

export interface LoadResult {
  /** Loaded fragments in path order */
  fragments: Fragment[]
  /** Over the byte cap */
  skipped: SkippedFile[]
  /** On the secret blocklist */
  blocked: string[]
  redacted: RedactedFile[]
  /** Content with NUL bytes */
  binary: string[]
  /** Listed but gone, not a regular file, or not readable */
  unreadable: UnreadableFile[]
}

type Outcome =
  | { kind: 'loaded', fragment: Fragment, redactions: number }
  | { kind: 'skipped', size: number }
  | { kind: 'blocked' }
  | { kind: 'binary' }
  | { kind: 'unreadable', reason: string }

function failureReason(error: unknown): string {
  if (error instanceof Error)
    return 'code' in error && typeof error.code === 'string' ? error.code : error.message
  return String(error)
}

/**
 * Read the repository at `root` into fragments, one per text file, applying
 * the byte cap, the secret blocklist and high-entropy redaction.
 */
export async function loadFragments(root: string, options: LoadFragmentsOptions = {}): Promise<LoadResult> {
  const cap = options.fileCapBytes ?? DEFAULT_FILE_CAP_BYTES
  if (!Number.isInteger(cap) || cap <= 0)
    throw new Error(`fileCapBytes must be a positive integer, got ${cap}`)
  const allowSecrets = options.allowSecrets ?? false
  const redact = options.redact ?? true

  const files = await discoverFiles(root, options)
  log.debug(`Discovered ${files.length} files under ${root}`)

  const loadOne = async (relativePath: string, signal: AbortSignal): Promise<Outcome> => {
    const fullPath = path.join(root, relativePath)
    let data: Buffer
    try {
      const stats = await stat(fullPath)
      if (!stats.isFile())
        return { kind: 'unreadable', reason: 'not a regular file' }
      if (stats.size > cap)
        return { kind: 'skipped', size: stats.size }
      if (!allowSecrets && isSecretPath(relativePath))
        return { kind: 'blocked' }
      data = await readFile(fullPath, { signal })
    }
    catch (error) {
      if (signal.aborted)
        throw error
      // The index can list files that were deleted or made unreadable since
      return { kind: 'unreadable', reason: failureReason(error) }
    }
    if (data.includes(0))
      return { kind: 'binary' }

    const text = data.toString('utf8')
    const { text: content, count } = redact ? redactHighEntropy(text) : { text, count: 0 }
    return { kind: 'loaded', fragment: createFragment({ path: relativePath, content }), redactions: count }
  }

  const outcomes = await runConcurrent(
    files.map(file => (signal: AbortSignal) => loadOne(file, signal)),
    options.concurrency ?? 16,
    options.signal,
  )

  const result: LoadResult = { fragments: [], skipped: [], blocked: [], redacted: [], binary: [], unreadable: [] }
  outcomes.forEach((outcome, i) => {
    const file = files[i]
    if (file === undefined)
      return
    switch (outcome.kind) {
      case 'loaded':
        result.fragments.push(outcome.fragment)
        if (outcome.redactions > 0)
          result.redacted.push({ path: file, count: outcome.redactions })
        break
      case 'skipped':
        log.debug(`Skipping ${file}: ${humanSize(outcome.size)} exceeds ${humanSize(cap)}`)
        result.skipped.push({ path: file, size: outcome.size, cap })
        break
      case 'blocked':
        result.blocked.push(file)
        break
      case 'binary':
        result.binary.push(file)
        break
      case 'unreadable':
        log.warn(`Cannot read ${file}: ${outcome.reason}`)
        result.unreadable.push({ path: file, reason: outcome.reason })
        break
    }
  })

  result.fragments = orderFragments(result.fragments)
  log.info(
    `Loaded ${result.fragments.length} fragments`
    + ` (${result.skipped.length} too large, ${result.blocked.length} blocked, ${result.binary.length} binary,`
    + ` ${result.unreadable.length} unreadable)`,
  )
  return result
}
