import type { Stats } from 'node:fs'
import { execFileSync } from 'node:child_process'
import { existsSync } from 'node:fs'
import { readdir, stat } from 'node:fs/promises'
import path from 'node:path'
import { resolveGitBinary } from '@reposieve/utils/git-path'
import { createLogger } from '@reposieve/utils/logger'
import DEFAULT_EXCLUDES from './default-excludes.json'

const log = createLogger('discoverFiles')

export { DEFAULT_EXCLUDES }

/**
 * Options for file discovery
 */
export interface DiscoverFilesOptions {
  /** Globs a file must match (default: every file) */
  include?: string[]
  /** Globs that drop a file or prune a directory (default: VCS, dependency and build dirs, media, archives, minified files) */
  exclude?: string[]
  /** Maximum directory depth (default: 20) */
  maxDepth?: number
  /** Respect .gitignore rules via git ls-files (default: true) */
  respectGitignore?: boolean
}

const LS_FILES_ARGS = ['ls-files', '-z', '--cached', '--others', '--exclude-standard']

function stderrOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'stderr' in error) {
    const { stderr } = error
    if (typeof stderr === 'string')
      return stderr.trim()
    if (Buffer.isBuffer(stderr))
      return stderr.toString('utf-8').trim()
  }
  return ''
}

/**
 * Paths git would commit under `root`: tracked files plus untracked ones no
 * ignore rule matches. `undefined` when git is missing or `root` is not a
 * work tree, in which case the caller walks the directory.
 */
function listGitFiles(root: string): string[] | undefined {
  let git: string
  try {
    git = resolveGitBinary()
  }
  catch (error) {
    log.warn(`${error instanceof Error ? error.message : String(error)}; walking ${root} without .gitignore rules`)
    return undefined
  }

  try {
    const output = execFileSync(git, LS_FILES_ARGS, {
      cwd: root,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: 64 * 1024 * 1024,
    })
    return [...new Set(output.split('\0').filter(Boolean))]
  }
  catch (error) {
    const stderr = stderrOf(error)
    if (!stderr.includes('not a git repository')) {
      const reason = stderr || (error instanceof Error ? error.message : String(error))
      log.warn(`git ls-files failed in ${root}: ${reason}; walking without .gitignore rules`)
    }
    return undefined
  }
}

function toPosix(relativePath: string): string {
  return relativePath.replaceAll('\\', '/')
}

function byCodeUnit(a: string, b: string): number {
  if (a < b)
    return -1
  return a > b ? 1 : 0
}

/**
 * Discover files under `repoPath`, as sorted repository-relative paths with
 * forward slashes.
 *
 * When respectGitignore is true (default), uses `git ls-files` to respect
 * .gitignore rules. Falls back to a directory walk for non-git repos, when
 * git is unavailable, or when respectGitignore is false.
 */
export async function discoverFiles(
  repoPath: string,
  opts?: DiscoverFilesOptions,
): Promise<string[]> {
  if (!existsSync(repoPath)) {
    throw new Error(`Repository path does not exist: ${repoPath}`)
  }

  const includePatterns = opts?.include ?? ['**']
  const excludePatterns = opts?.exclude ?? DEFAULT_EXCLUDES
  const maxDepth = opts?.maxDepth ?? 20

  if (opts?.respectGitignore !== false) {
    const gitFiles = listGitFiles(repoPath)
    if (gitFiles !== undefined) {
      const filtered = gitFiles
        .map(toPosix)
        .filter(relativePath =>
          relativePath.split('/').length - 1 <= maxDepth
          && !matchesPattern(relativePath, excludePatterns)
          && matchesPattern(relativePath, includePatterns))
      if (filtered.length === 0) {
        log.warn(
          `git ls-files found ${gitFiles.length} files, `
          + `but 0 matched the configured filters (include/exclude/maxDepth).`,
        )
      }
      return filtered.sort(byCodeUnit)
    }
  }

  const files: string[] = []
  await walkDirectory(repoPath, repoPath, files, includePatterns, excludePatterns, 0, maxDepth)
  return files.sort(byCodeUnit)
}

async function walkDirectory(
  rootPath: string,
  dir: string,
  files: string[],
  includePatterns: string[],
  excludePatterns: string[],
  depth: number,
  maxDepth: number,
): Promise<void> {
  if (depth > maxDepth)
    return

  let entries: string[]
  try {
    entries = await readdir(dir)
  }
  catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    log.warn(`Skipping directory ${dir}: ${msg}`)
    return
  }

  for (const entry of entries) {
    const fullPath = path.join(dir, entry)
    const relativePath = toPosix(path.relative(rootPath, fullPath))
    if (matchesPattern(relativePath, excludePatterns))
      continue

    let stats: Stats
    try {
      stats = await stat(fullPath)
    }
    catch (error) {
      const msg = error instanceof Error ? error.message : String(error)
      log.warn(`Skipping ${fullPath}: ${msg}`)
      continue
    }

    if (stats.isDirectory())
      await walkDirectory(rootPath, fullPath, files, includePatterns, excludePatterns, depth + 1, maxDepth)
    else if (stats.isFile() && matchesPattern(relativePath, includePatterns))
      files.push(relativePath)
  }
}

export function matchesPattern(filePath: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => globMatch(filePath, pattern))
}

/**
 * Segment-wise glob match: `**` spans any number of segments, `*` and `?`
 * stay within one.
 */
export function globMatch(filePath: string, pattern: string): boolean {
  const pathSegments = toPosix(filePath).split('/')
  const patternSegments = toPosix(pattern).split('/')
  return matchSegments(pathSegments, patternSegments, 0, 0)
}

function matchSegments(
  pathSegs: string[],
  patternSegs: string[],
  pathIdx: number,
  patternIdx: number,
): boolean {
  if (pathIdx === pathSegs.length && patternIdx === patternSegs.length) {
    return true
  }
  if (patternIdx === patternSegs.length) {
    return false
  }

  const patternSeg = patternSegs[patternIdx]
  if (patternSeg === undefined)
    return false

  if (patternSeg === '**') {
    for (let i = pathIdx; i <= pathSegs.length; i++) {
      if (matchSegments(pathSegs, patternSegs, i, patternIdx + 1)) {
        return true
      }
    }
    return false
  }

  const pathSeg = pathSegs[pathIdx]
  if (pathSeg !== undefined && matchSegment(pathSeg, patternSeg)) {
    return matchSegments(pathSegs, patternSegs, pathIdx + 1, patternIdx + 1)
  }

  return false
}

const segmentCache = new Map<string, RegExp>()

export function matchSegment(pathSeg: string, patternSeg: string): boolean {
  let regex = segmentCache.get(patternSeg)
  if (!regex) {
    const source = patternSeg
      .replace(/[.+^${}()|[\]\\]/g, '\\$&')
      .replaceAll('*', '[^/]*')
      .replaceAll('?', '[^/]')
    regex = new RegExp(`^${source}$`)
    segmentCache.set(patternSeg, regex)
  }
  return regex.test(pathSeg)
}
