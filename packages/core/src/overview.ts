import type { Fragment, TokenMeter } from './fragment'
import { humanSize } from '@reposieve/utils/format'
import { sourcePath } from './fragment'

/**
 * One line of the directory tree
 */
export interface OverviewEntry {
  /** Repository-relative path; `.` for the root */
  path: string
  name: string
  kind: 'directory' | 'file'
  /** 0 for the root */
  depth: number
  /** Number of files at or below this entry */
  files: number
  bytes: number
  /** File type from the extension (files only) */
  type?: string
}

export interface ReadmeExcerpt {
  path: string
  excerpt: string
}

/**
 * Read-only structural summary of the corpus shared by every selector call
 */
export interface Overview {
  readonly entries: readonly OverviewEntry[]
  readonly readmes: readonly ReadmeExcerpt[]
  /** Deepest entry depth rendered into `text` */
  readonly depth: number
  /** Line cap the tree was rendered with */
  readonly maxLines: number
  readonly truncated: boolean
  readonly text: string
}

export interface OverviewOptions {
  /** Directories below this depth are collapsed into their summary line (default: 4) */
  maxDepth?: number
  /** Maximum tree lines (default: 2000) */
  maxLines?: number
  /** Prepend README excerpts (default: false) */
  readmes?: boolean
  /** Characters kept from each README (default: 2000) */
  maxReadmeChars?: number
}

export const TRUNCATION_MARKER = '… (truncated)'

interface DirNode {
  name: string
  path: string
  dirs: Map<string, DirNode>
  files: { name: string, path: string, bytes: number }[]
  fileCount: number
  bytes: number
}

function newDir(name: string, path: string): DirNode {
  return { name, path, dirs: new Map(), files: [], fileCount: 0, bytes: 0 }
}

function byName<T extends { name: string }>(a: T, b: T): number {
  if (a.name < b.name)
    return -1
  return a.name > b.name ? 1 : 0
}

function fileType(name: string): string {
  const dot = name.lastIndexOf('.')
  return dot > 0 ? name.slice(dot + 1).toLowerCase() : 'file'
}

function buildTree(fragments: readonly Fragment[]): DirNode {
  const root = newDir('.', '.')
  const sizes = new Map<string, number>()
  for (const fragment of fragments) {
    const path = sourcePath(fragment)
    sizes.set(path, (sizes.get(path) ?? 0) + fragment.byteLength)
  }

  for (const [path, bytes] of sizes) {
    const segments = path.split('/').filter(Boolean)
    const name = segments.pop()
    if (!name)
      continue
    let node = root
    node.fileCount++
    node.bytes += bytes
    for (const segment of segments) {
      let child = node.dirs.get(segment)
      if (!child) {
        child = newDir(segment, node === root ? segment : `${node.path}/${segment}`)
        node.dirs.set(segment, child)
      }
      node = child
      node.fileCount++
      node.bytes += bytes
    }
    node.files.push({ name, path, bytes })
  }
  return root
}

function flatten(node: DirNode, depth: number, out: OverviewEntry[]): void {
  out.push({ path: node.path, name: node.name, kind: 'directory', depth, files: node.fileCount, bytes: node.bytes })
  for (const dir of [...node.dirs.values()].sort(byName)) {
    flatten(dir, depth + 1, out)
  }
  for (const file of [...node.files].sort(byName)) {
    out.push({ path: file.path, name: file.name, kind: 'file', depth: depth + 1, files: 1, bytes: file.bytes, type: fileType(file.name) })
  }
}

function renderEntry(entry: OverviewEntry): string {
  const indent = '  '.repeat(entry.depth)
  if (entry.kind === 'directory')
    return `${indent}${entry.name}/ (files=${entry.files}, size=${humanSize(entry.bytes)})`
  return `${indent}${entry.name} (${humanSize(entry.bytes)}, ${entry.type ?? 'file'})`
}

function treeLines(entries: readonly OverviewEntry[], depth: number): string[] {
  return entries.filter(e => e.depth <= depth).map(renderEntry)
}

function renderText(readmes: readonly ReadmeExcerpt[], lines: readonly string[]): string {
  const sections: string[] = []
  if (readmes.length > 0) {
    sections.push(`READMEs:\n${readmes.map(r => `## ${r.path}\n${r.excerpt}`).join('\n')}`)
  }
  sections.push(`DIRECTORY TREE (files, sizes):\n${lines.join('\n')}`)
  return sections.join('\n\n')
}

function isReadme(path: string): boolean {
  const name = path.slice(path.lastIndexOf('/') + 1)
  return name.toUpperCase().startsWith('README')
}

interface ComposeInput {
  entries: readonly OverviewEntry[]
  readmes: readonly ReadmeExcerpt[]
  depth: number
  maxLines: number
  /** Tree lines to render; cut to `maxLines` with a marker when longer */
  lines: readonly string[]
  /** Set when the caller already shrank the overview */
  shrunk?: boolean
}

function compose(input: ComposeInput): Overview {
  const cut = input.lines.length > input.maxLines
  const lines = cut ? [...input.lines.slice(0, input.maxLines), TRUNCATION_MARKER] : input.lines
  return Object.freeze({
    entries: input.entries,
    readmes: input.readmes,
    depth: input.depth,
    maxLines: input.maxLines,
    truncated: cut || input.shrunk === true,
    text: renderText(input.readmes, lines),
  })
}

/**
 * Build a deterministic directory tree with per-directory file counts and
 * sizes and per-file size and type.
 */
export function buildOverview(fragments: readonly Fragment[], options: OverviewOptions = {}): Overview {
  const maxDepth = options.maxDepth ?? 4
  const maxLines = options.maxLines ?? 2000
  const entries: OverviewEntry[] = []
  flatten(buildTree(fragments), 0, entries)
  Object.freeze(entries)

  const readmes: ReadmeExcerpt[] = []
  if (options.readmes) {
    const maxChars = options.maxReadmeChars ?? 2000
    for (const fragment of fragments) {
      if (!fragment.origin && isReadme(fragment.path)) {
        readmes.push({ path: fragment.path, excerpt: fragment.content.slice(0, maxChars) })
      }
    }
    readmes.sort(byPath)
  }

  return compose({ entries, readmes, depth: maxDepth, maxLines, lines: treeLines(entries, maxDepth) })
}

function byPath(a: ReadmeExcerpt, b: ReadmeExcerpt): number {
  if (a.path < b.path)
    return -1
  return a.path > b.path ? 1 : 0
}

/**
 * Wrap caller-supplied text as an overview without a tree.
 */
export function overviewFromText(text: string): Overview {
  return Object.freeze({ entries: [], readmes: [], depth: 0, maxLines: Number.POSITIVE_INFINITY, truncated: false, text })
}

/**
 * Shrink an overview until it costs at most `maxTokens`: README excerpts go
 * first, then the deepest tree level, one level at a time down to the top
 * level, and finally trailing lines. Never throws.
 */
export function fitOverview(overview: Overview, maxTokens: number, meter: TokenMeter): Overview {
  if (meter.count(overview.text) <= maxTokens)
    return overview

  const { entries, maxLines } = overview
  if (entries.length === 0) {
    return Object.freeze({ ...overviewFromText(cutLines(overview.text.split('\n'), maxTokens, meter)), truncated: true })
  }

  const floor = Math.min(overview.depth, 1)
  for (let depth = overview.depth; depth >= floor; depth--) {
    const candidate = compose({ entries, readmes: [], depth, maxLines, lines: treeLines(entries, depth), shrunk: true })
    if (meter.count(candidate.text) <= maxTokens)
      return candidate
  }

  const header = renderText([], []).split('\n')
  const lines = treeLines(entries, floor).slice(0, maxLines)
  const text = cutLines([...header.filter(Boolean), ...lines], maxTokens, meter, header.filter(Boolean).length)
  return Object.freeze({ entries, readmes: [], depth: floor, maxLines, truncated: true, text })
}

/**
 * Longest prefix of `lines` (never shorter than `keep`) that, followed by
 * the truncation marker, fits `maxTokens`. Empty when nothing fits.
 */
function cutLines(lines: readonly string[], maxTokens: number, meter: TokenMeter, keep = 0): string {
  const render = (kept: number): string => [...lines.slice(0, kept), TRUNCATION_MARKER].join('\n')
  let low = keep
  let high = lines.length - 1
  while (low < high) {
    const mid = Math.ceil((low + high) / 2)
    if (meter.count(render(mid)) <= maxTokens)
      low = mid
    else
      high = mid - 1
  }
  for (let kept = low; kept > keep; kept--) {
    if (meter.count(render(kept)) <= maxTokens)
      return render(kept)
  }
  return ''
}
