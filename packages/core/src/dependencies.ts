import type { Budget, PromptOverhead } from './budget'
import type { Fragment, TokenMeter } from './fragment'
import { createLogger } from '@reposieve/utils/logger'
import { BudgetLedger, fragmentCost } from './budget'
import { orderFragments, sourcePath } from './fragment'

const log = createLogger('Dependencies')

interface ImportPattern {
  regex: RegExp
  /** Turns the captured module name into a path-like reference */
  toRef?: (name: string) => string
}

const dotted = (name: string): string => name.replace(/^\.+/, '').replace(/\./g, '/')

const IMPORT_PATTERNS: readonly ImportPattern[] = [
  // JS/TS
  { regex: /\bfrom\s+['"]([^'"]+)['"]/g },
  { regex: /\b(?:import|require)\s*\(\s*['"]([^'"]+)['"]/g },
  { regex: /^\s*import\s+['"]([^'"]+)['"]/gm },
  // Python
  { regex: /^\s*from\s+([.\w]+)\s+import\b/gm, toRef: dotted },
  // Python, Java, Kotlin
  { regex: /^\s*import\s+(?:static\s+)?([A-Z_a-z][\w.]*)\s*(?:;|$|\s+as\s)/gm, toRef: dotted },
  // Go
  { regex: /^\s*import\s+(?:\w+\s+)?"([^"]+)"/gm },
  // Rust
  { regex: /^\s*(?:pub\s+)?use\s+(?:crate::|self::|super::)?(\w+(?:::\w+)*)/gm, toRef: name => name.replace(/::/g, '/') },
  { regex: /^\s*(?:pub\s+)?mod\s+(\w+)\s*;/gm },
  // C/C++
  { regex: /^\s*#\s*include\s+[<"]([^>"]+)[>"]/gm },
  // YAML includes
  { regex: /^\s*-?\s*(?:include|includes|extends)\s*:\s*['"]?([^\s'"#]+)/gim },
]

const GO_IMPORT_BLOCK = /^\s*import\s*\(([^)]*)\)/gm
const GO_BLOCK_ENTRY = /"([^"]+)"/g

/**
 * Module references found in source text (import, require, include, use),
 * as relative path-like strings.
 */
export function collectImportRefs(text: string): Set<string> {
  const refs = new Set<string>()
  for (const { regex, toRef } of IMPORT_PATTERNS) {
    for (const match of text.matchAll(regex)) {
      const name = match[1]
      if (!name)
        continue
      const ref = normalizeRef(toRef ? toRef(name) : name)
      if (ref.length >= 2)
        refs.add(ref)
    }
  }
  for (const block of text.matchAll(GO_IMPORT_BLOCK)) {
    for (const entry of (block[1] ?? '').matchAll(GO_BLOCK_ENTRY)) {
      const ref = normalizeRef(entry[1] ?? '')
      if (ref.length >= 2)
        refs.add(ref)
    }
  }
  return refs
}

function normalizeRef(ref: string): string {
  return ref
    .replace(/\\/g, '/')
    .replace(/^(?:\.{1,2}\/)+/, '')
    .replace(/^[@~]\//, '')
    .replace(/\/+$/, '')
    .toLowerCase()
}

function stripExtension(path: string): string {
  const slash = path.lastIndexOf('/')
  const dot = path.lastIndexOf('.')
  return dot > slash + 1 ? path.slice(0, dot) : path
}

function endsWithSegment(path: string, ref: string): boolean {
  return path === ref || path.endsWith(`/${ref}`)
}

/**
 * Corpus paths a reference may point at. A reference matches a path that ends
 * with it (whole segments), with or without the file extension, or the
 * index/__init__/mod file of a matching directory.
 */
export function resolveRefsToPaths(refs: Iterable<string>, paths: readonly string[]): Set<string> {
  const keyed = paths.map(path => ({ path, lower: path.toLowerCase(), stem: stripExtension(path.toLowerCase()) }))
  const chosen = new Set<string>()
  for (const ref of refs) {
    const stemRef = stripExtension(ref)
    for (const { path, lower, stem } of keyed) {
      if (
        endsWithSegment(lower, ref)
        || endsWithSegment(stem, ref)
        || (stemRef !== ref && endsWithSegment(stem, stemRef))
        || endsWithSegment(stem, `${ref}/index`)
        || endsWithSegment(stem, `${ref}/__init__`)
        || endsWithSegment(stem, `${ref}/mod`)
      ) {
        chosen.add(path)
      }
    }
  }
  return chosen
}

export interface ExpansionResult {
  /** Curated fragments plus the dependencies that fit, in path order */
  fragments: Fragment[]
  added: Fragment[]
  /** Resolved dependencies left out for lack of room */
  skipped: Fragment[]
}

/**
 * Append the files imported by the curated fragments, one hop deep, while
 * the analyzer budget has room. Files already represented (whole or by a
 * piece) are not added again.
 */
export function expandDependencies(
  curated: readonly Fragment[],
  corpus: readonly Fragment[],
  meter: TokenMeter,
  budget: Budget,
  overhead: PromptOverhead,
  question: string,
): ExpansionResult {
  const present = new Set(curated.map(sourcePath))
  const refs = new Set<string>()
  for (const fragment of curated) {
    for (const ref of collectImportRefs(fragment.content))
      refs.add(ref)
  }

  const byPath = new Map(corpus.map(f => [f.path, f]))
  const resolved = resolveRefsToPaths(refs, [...byPath.keys()])
  const candidates = orderFragments(
    [...resolved].filter(path => !present.has(path)).flatMap((path) => {
      const fragment = byPath.get(path)
      return fragment ? [fragment] : []
    }),
  )

  const ledger = new BudgetLedger(budget, meter.count(question) + overhead.perCall)
  for (const fragment of curated)
    ledger.tryAdd(fragmentCost(fragment, meter, overhead))

  const added: Fragment[] = []
  const skipped: Fragment[] = []
  for (const fragment of candidates) {
    if (ledger.tryAdd(fragmentCost(fragment, meter, overhead)))
      added.push(fragment)
    else
      skipped.push(fragment)
  }
  log.debug(`Resolved ${refs.size} references to ${candidates.length} files, added ${added.length}`)

  return { fragments: orderFragments([...curated, ...added]), added, skipped }
}
