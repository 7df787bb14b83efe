import type { AskIO, AskOracles, OracleSettings } from '@reposieve/cli/ask'
import type { Fragment } from '@reposieve/core/fragment'
import type { TokenCounter } from '@reposieve/utils/token-counter'
import { execFileSync } from 'node:child_process'
import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import path from 'node:path'

export const wordCounter: TokenCounter = {
  count: text => text.split(/\s+/).filter(Boolean).length,
}

export function words(n: number): string {
  return Array.from({ length: n }, () => 'tok').join(' ')
}

export function makeRepo(files: Record<string, string>): string {
  const root = mkdtempSync(path.join(tmpdir(), 'reposieve-cli-'))
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = path.join(root, relativePath)
    mkdirSync(path.dirname(fullPath), { recursive: true })
    writeFileSync(fullPath, content)
  }
  return root
}

export function hasGit(): boolean {
  try {
    execFileSync('git', ['--version'], { stdio: 'pipe' })
    return true
  }
  catch {
    return false
  }
}

/** Commit every file under `root` to a fresh repository. */
export function commitAll(root: string): void {
  for (const args of [['init', '-q'], ['add', '-A'], ['commit', '-q', '-m', 'init']])
    execFileSync('git', ['-c', 'user.email=test@example.com', '-c', 'user.name=test', ...args], { cwd: root, stdio: 'pipe' })
}

export interface RecordingIO extends AskIO {
  out: string[]
  err: string[]
  settings: OracleSettings[]
  analyzed: string[][]
}

/**
 * IO that records both streams and serves scripted oracles.
 */
export function recordingIO(
  isRelevant: (path: string) => boolean,
  answer = 'the answer',
): RecordingIO {
  const out: string[] = []
  const err: string[] = []
  const settings: OracleSettings[] = []
  const analyzed: string[][] = []
  const oracles: AskOracles = {
    selector: {
      async select(request) {
        return request.group.fragments.map((f: Fragment) => ({ path: f.path, relevant: isRelevant(f.path) }))
      },
    },
    analyzer: {
      async analyze(request) {
        analyzed.push(request.fragments.map(f => f.path))
        return { answer }
      },
    },
  }
  return {
    out,
    err,
    settings,
    analyzed,
    stdout: text => out.push(text),
    stderr: line => err.push(line),
    tokenCounter: wordCounter,
    createOracles: (s) => {
      settings.push(s)
      return oracles
    },
  }
}
