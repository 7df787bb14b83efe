import type { AnalyzerOracle, SelectorOracle } from '@reposieve/core/oracle'
import type { LastResortPolicy } from '@reposieve/core/selector'
import type { LoadResult } from '@reposieve/source/loader'
import type { TokenCounter } from '@reposieve/utils/token-counter'
import type { ProjectConfig } from './config'
import { existsSync, statSync } from 'node:fs'
import path from 'node:path'
import { ConfigError, SelectionExhausted } from '@reposieve/core/errors'
import { LLMAnalyzerOracle } from '@reposieve/core/oracles/llm-analyzer'
import { LLMSelectorOracle } from '@reposieve/core/oracles/llm-selector'
import { askRepository } from '@reposieve/core/orchestrator'
import { loadFragments } from '@reposieve/source/loader'
import { humanSize } from '@reposieve/utils/format'
import { LLMClient, parseModelString } from '@reposieve/utils/llm'
import { createLogger } from '@reposieve/utils/logger'
import { estimatingTokenCounter, tiktokenCounter } from '@reposieve/utils/token-counter'
import { loadProjectConfig } from './config'

const log = createLogger('ask')

export const DEFAULT_SELECTOR_MODEL = 'google/gemini-2.5-flash'
export const DEFAULT_ANALYSIS_MODEL = 'google/gemini-2.5-pro'
export const DEFAULT_CONTEXT_TOKENS = 1_000_000
export const DEFAULT_TIMEOUT_S = 120

/** Exit codes of `reposieve ask` */
export const ExitCode = {
  OK: 0,
  FAILURE: 1,
  CONFIG: 2,
  NO_ANSWER: 3,
} as const

export interface AskCommandOptions {
  request: string
  cwd?: string
  headroom?: number
  selectorModel?: string
  analysisModel?: string
  selectorTokens?: number
  analyzerTokens?: number
  maxConcurrency?: number
  maxLevels?: number
  lastResort?: LastResortPolicy
  fileCapBytes?: number
  /** `B` adds files imported by the curated set */
  mode?: 'C' | 'B'
  allowSecrets?: boolean
  earlyFit?: boolean
  timeoutS?: number
  include?: string[]
  exclude?: string[]
  gitignore?: boolean
  /** `tiktoken` counts cl100k_base tokens, `estimate` uses length / 4 */
  tokenizer?: Tokenizer
}

export type Tokenizer = 'tiktoken' | 'estimate'

export interface OracleSettings {
  selectorModel: string
  analysisModel: string
  timeoutMs: number
}

export interface AskOracles {
  selector: SelectorOracle
  analyzer: AnalyzerOracle
}

export interface AskIO {
  /** Receives the answer and nothing else */
  stdout: (text: string) => void
  /** Receives every diagnostic line */
  stderr: (text: string) => void
  createOracles?: (settings: OracleSettings) => AskOracles
  tokenCounter?: TokenCounter
  signal?: AbortSignal
}

/**
 * Selector and analyzer oracles on the configured `provider/model` strings.
 */
export function createLLMOracles(settings: OracleSettings): AskOracles {
  const selector = parseModelString(settings.selectorModel)
  const analysis = parseModelString(settings.analysisModel)
  return {
    selector: new LLMSelectorOracle(new LLMClient({ ...selector, timeout: settings.timeoutMs })),
    analyzer: new LLMAnalyzerOracle(new LLMClient({
      ...analysis,
      timeout: settings.timeoutMs,
      temperature: 0.2,
      maxTokens: 8192,
    })),
  }
}

function reportLoad(loaded: LoadResult, stderr: (text: string) => void): void {
  for (const file of loaded.skipped)
    stderr(`SKIPPED (too large): ${file.path} [size=${humanSize(file.size)}, cap=${humanSize(file.cap)}]`)
  for (const file of loaded.blocked)
    stderr(`BLOCKED (secret): ${file}`)
  for (const file of loaded.unreadable)
    stderr(`UNREADABLE: ${file.path} (${file.reason})`)
  for (const file of loaded.redacted)
    stderr(`REDACTED token(s): ${file.path} (${file.count} matches)`)
}

export function createTokenCounter(tokenizer: Tokenizer = 'tiktoken'): TokenCounter {
  return tokenizer === 'estimate' ? estimatingTokenCounter : tiktokenCounter()
}

function resolveOracles(io: AskIO, settings: OracleSettings): AskOracles {
  try {
    return (io.createOracles ?? createLLMOracles)(settings)
  }
  catch (error) {
    if (error instanceof Error && error.message.startsWith('Unknown LLM provider'))
      throw new ConfigError(error.message)
    throw error
  }
}

/**
 * Run one question against the repository at `options.cwd` and return the
 * process exit code.
 */
export async function runAsk(options: AskCommandOptions, io: AskIO): Promise<number> {
  const root = path.resolve(options.cwd ?? process.cwd())
  if (!existsSync(root) || !statSync(root).isDirectory()) {
    io.stderr(`Invalid --cwd: ${root}`)
    return ExitCode.CONFIG
  }

  try {
    const config: ProjectConfig = await loadProjectConfig(root)
    const mode = options.mode ?? config.mode ?? 'C'

    const loaded = await loadFragments(root, {
      include: options.include ?? config.include,
      exclude: options.exclude ?? config.exclude,
      respectGitignore: options.gitignore ?? true,
      fileCapBytes: options.fileCapBytes ?? config.fileCapBytes,
      allowSecrets: options.allowSecrets ?? config.allowSecrets ?? false,
      signal: io.signal,
    })
    reportLoad(loaded, io.stderr)

    const oracles = resolveOracles(io, {
      selectorModel: options.selectorModel ?? config.selectorModel ?? DEFAULT_SELECTOR_MODEL,
      analysisModel: options.analysisModel ?? config.analysisModel ?? DEFAULT_ANALYSIS_MODEL,
      timeoutMs: (options.timeoutS ?? config.timeoutS ?? DEFAULT_TIMEOUT_S) * 1000,
    })

    const result = await askRepository(options.request, loaded.fragments, {
      tokenCounter: io.tokenCounter ?? createTokenCounter(options.tokenizer ?? config.tokenizer),
      ...oracles,
    }, {
      selectorTokens: options.selectorTokens ?? config.selectorTokens ?? DEFAULT_CONTEXT_TOKENS,
      analyzerTokens: options.analyzerTokens ?? config.analyzerTokens ?? DEFAULT_CONTEXT_TOKENS,
      headroom: options.headroom ?? config.headroom,
      overview: { readmes: true },
      earlyFit: options.earlyFit ?? config.earlyFit,
      transitive: mode === 'B',
      maxConcurrency: options.maxConcurrency ?? config.maxConcurrency,
      maxLevels: options.maxLevels ?? config.maxLevels,
      lastResortPolicy: options.lastResort ?? config.lastResort,
      signal: io.signal,
      onLevel: report => log.debug(
        `Level ${report.level}: ${report.candidates} candidates in ${report.groups} groups, ${report.relevant} relevant`,
      ),
    })

    io.stdout(`${result.answer.trim()}\n`)

    const selection = result.selection
    if (selection && selection.termination !== 'fit') {
      const levels = selection.levels.length
      io.stderr(`FALLBACK: selection ${selection.termination} after ${levels} level(s), truncated to the analyzer budget`)
    }
    for (const fragment of selection?.trimmed ?? [])
      io.stderr(`TRIMMED (over budget): ${fragment.path}`)
    for (const fragment of result.expansion?.skipped ?? [])
      io.stderr(`TRIMMED (dependency): ${fragment.path}`)
    return ExitCode.OK
  }
  catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    if (error instanceof ConfigError) {
      io.stderr(`Configuration error: ${msg}`)
      return ExitCode.CONFIG
    }
    if (error instanceof SelectionExhausted) {
      io.stderr(`No answer possible: ${msg}`)
      return ExitCode.NO_ANSWER
    }
    io.stderr(`Analysis error: ${msg}`)
    return ExitCode.FAILURE
  }
}
