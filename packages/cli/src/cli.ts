#!/usr/bin/env node
import type { Tokenizer } from './ask'
import type { LastResortPolicy } from '@reposieve/core/selector'
import { LogLevels, setLogLevel } from '@reposieve/utils/logger'
import { InvalidArgumentError, Option, program } from 'commander'
import { config } from 'dotenv'

import pkg from '../package.json'
import { runAsk } from './ask'

config({ path: ['.env.local', '.env'] })

function positiveInt(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n <= 0)
    throw new InvalidArgumentError('Expected a positive integer.')
  return n
}

function fraction(value: string): number {
  const n = Number(value)
  if (!(n >= 0 && n < 1))
    throw new InvalidArgumentError('Expected a number in [0, 1).')
  return n
}

interface AskFlags {
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
  mode?: 'C' | 'B'
  allowSecrets?: boolean
  earlyFit: boolean
  gitignore: boolean
  include?: string[]
  exclude?: string[]
  timeoutS?: number
  tokenizer?: Tokenizer
  verbose?: boolean
}

program
  .name('reposieve')
  .description('Answer questions about a repository larger than any model context')
  .version(pkg.version)

program
  .command('ask')
  .description('Select the files relevant to a question and answer it')
  .requiredOption('-r, --request <text>', 'Question to answer')
  .option('--cwd <path>', 'Repository root (default: current directory)')
  .option('--headroom <fraction>', 'Share of each context window kept free (default: 0.15)', fraction)
  .option('--selector-model <provider/model>', 'Selector model (default: google/gemini-2.5-flash)')
  .option('--analysis-model <provider/model>', 'Analysis model (default: google/gemini-2.5-pro)')
  .option('--selector-tokens <tokens>', 'Selector context window (default: 1000000)', positiveInt)
  .option('--analyzer-tokens <tokens>', 'Analyzer context window (default: 1000000)', positiveInt)
  .option('--max-concurrency <n>', 'Selector calls in flight (default: 4)', positiveInt)
  .option('--max-levels <n>', 'Selection levels before truncation (default: 6)', positiveInt)
  .addOption(new Option('--last-resort <policy>', 'Rank of oversized files when truncating (default: last)').choices(['first', 'last']))
  .option('--file-cap-bytes <bytes>', 'Skip files larger than this (default: 524288)', positiveInt)
  .addOption(new Option('--mode <mode>', 'C: selected files only, B: also their imports (default: C)').choices(['C', 'B']))
  .option('-i, --include <patterns...>', 'Include file globs')
  .option('-e, --exclude <patterns...>', 'Exclude file globs (replaces the defaults)')
  .option('--allow-secrets', 'Load files on the secret blocklist')
  .option('--no-early-fit', 'Always run selection, even when everything fits')
  .option('--no-gitignore', 'Disable .gitignore filtering (include all files)')
  .option('--timeout-s <seconds>', 'Per-request model timeout (default: 120)', positiveInt)
  .addOption(new Option('--tokenizer <name>', 'Token counting: cl100k_base BPE or length / 4 (default: tiktoken)').choices(['tiktoken', 'estimate']))
  .option('--verbose', 'Show detailed progress')
  .action(async (options: AskFlags) => {
    if (options.verbose) {
      setLogLevel(LogLevels.debug)
    }

    process.exitCode = await runAsk({
      request: options.request,
      cwd: options.cwd,
      headroom: options.headroom,
      selectorModel: options.selectorModel,
      analysisModel: options.analysisModel,
      selectorTokens: options.selectorTokens,
      analyzerTokens: options.analyzerTokens,
      maxConcurrency: options.maxConcurrency,
      maxLevels: options.maxLevels,
      lastResort: options.lastResort,
      fileCapBytes: options.fileCapBytes,
      mode: options.mode,
      allowSecrets: options.allowSecrets,
      // Negated flags default to true; only an explicit flag overrides the config file
      earlyFit: options.earlyFit ? undefined : false,
      gitignore: options.gitignore,
      include: options.include,
      exclude: options.exclude,
      timeoutS: options.timeoutS,
      tokenizer: options.tokenizer,
    }, {
      stdout: text => process.stdout.write(text),
      stderr: line => process.stderr.write(`${line}\n`),
    })
  })

await program.parseAsync()
