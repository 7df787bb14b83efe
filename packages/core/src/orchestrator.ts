import type { Budget } from './budget'
import type { ExpansionResult } from './dependencies'
import type { Fragment } from './fragment'
import type { Overview, OverviewOptions } from './overview'
import type { AnalyzerOracle, SelectorOracle } from './oracle'
import type { LastResortPolicy, LevelReport, SelectionResult } from './selector'
import type { TokenCounter } from '@reposieve/utils/token-counter'
import { createLogger } from '@reposieve/utils/logger'
import { analyze } from './analyzer'
import { DEFAULT_HEADROOM, estimateAnalyzerTokens, makeBudget, NO_OVERHEAD } from './budget'
import { expandDependencies } from './dependencies'
import { ConfigError, SelectionExhausted } from './errors'
import { orderFragments, TokenMeter } from './fragment'
import { buildOverview, fitOverview } from './overview'
import { HierarchicalSelector } from './selector'

const log = createLogger('Orchestrator')

export interface AskDependencies {
  tokenCounter: TokenCounter
  selector: SelectorOracle
  analyzer: AnalyzerOracle
}

export interface AskOptions {
  /** Total token ceiling of one selector call */
  selectorTokens: number
  /** Total token ceiling of the analyzer call */
  analyzerTokens: number
  /** Headroom for both roles unless overridden (default: 0.15) */
  headroom?: number
  selectorHeadroom?: number
  analyzerHeadroom?: number
  overview?: OverviewOptions
  /** Largest fraction of the selector usable ceiling the overview may take (default: 0.25) */
  overviewShare?: number
  /** Skip selection when the whole corpus fits the analyzer budget (default: true) */
  earlyFit?: boolean
  /** Add files imported by the curated set while room remains (default: false) */
  transitive?: boolean
  maxConcurrency?: number
  maxLevels?: number
  lastResortPolicy?: LastResortPolicy
  signal?: AbortSignal
  onLevel?: (report: LevelReport) => void
}

export interface AskResult {
  answer: string
  /** Fragments sent to the analyzer, in path order */
  curated: Fragment[]
  overview: Overview
  selectorBudget: Budget
  analyzerBudget: Budget
  /** Absent when the corpus fit without selection */
  selection?: SelectionResult
  expansion?: ExpansionResult
}

/**
 * Answer `question` from `fragments`: overview, budgets, hierarchical
 * selection, then a single analyzer call. Failures propagate unchanged.
 */
export async function askRepository(
  question: string,
  fragments: readonly Fragment[],
  deps: AskDependencies,
  options: AskOptions,
): Promise<AskResult> {
  if (!question.trim())
    throw new ConfigError('Question must not be empty')
  const overviewShare = options.overviewShare ?? 0.25
  if (!(overviewShare > 0 && overviewShare < 1))
    throw new ConfigError(`overviewShare must be in (0, 1), got ${overviewShare}`)

  const headroom = options.headroom ?? DEFAULT_HEADROOM
  const selectorBudget = makeBudget(options.selectorTokens, options.selectorHeadroom ?? headroom)
  const analyzerBudget = makeBudget(options.analyzerTokens, options.analyzerHeadroom ?? headroom)

  const corpus = orderFragments(fragments)
  if (corpus.length === 0)
    throw new SelectionExhausted('No fragments to select from', 0)

  const meter = new TokenMeter(deps.tokenCounter)
  const analyzerOverhead = deps.analyzer.overhead?.(meter) ?? NO_OVERHEAD
  const overview = fitOverview(
    buildOverview(corpus, options.overview),
    Math.floor(selectorBudget.usableCeiling * overviewShare),
    meter,
  )
  if (overview.truncated)
    log.debug('Overview truncated to fit the selector budget')

  const finish = async (
    curated: Fragment[],
    extra: Pick<AskResult, 'selection' | 'expansion'>,
  ): Promise<AskResult> => {
    const answer = await analyze(curated, question, deps.analyzer, analyzerBudget, { meter, signal: options.signal })
    return { answer, curated, overview, selectorBudget, analyzerBudget, ...extra }
  }

  if (options.earlyFit ?? true) {
    const total = estimateAnalyzerTokens(corpus, question, meter, analyzerOverhead)
    if (total <= analyzerBudget.usableCeiling) {
      log.info(`All ${corpus.length} fragments fit the analyzer budget (${total} tokens), skipping selection`)
      return finish(corpus, {})
    }
  }

  const selector = new HierarchicalSelector(deps.selector, selectorBudget, analyzerBudget, {
    meter,
    analyzerOverhead,
    maxConcurrency: options.maxConcurrency,
    maxLevels: options.maxLevels,
    lastResortPolicy: options.lastResortPolicy,
    signal: options.signal,
    onLevel: options.onLevel,
  })
  const selection = await selector.run(corpus, question, overview)

  if (!options.transitive)
    return finish(selection.fragments, { selection })

  const expansion = expandDependencies(selection.fragments, corpus, meter, analyzerBudget, analyzerOverhead, question)
  log.info(`Transitive expansion added ${expansion.added.length} files`)
  return finish(expansion.fragments, { selection, expansion })
}
