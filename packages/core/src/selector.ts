import type { Budget, PromptOverhead } from './budget'
import type { Fragment, TokenMeter } from './fragment'
import type { Overview } from './overview'
import type { SelectorOracle } from './oracle'
import type { Group } from './partition'
import { createLogger } from '@reposieve/utils/logger'
import { BudgetLedger, estimateAnalyzerTokens, fragmentCost, NO_OVERHEAD, selectorFixedTokens } from './budget'
import { runConcurrent } from './concurrency'
import { ConfigError, SelectionExhausted } from './errors'
import { orderFragments } from './fragment'
import { parseSelectorResponse } from './oracle'
import { partitionFragments } from './partition'

const log = createLogger('HierarchicalSelector')

/**
 * Where oversized fragments rank in the truncation fallback
 */
export type LastResortPolicy = 'first' | 'last'

export type Termination = 'fit' | 'stalled' | 'level-cap'

export interface SelectorOptions {
  /** Memoizing token meter shared with the rest of the run */
  meter: TokenMeter
  /** Fixed prompt cost of the analyzer (default: none) */
  analyzerOverhead?: PromptOverhead
  /** Maximum selector calls in flight per level (default: 4) */
  maxConcurrency?: number
  /** Hard cap on levels before the truncation fallback (default: 6) */
  maxLevels?: number
  /** Priority of oversized fragments in the fallback (default: 'last') */
  lastResortPolicy?: LastResortPolicy
  signal?: AbortSignal
  /** Called after each level is reduced */
  onLevel?: (report: LevelReport) => void
}

export interface LevelReport {
  level: number
  candidates: number
  groups: number
  /** Oversized pieces found at this level */
  oversized: number
  relevant: number
}

export interface SelectionResult {
  /** Curated fragments in path order, within the analyzer usable ceiling */
  fragments: Fragment[]
  /** Oversized fragments that were never dispatched */
  lastResort: Fragment[]
  /** Candidates left out of `fragments` for lack of room */
  trimmed: Fragment[]
  levels: LevelReport[]
  termination: Termination
  /** Estimated analyzer request size for `fragments` */
  tokens: number
}

/**
 * Token-budgeted hierarchical selection.
 *
 * Each level packs the candidates into groups that fit one selector call,
 * asks the selector oracle which members are relevant, and keeps the union.
 * Levels repeat until the survivors fit the analyzer budget, the selector
 * stops excluding anything, or the level cap is reached; the last two end in
 * a deterministic truncation.
 *
 * @example
 * ```typescript
 * const selector = new HierarchicalSelector(oracle, selectorBudget, analyzerBudget, { meter })
 * const result = await selector.run(fragments, question, overview)
 * ```
 */
export class HierarchicalSelector {
  private readonly options: Required<Omit<SelectorOptions, 'signal' | 'onLevel'>> & Pick<SelectorOptions, 'signal' | 'onLevel'>
  private readonly selectorOverhead: PromptOverhead

  constructor(
    private readonly oracle: SelectorOracle,
    private readonly selectorBudget: Budget,
    private readonly analyzerBudget: Budget,
    options: SelectorOptions,
  ) {
    this.options = {
      ...options,
      analyzerOverhead: options.analyzerOverhead ?? NO_OVERHEAD,
      maxConcurrency: options.maxConcurrency ?? 4,
      maxLevels: options.maxLevels ?? 6,
      lastResortPolicy: options.lastResortPolicy ?? 'last',
    }
    if (!Number.isInteger(this.options.maxConcurrency) || this.options.maxConcurrency < 1)
      throw new ConfigError(`maxConcurrency must be a positive integer, got ${this.options.maxConcurrency}`)
    if (!Number.isInteger(this.options.maxLevels) || this.options.maxLevels < 1)
      throw new ConfigError(`maxLevels must be a positive integer, got ${this.options.maxLevels}`)
    this.selectorOverhead = oracle.overhead?.(this.options.meter) ?? NO_OVERHEAD
  }

  async run(fragments: readonly Fragment[], question: string, overview: Overview): Promise<SelectionResult> {
    const { meter, maxLevels } = this.options
    const fixedTokens = selectorFixedTokens(overview.text, question, meter, this.selectorOverhead)
    const levels: LevelReport[] = []
    const lastResort: Fragment[] = []
    let candidates = orderFragments(fragments)

    for (let level = 1; ; level++) {
      const { groups, oversized } = partitionFragments(candidates, meter, {
        ceiling: this.selectorBudget.usableCeiling,
        fixedTokens,
        perFragment: this.selectorOverhead.perFragment,
        countsPaths: this.selectorOverhead.countsPaths,
      })
      lastResort.push(...oversized)
      const dispatched = groups.flatMap(g => g.fragments)

      if (groups.length === 0) {
        log.warn(`Level ${level}: every candidate is oversized, nothing to dispatch`)
        levels.push(this.report({ level, candidates: candidates.length, groups: 0, oversized: oversized.length, relevant: 0 }))
        return this.truncate([], lastResort, question, levels, 'stalled', level)
      }

      log.debug(`Level ${level}: ${dispatched.length} candidates in ${groups.length} groups (${oversized.length} oversized)`)
      const relevant = await this.dispatch(groups, question, overview.text, level)
      const reduced = dispatched.filter(f => relevant.has(f.path))
      levels.push(this.report({ level, candidates: dispatched.length, groups: groups.length, oversized: oversized.length, relevant: reduced.length }))

      if (reduced.length === 0)
        throw new SelectionExhausted(`No fragment was judged relevant at level ${level}`, level)

      const tokens = estimateAnalyzerTokens(reduced, question, meter, this.options.analyzerOverhead)
      if (tokens <= this.analyzerBudget.usableCeiling) {
        log.info(`Selected ${reduced.length} fragments (${tokens} tokens) after ${level} level(s)`)
        return this.finish(reduced, lastResort, question, levels, 'fit')
      }

      if (reduced.length === dispatched.length) {
        log.warn(`Level ${level}: selector kept all ${reduced.length} candidates, truncating`)
        return this.truncate(reduced, lastResort, question, levels, 'stalled', level)
      }
      if (level >= maxLevels) {
        log.warn(`Level cap ${maxLevels} reached with ${reduced.length} candidates, truncating`)
        return this.truncate(reduced, lastResort, question, levels, 'level-cap', level)
      }
      candidates = reduced
    }
  }

  /**
   * One selector call per group; returns the paths judged relevant.
   * Each call validates its own verdicts and the union is taken after the
   * whole level settles.
   */
  private async dispatch(groups: Group[], question: string, overview: string, level: number): Promise<Set<string>> {
    const tasks = groups.map(group => async (signal: AbortSignal) => {
      const raw = await this.oracle.select({ question, overview, group, level, signal })
      return parseSelectorResponse(raw, group)
    })
    const results = await runConcurrent(tasks, this.options.maxConcurrency, this.options.signal)

    const relevant = new Set<string>()
    for (const verdicts of results) {
      for (const verdict of verdicts) {
        if (verdict.relevant)
          relevant.add(verdict.path)
      }
    }
    return relevant
  }

  private report(report: LevelReport): LevelReport {
    this.options.onLevel?.(report)
    return report
  }

  /**
   * Selection fit: append last-resort candidates while room remains.
   */
  private finish(
    selected: Fragment[],
    lastResort: Fragment[],
    question: string,
    levels: LevelReport[],
    termination: Termination,
  ): SelectionResult {
    const ledger = this.ledger(question)
    for (const fragment of selected) {
      ledger.tryAdd(fragmentCost(fragment, this.options.meter, this.options.analyzerOverhead))
    }
    const { kept, dropped } = this.fill(orderFragments(lastResort), ledger)
    return this.result([...selected, ...kept], lastResort, dropped, question, levels, termination)
  }

  /**
   * Take fragments in priority order until the analyzer budget is full,
   * skipping any that no longer fit.
   */
  private truncate(
    candidates: Fragment[],
    lastResort: Fragment[],
    question: string,
    levels: LevelReport[],
    termination: Termination,
    level: number,
  ): SelectionResult {
    const extras = orderFragments(lastResort)
    const priority = this.options.lastResortPolicy === 'first'
      ? [...extras, ...candidates]
      : [...candidates, ...extras]
    const { kept, dropped } = this.fill(priority, this.ledger(question))
    if (kept.length === 0)
      throw new SelectionExhausted(`No candidate fits the analyzer budget of ${this.analyzerBudget.usableCeiling} tokens`, level)
    log.info(`Truncated to ${kept.length} fragments, ${dropped.length} left out`)
    return this.result(kept, lastResort, dropped, question, levels, termination)
  }

  private ledger(question: string): BudgetLedger {
    const { meter, analyzerOverhead } = this.options
    return new BudgetLedger(this.analyzerBudget, meter.count(question) + analyzerOverhead.perCall)
  }

  private fill(priority: Fragment[], ledger: BudgetLedger): { kept: Fragment[], dropped: Fragment[] } {
    const kept: Fragment[] = []
    const dropped: Fragment[] = []
    for (const fragment of priority) {
      if (ledger.tryAdd(fragmentCost(fragment, this.options.meter, this.options.analyzerOverhead)))
        kept.push(fragment)
      else
        dropped.push(fragment)
    }
    return { kept, dropped }
  }

  private result(
    selected: Fragment[],
    lastResort: Fragment[],
    trimmed: Fragment[],
    question: string,
    levels: LevelReport[],
    termination: Termination,
  ): SelectionResult {
    const fragments = orderFragments(selected)
    return {
      fragments,
      lastResort: orderFragments(lastResort),
      trimmed: orderFragments(trimmed),
      levels,
      termination,
      tokens: estimateAnalyzerTokens(fragments, question, this.options.meter, this.options.analyzerOverhead),
    }
  }
}

/**
 * Curated fragments for `question`, in path order and within the analyzer
 * usable ceiling. Throws `SelectionExhausted` when nothing survives.
 */
export async function select(
  fragments: readonly Fragment[],
  question: string,
  overview: Overview,
  oracle: SelectorOracle,
  selectorBudget: Budget,
  analyzerBudget: Budget,
  options: SelectorOptions,
): Promise<Fragment[]> {
  const result = await new HierarchicalSelector(oracle, selectorBudget, analyzerBudget, options).run(fragments, question, overview)
  return result.fragments
}
