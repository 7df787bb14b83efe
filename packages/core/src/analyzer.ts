import type { Budget, PromptOverhead } from './budget'
import type { Fragment, TokenMeter } from './fragment'
import type { AnalyzerOracle } from './oracle'
import { createLogger } from '@reposieve/utils/logger'
import { estimateAnalyzerTokens, NO_OVERHEAD } from './budget'
import { BudgetExceeded } from './errors'
import { parseAnalyzerResponse } from './oracle'

const log = createLogger('Analyzer')

export interface AnalyzeOptions {
  meter: TokenMeter
  signal?: AbortSignal
}

/**
 * Send the curated fragments to the analyzer oracle in a single call.
 *
 * The request size is re-estimated here with the oracle's own overhead;
 * `BudgetExceeded` is thrown before any call is made when it crosses the
 * usable ceiling.
 */
export async function analyze(
  curated: readonly Fragment[],
  question: string,
  oracle: AnalyzerOracle,
  budget: Budget,
  options: AnalyzeOptions,
): Promise<string> {
  const overhead: PromptOverhead = oracle.overhead?.(options.meter) ?? NO_OVERHEAD
  const estimated = estimateAnalyzerTokens(curated, question, options.meter, overhead)
  if (estimated > budget.usableCeiling)
    throw new BudgetExceeded(estimated, budget.usableCeiling)

  log.debug(`Analyzing ${curated.length} fragments (${estimated}/${budget.usableCeiling} tokens)`)
  const raw = await oracle.analyze({ question, fragments: curated, signal: options.signal })
  return parseAnalyzerResponse(raw).answer
}
