// Analyzer adapter
export { analyze } from './analyzer'
export type { AnalyzeOptions } from './analyzer'

// Budgets and request estimates
export {
  BudgetLedger,
  DEFAULT_HEADROOM,
  estimateAnalyzerTokens,
  fits,
  fragmentCost,
  framingCost,
  makeBudget,
  NO_OVERHEAD,
  remaining,
  selectorFixedTokens,
} from './budget'
export type { Budget, FragmentFraming, PromptOverhead } from './budget'

export { runConcurrent } from './concurrency'
export type { AbortableTask } from './concurrency'

export { documentFrame, renderDocument, renderDocuments } from './cxml'

// Transitive expansion
export { collectImportRefs, expandDependencies, resolveRefsToPaths } from './dependencies'
export type { ExpansionResult } from './dependencies'

export {
  BudgetExceeded,
  ConfigError,
  OracleContractError,
  ReposieveError,
  ReposieveErrorCode,
  SelectionExhausted,
} from './errors'

// Fragment model
export {
  compareFragments,
  createFragment,
  orderFragments,
  sourcePath,
  subFragmentPath,
  TokenMeter,
} from './fragment'
export type { Fragment, FragmentInit, FragmentOrigin } from './fragment'

// Oracle contracts
export {
  AnalyzerResponseSchema,
  parseAnalyzerResponse,
  parseSelectorResponse,
  SelectionVerdictSchema,
  SelectorResponseSchema,
} from './oracle'
export type {
  AnalyzerOracle,
  AnalyzerRequest,
  AnalyzerResponse,
  SelectionVerdict,
  SelectorOracle,
  SelectorRequest,
} from './oracle'

export { LLMAnalyzerOracle } from './oracles/llm-analyzer'
export { LLMSelectorOracle } from './oracles/llm-selector'

export { askRepository } from './orchestrator'
export type { AskDependencies, AskOptions, AskResult } from './orchestrator'

// Overview
export { buildOverview, fitOverview, overviewFromText, TRUNCATION_MARKER } from './overview'
export type { Overview, OverviewEntry, OverviewOptions, ReadmeExcerpt } from './overview'

export { partitionFragments, splitFragment } from './partition'
export type { Group, Partition, PartitionLimits, SplitResult } from './partition'

// Hierarchical selector
export { HierarchicalSelector, select } from './selector'
export type { LastResortPolicy, LevelReport, SelectionResult, SelectorOptions, Termination } from './selector'
