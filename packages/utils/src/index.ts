export { humanSize } from './format'
export { clearGitPathCache, resolveGitBinary } from './git-path'

export { LLMClient, LLMOutputError, parseModelString } from './llm'
export type { CallOptions, LLMOptions, LLMProvider, LLMResponse, TokenUsageStats } from './llm'

export { createLogger, logger, LogLevels, setLogLevel } from './logger'

export { estimateTokenCount, estimatingTokenCounter, normalizeTokenCounter, tiktokenCounter } from './token-counter'
export type { TokenCounter } from './token-counter'
