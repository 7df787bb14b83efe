/**
 * Error codes for a question-answering run
 */
export const ReposieveErrorCode = {
  CONFIG: 'CONFIG_ERROR',
  ORACLE_CONTRACT: 'ORACLE_CONTRACT_VIOLATION',
  SELECTION_EXHAUSTED: 'SELECTION_EXHAUSTED',
  BUDGET_EXCEEDED: 'BUDGET_EXCEEDED',
} as const

export type ReposieveErrorCode = (typeof ReposieveErrorCode)[keyof typeof ReposieveErrorCode]

/**
 * Base class for every classified failure of a run
 */
export class ReposieveError extends Error {
  constructor(
    public readonly code: ReposieveErrorCode,
    message: string,
  ) {
    super(message)
    this.name = 'ReposieveError'
  }
}

/**
 * Invalid budget, headroom or run parameters. Fatal, never retried.
 */
export class ConfigError extends ReposieveError {
  constructor(message: string) {
    super(ReposieveErrorCode.CONFIG, message)
    this.name = 'ConfigError'
  }
}

/**
 * An oracle response does not match the request it answers.
 */
export class OracleContractError extends ReposieveError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(ReposieveErrorCode.ORACLE_CONTRACT, message)
    this.name = 'OracleContractError'
  }
}

/**
 * Nothing relevant was found, or nothing relevant survives the analyzer budget.
 * A definitive "no answer possible" outcome.
 */
export class SelectionExhausted extends ReposieveError {
  constructor(
    message: string,
    public readonly level: number,
  ) {
    super(ReposieveErrorCode.SELECTION_EXHAUSTED, message)
    this.name = 'SelectionExhausted'
  }
}

/**
 * The analyzer request would exceed its usable token ceiling.
 */
export class BudgetExceeded extends ReposieveError {
  constructor(
    public readonly estimated: number,
    public readonly ceiling: number,
  ) {
    super(ReposieveErrorCode.BUDGET_EXCEEDED, `Analyzer request needs ${estimated} tokens, usable ceiling is ${ceiling}`)
    this.name = 'BudgetExceeded'
  }
}
