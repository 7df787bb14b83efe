import type { Fragment, TokenMeter } from './fragment'
import { ConfigError } from './errors'

export const DEFAULT_HEADROOM = 0.15

/**
 * Token ceiling for one oracle role. `usableCeiling` is what callers may
 * actually spend once headroom is set aside.
 */
export interface Budget {
  readonly totalCeiling: number
  readonly headroomFraction: number
  readonly usableCeiling: number
}

/**
 * Fixed prompt cost of an oracle: once per call, and once per fragment for
 * the framing around its content.
 */
export interface PromptOverhead {
  perCall: number
  /** Framing around each fragment, path excluded */
  perFragment: number
  /** The request repeats each fragment's path, which costs its own tokens */
  countsPaths?: boolean
}

/** The per-fragment part of a `PromptOverhead` */
export type FragmentFraming = Pick<PromptOverhead, 'perFragment' | 'countsPaths'>

export const NO_OVERHEAD: Readonly<PromptOverhead> = Object.freeze({ perCall: 0, perFragment: 0 })

// Absorbs binary floating-point error such as 1000 * 0.9 = 899.9999999999999.
const FLOOR_EPSILON = 1e-9

export function makeBudget(totalCeiling: number, headroomFraction: number = DEFAULT_HEADROOM): Budget {
  if (!Number.isSafeInteger(totalCeiling) || totalCeiling <= 0) {
    throw new ConfigError(`Token ceiling must be a positive integer, got ${totalCeiling}`)
  }
  if (!Number.isFinite(headroomFraction) || headroomFraction < 0 || headroomFraction >= 1) {
    throw new ConfigError(`Headroom must be in [0, 1), got ${headroomFraction}`)
  }
  return Object.freeze({
    totalCeiling,
    headroomFraction,
    usableCeiling: Math.floor(totalCeiling * (1 - headroomFraction) + FLOOR_EPSILON),
  })
}

/**
 * Tokens left for reporting, clamped at zero. Use `fits` to decide.
 */
export function remaining(budget: Budget, consumed: number): number {
  return Math.max(0, budget.usableCeiling - consumed)
}

export function fits(budget: Budget, consumed: number): boolean {
  return consumed <= budget.usableCeiling
}

/**
 * Running total against a budget. Additions that would cross the usable
 * ceiling are rejected and leave the total untouched.
 */
export class BudgetLedger {
  private spent: number

  constructor(
    readonly budget: Budget,
    initial = 0,
  ) {
    this.spent = initial
  }

  get consumed(): number {
    return this.spent
  }

  get remaining(): number {
    return remaining(this.budget, this.spent)
  }

  tryAdd(tokens: number): boolean {
    if (!fits(this.budget, this.spent + tokens))
      return false
    this.spent += tokens
    return true
  }
}

/** Tokens added around the content of a fragment at `path`. */
export function framingCost(path: string, meter: TokenMeter, framing: FragmentFraming): number {
  return framing.perFragment + (framing.countsPaths ? meter.count(path) : 0)
}

/** Tokens one fragment costs inside an oracle request. */
export function fragmentCost(fragment: Fragment, meter: TokenMeter, framing: FragmentFraming): number {
  return meter.measure(fragment) + framingCost(fragment.path, meter, framing)
}

/** Fixed cost of one selector call: overview, question and prompt overhead. */
export function selectorFixedTokens(overviewText: string, question: string, meter: TokenMeter, overhead: PromptOverhead): number {
  return meter.count(overviewText) + meter.count(question) + overhead.perCall
}

/** Estimated size of an analyzer request for the given fragments. */
export function estimateAnalyzerTokens(
  fragments: readonly Fragment[],
  question: string,
  meter: TokenMeter,
  overhead: PromptOverhead,
): number {
  return fragments.reduce(
    (sum, f) => sum + fragmentCost(f, meter, overhead),
    meter.count(question) + overhead.perCall,
  )
}
