import type { PromptOverhead } from './budget'
import type { Fragment, TokenMeter } from './fragment'
import type { Group } from './partition'
import { z } from 'zod/v4'
import { OracleContractError } from './errors'

/**
 * One selector call: the shared overview plus one group of fragments
 */
export interface SelectorRequest {
  question: string
  overview: string
  group: Group
  level: number
  signal?: AbortSignal
}

/**
 * Judges which fragments of a group are relevant to the question.
 * The response is validated against {@link SelectorResponseSchema}.
 */
export interface SelectorOracle {
  select: (request: SelectorRequest) => Promise<unknown>
  /** Fixed prompt cost the oracle adds around overview and fragments */
  overhead?: (meter: TokenMeter) => PromptOverhead
}

export interface AnalyzerRequest {
  question: string
  fragments: readonly Fragment[]
  signal?: AbortSignal
}

/**
 * Answers the question from the curated fragments.
 * The response is validated against {@link AnalyzerResponseSchema}.
 */
export interface AnalyzerOracle {
  analyze: (request: AnalyzerRequest) => Promise<unknown>
  overhead?: (meter: TokenMeter) => PromptOverhead
}

export const SelectionVerdictSchema = z.object({
  path: z.string().min(1),
  relevant: z.boolean(),
  rationale: z.string().nullish(),
})

export type SelectionVerdict = z.infer<typeof SelectionVerdictSchema>

export const SelectorResponseSchema = z.array(SelectionVerdictSchema)

export const AnalyzerResponseSchema = z.object({
  answer: z.string(),
})

export type AnalyzerResponse = z.infer<typeof AnalyzerResponseSchema>

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
}

/**
 * Validate a selector response against the group it answers. Paths outside
 * the group and repeated paths break the contract; members without a
 * verdict count as not relevant.
 */
export function parseSelectorResponse(raw: unknown, group: Group): SelectionVerdict[] {
  const parsed = SelectorResponseSchema.safeParse(raw)
  if (!parsed.success) {
    throw new OracleContractError(`Malformed selector response for group ${group.index}`, issuesOf(parsed.error))
  }

  const members = new Set(group.fragments.map(f => f.path))
  const seen = new Set<string>()
  const issues: string[] = []
  for (const verdict of parsed.data) {
    if (!members.has(verdict.path))
      issues.push(`${verdict.path}: not a member of group ${group.index}`)
    else if (seen.has(verdict.path))
      issues.push(`${verdict.path}: duplicate verdict`)
    seen.add(verdict.path)
  }
  if (issues.length > 0) {
    throw new OracleContractError(`Selector response does not match group ${group.index}`, issues)
  }
  return parsed.data
}

export function parseAnalyzerResponse(raw: unknown): AnalyzerResponse {
  const parsed = AnalyzerResponseSchema.safeParse(raw)
  if (!parsed.success) {
    throw new OracleContractError('Malformed analyzer response', issuesOf(parsed.error))
  }
  return parsed.data
}
