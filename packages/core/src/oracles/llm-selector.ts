import type { PromptOverhead } from '../budget'
import type { TokenMeter } from '../fragment'
import type { SelectorOracle, SelectorRequest } from '../oracle'
import type { LLMClient } from '@reposieve/utils/llm'
import { LLMOutputError } from '@reposieve/utils/llm'
import { createLogger } from '@reposieve/utils/logger'
import { z } from 'zod/v4'
import { documentFrame } from '../cxml'
import { OracleContractError } from '../errors'
import { SelectionVerdictSchema } from '../oracle'
import { buildSelectorPrompt, SELECTOR_SYSTEM_PROMPT } from './prompts'

const log = createLogger('LLMSelectorOracle')

const SelectorOutputSchema = z.object({
  verdicts: z.array(SelectionVerdictSchema),
})

/**
 * Selector oracle backed by a (cheap, long-context) LLM.
 *
 * @example
 * ```typescript
 * const client = new LLMClient({ provider: 'google', model: 'gemini-2.5-flash' })
 * const oracle = new LLMSelectorOracle(client)
 * ```
 */
export class LLMSelectorOracle implements SelectorOracle {
  constructor(private readonly client: LLMClient) {}

  async select(request: SelectorRequest): Promise<unknown> {
    const { question, overview, group, level, signal } = request
    log.debug(`Level ${level}, group ${group.index}: ${group.fragments.length} files`)
    const prompt = buildSelectorPrompt(question, overview, group.fragments)
    try {
      const output = await this.client.completeJSON(prompt, SELECTOR_SYSTEM_PROMPT, SelectorOutputSchema, { signal })
      return output.verdicts
    }
    catch (error) {
      if (error instanceof LLMOutputError)
        throw new OracleContractError(`Malformed selector response for group ${group.index}`, [error.message, ...error.issues])
      throw error
    }
  }

  overhead(meter: TokenMeter): PromptOverhead {
    return {
      perCall: meter.count(SELECTOR_SYSTEM_PROMPT) + meter.count(buildSelectorPrompt('', '', [])),
      perFragment: meter.count(documentFrame()),
      countsPaths: true,
    }
  }
}
