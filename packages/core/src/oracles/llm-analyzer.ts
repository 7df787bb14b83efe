import type { PromptOverhead } from '../budget'
import type { TokenMeter } from '../fragment'
import type { AnalyzerOracle, AnalyzerRequest, AnalyzerResponse } from '../oracle'
import type { LLMClient } from '@reposieve/utils/llm'
import { documentFrame } from '../cxml'
import { ANALYZER_SYSTEM_PROMPT, buildAnalyzerPrompt } from './prompts'

/**
 * Analyzer oracle: one free-text completion over the curated files
 */
export class LLMAnalyzerOracle implements AnalyzerOracle {
  constructor(private readonly client: LLMClient) {}

  async analyze(request: AnalyzerRequest): Promise<AnalyzerResponse> {
    const prompt = buildAnalyzerPrompt(request.question, request.fragments)
    const response = await this.client.complete(prompt, ANALYZER_SYSTEM_PROMPT, { signal: request.signal })
    return { answer: response.content.trim() }
  }

  overhead(meter: TokenMeter): PromptOverhead {
    return {
      perCall: meter.count(ANALYZER_SYSTEM_PROMPT) + meter.count(buildAnalyzerPrompt('', [])),
      perFragment: meter.count(documentFrame()),
      countsPaths: true,
    }
  }
}
