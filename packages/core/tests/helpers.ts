import type { Fragment } from '@reposieve/core/fragment'
import type { AnalyzerOracle, SelectorOracle, SelectorRequest } from '@reposieve/core/oracle'
import type { TokenCounter } from '@reposieve/utils/token-counter'
import { createFragment, TokenMeter } from '@reposieve/core/fragment'
import { overviewFromText } from '@reposieve/core/overview'

/** One token per whitespace-separated word */
export const wordCounter: TokenCounter = {
  count: text => text.split(/\s+/).filter(Boolean).length,
}

export function wordMeter(): TokenMeter {
  return new TokenMeter(wordCounter)
}

/** Text of exactly `n` word tokens on one line */
export function words(n: number, word = 'tok'): string {
  return Array.from({ length: n }, () => word).join(' ')
}

/** Text of `n` lines holding one token each */
export function tokenLines(n: number): string {
  return Array.from({ length: n }, (_, i) => `l${i + 1}\n`).join('')
}

export function fragmentOf(path: string, tokens: number): Fragment {
  return createFragment({ path, content: words(tokens) })
}

/** Overview whose text costs exactly `tokens` */
export function overviewOf(tokens: number) {
  return overviewFromText(words(tokens, 'ov'))
}

export interface FakeSelector extends SelectorOracle {
  requests: SelectorRequest[]
}

/**
 * Selector that marks members relevant by predicate and records requests.
 */
export function fakeSelector(isRelevant: (path: string) => boolean): FakeSelector {
  const requests: SelectorRequest[] = []
  return {
    requests,
    async select(request) {
      requests.push(request)
      return request.group.fragments.map(f => ({ path: f.path, relevant: isRelevant(f.path) }))
    },
  }
}

export interface FakeAnalyzer extends AnalyzerOracle {
  calls: Fragment[][]
}

export function fakeAnalyzer(answer = 'the answer'): FakeAnalyzer {
  const calls: Fragment[][] = []
  return {
    calls,
    async analyze(request) {
      calls.push([...request.fragments])
      return { answer }
    },
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}
