import type { AnalyzerOracle } from '@reposieve/core/oracle'
import { analyze } from '@reposieve/core/analyzer'
import { makeBudget } from '@reposieve/core/budget'
import { BudgetExceeded, OracleContractError } from '@reposieve/core/errors'
import { describe, expect, it } from 'vitest'
import { fakeAnalyzer, fragmentOf, wordMeter } from './helpers'

describe('analyze', () => {
  const curated = [fragmentOf('src/a.ts', 40), fragmentOf('src/b.ts', 50)]

  it('returns the answer from a single oracle call', async () => {
    const oracle = fakeAnalyzer('It lives in src/a.ts')
    const answer = await analyze(curated, 'where is it', oracle, makeBudget(100, 0), { meter: wordMeter() })

    expect(answer).toBe('It lives in src/a.ts')
    expect(oracle.calls).toEqual([curated])
  })

  it('throws BudgetExceeded before calling the oracle', async () => {
    const oracle: AnalyzerOracle & { calls: number } = {
      calls: 0,
      async analyze() {
        this.calls++
        return { answer: 'x' }
      },
      overhead: () => ({ perCall: 5, perFragment: 2 }),
    }

    // 3 + 5 + (40 + 2) + (50 + 2) = 102
    const error = await analyze(curated, 'where is it', oracle, makeBudget(100, 0), { meter: wordMeter() }).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(BudgetExceeded)
    expect(error).toMatchObject({ estimated: 102, ceiling: 100, message: 'Analyzer request needs 102 tokens, usable ceiling is 100' })
    expect(oracle.calls).toBe(0)
  })

  it('rejects a response without an answer', async () => {
    const oracle: AnalyzerOracle = { analyze: async () => ({ text: 'hello' }) }
    await expect(analyze(curated, 'q', oracle, makeBudget(1000), { meter: wordMeter() })).rejects.toThrow(OracleContractError)
  })

  it('passes the signal through', async () => {
    const controller = new AbortController()
    let seen: AbortSignal | undefined
    const oracle: AnalyzerOracle = {
      async analyze({ signal }) {
        seen = signal
        return { answer: 'ok' }
      },
    }
    await analyze(curated, 'q', oracle, makeBudget(1000), { meter: wordMeter(), signal: controller.signal })
    expect(seen).toBe(controller.signal)
  })
})
