import { estimateAnalyzerTokens, makeBudget } from '@reposieve/core/budget'
import { OracleContractError } from '@reposieve/core/errors'
import { createFragment, TokenMeter } from '@reposieve/core/fragment'
import { LLMAnalyzerOracle } from '@reposieve/core/oracles/llm-analyzer'
import { LLMSelectorOracle } from '@reposieve/core/oracles/llm-selector'
import { ANALYZER_SYSTEM_PROMPT, SELECTOR_SYSTEM_PROMPT } from '@reposieve/core/oracles/prompts'
import { HierarchicalSelector } from '@reposieve/core/selector'
import { LLMClient } from '@reposieve/utils/llm'
import { estimateTokenCount, estimatingTokenCounter } from '@reposieve/utils/token-counter'
import { generateText } from 'ai'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { overviewOf, wordMeter } from './helpers'

vi.mock('@ai-sdk/google', () => ({
  createGoogleGenerativeAI: vi.fn(() => vi.fn(() => 'mock-model')),
}))

vi.mock('ai', () => ({
  generateText: vi.fn(),
  Output: {
    object: vi.fn(({ schema }: { schema: unknown }) => ({ type: 'object', schema })),
  },
}))

const usage = { inputTokens: 100, outputTokens: 20 }

const group = {
  index: 0,
  tokens: 50,
  fragments: [
    createFragment({ path: 'src/auth.ts', content: 'export function login() {}' }),
    createFragment({ path: 'src/math.ts', content: 'export const add = (a, b) => a + b' }),
  ],
}

describe('LLMSelectorOracle', () => {
  beforeEach(() => {
    vi.mocked(generateText).mockReset()
  })

  it('asks for verdicts on the group in CXML', async () => {
    vi.mocked(generateText).mockResolvedValue({
      output: { verdicts: [{ path: 'src/auth.ts', relevant: true, rationale: 'defines login' }] },
      text: '',
      usage,
      steps: [],
    } as any)
    const oracle = new LLMSelectorOracle(new LLMClient({ provider: 'google' }))

    const verdicts = await oracle.select({ question: 'How does login work?', overview: 'TREE', group, level: 1 })

    expect(verdicts).toEqual([{ path: 'src/auth.ts', relevant: true, rationale: 'defines login' }])
    const call = vi.mocked(generateText).mock.calls[0]?.[0]
    expect(call?.system).toBe(SELECTOR_SYSTEM_PROMPT)
    expect(call?.prompt).toContain('How does login work?\n----\nPROJECT OVERVIEW:\nTREE')
    expect(call?.prompt).toContain('<source>src/auth.ts</source>')
    expect(call?.prompt).toContain('<document index="2">\n<source>src/math.ts</source>')
  })

  it('falls back to JSON in the text', async () => {
    vi.mocked(generateText).mockResolvedValue({
      output: undefined,
      text: '```json\n{"verdicts":[{"path":"src/math.ts","relevant":false}]}\n```',
      usage,
      steps: [{ finishReason: 'stop' }],
    } as any)
    const oracle = new LLMSelectorOracle(new LLMClient({ provider: 'google' }))

    expect(await oracle.select({ question: 'q', overview: '', group, level: 1 })).toEqual([{ path: 'src/math.ts', relevant: false }])
  })

  it('feeds the selector through its contract check', async () => {
    vi.mocked(generateText).mockResolvedValue({
      output: { verdicts: [{ path: 'src/invented.ts', relevant: true }] },
      text: '',
      usage,
      steps: [],
    } as any)
    const oracle = new LLMSelectorOracle(new LLMClient({ provider: 'google' }))
    const selector = new HierarchicalSelector(oracle, makeBudget(100_000), makeBudget(100_000), { meter: wordMeter() })

    await expect(selector.run(group.fragments, 'q', overviewOf(0))).rejects.toThrow(OracleContractError)
  })

  it('reports a malformed structured answer as a contract violation', async () => {
    vi.mocked(generateText).mockResolvedValue({
      output: undefined,
      text: '{"verdicts":[{"path":"src/auth.ts","relevant":"yes"}]}',
      usage,
      steps: [{ finishReason: 'stop' }],
    } as any)
    const oracle = new LLMSelectorOracle(new LLMClient({ provider: 'google' }))
    const selector = new HierarchicalSelector(oracle, makeBudget(100_000), makeBudget(100_000), { meter: wordMeter() })

    const run = selector.run(group.fragments, 'q', overviewOf(0))

    await expect(run).rejects.toThrow(OracleContractError)
    await expect(run).rejects.toThrow('Malformed selector response for group 0')
  })

  it('reports a reply without JSON as a contract violation', async () => {
    vi.mocked(generateText).mockResolvedValue({
      output: undefined,
      text: 'I could not decide.',
      usage,
      steps: [{ finishReason: 'stop' }],
    } as any)
    const oracle = new LLMSelectorOracle(new LLMClient({ provider: 'google' }))

    await expect(oracle.select({ question: 'q', overview: '', group, level: 1 })).rejects.toThrow(OracleContractError)
  })

  it('accepts a null rationale', async () => {
    vi.mocked(generateText).mockResolvedValue({
      output: { verdicts: [{ path: 'src/auth.ts', relevant: true, rationale: null }] },
      text: '',
      usage,
      steps: [],
    } as any)
    const oracle = new LLMSelectorOracle(new LLMClient({ provider: 'google' }))
    const selector = new HierarchicalSelector(oracle, makeBudget(100_000), makeBudget(100_000), { meter: wordMeter() })

    const result = await selector.run(group.fragments, 'q', overviewOf(0))

    expect(result.fragments.map(f => f.path)).toEqual(['src/auth.ts'])
  })

  it('reports its prompt overhead', () => {
    const oracle = new LLMSelectorOracle(new LLMClient({ provider: 'google' }))
    const overhead = oracle.overhead(wordMeter())
    expect(overhead.perFragment).toBe(6)
    expect(overhead.countsPaths).toBe(true)
    expect(overhead.perCall).toBeGreaterThan(wordMeter().count(SELECTOR_SYSTEM_PROMPT))
  })

  it('keeps every rendered request within the selector ceiling', async () => {
    const requests: string[] = []
    vi.mocked(generateText).mockImplementation(async (params) => {
      const prompt = String(params.prompt)
      requests.push(`${String(params.system)}\u0000${prompt}`)
      const paths = [...prompt.matchAll(/<source>(.*?)<\/source>/g)].map(m => m[1] ?? '')
      return {
        output: { verdicts: paths.map(path => ({ path, relevant: path === 'src/auth.ts' })) },
        text: '',
        usage,
        steps: [],
      } as any
    })
    const deep = 'deeply-nested-feature-directory/'.repeat(3)
    const fragments = [
      ...Array.from({ length: 40 }, (_, i) => createFragment({
        path: `packages/module-${i}/src/${deep}implementation-${i}.ts`,
        content: `export const value${i} = ${i}\n`,
      })),
      createFragment({ path: 'src/auth.ts', content: 'export function login() {}\n' }),
      createFragment({
        path: 'src/generated-table.ts',
        content: Array.from({ length: 400 }, (_, i) => `export const row${i} = 12345678\n`).join(''),
      }),
    ]
    const meter = new TokenMeter(estimatingTokenCounter)
    const oracle = new LLMSelectorOracle(new LLMClient({ provider: 'google' }))
    const selector = new HierarchicalSelector(oracle, makeBudget(2000, 0), makeBudget(100_000), { meter })

    const result = await selector.run(fragments, 'How does login work?', overviewOf(0))

    expect(result.fragments.map(f => f.path)).toEqual(['src/auth.ts'])
    expect(requests.length).toBeGreaterThan(1)
    for (const request of requests) {
      const [system = '', prompt = ''] = request.split('\u0000')
      expect(estimateTokenCount(system) + estimateTokenCount(prompt)).toBeLessThanOrEqual(2000)
    }
  })
})

describe('LLMAnalyzerOracle', () => {
  beforeEach(() => {
    vi.mocked(generateText).mockReset()
  })

  it('returns the trimmed completion as the answer', async () => {
    vi.mocked(generateText).mockResolvedValue({ text: '  Login is in src/auth.ts.\n', usage, steps: [] } as any)
    const oracle = new LLMAnalyzerOracle(new LLMClient({ provider: 'google' }))

    const response = await oracle.analyze({ question: 'Where is login?', fragments: group.fragments })

    expect(response).toEqual({ answer: 'Login is in src/auth.ts.' })
    const call = vi.mocked(generateText).mock.calls[0]?.[0]
    expect(call?.system).toBe(ANALYZER_SYSTEM_PROMPT)
    expect(call?.prompt).toMatch(/^Where is login\?\n\n<documents>\n<document index="1">/)
  })

  it('keeps the rendered request within the estimate it was admitted on', async () => {
    vi.mocked(generateText).mockResolvedValue({ text: 'ok', usage, steps: [] } as any)
    const meter = new TokenMeter(estimatingTokenCounter)
    const oracle = new LLMAnalyzerOracle(new LLMClient({ provider: 'google' }))
    const fragments = Array.from({ length: 12 }, (_, i) => createFragment({
      path: `services/billing/internal/adapters/persistence/repositories/invoice-${i}.ts`,
      content: `export const id${i} = ${i}\n`,
    }))

    await oracle.analyze({ question: 'Where are invoices stored?', fragments })

    const call = vi.mocked(generateText).mock.calls[0]?.[0]
    const rendered = estimateTokenCount(String(call?.system)) + estimateTokenCount(String(call?.prompt))
    expect(rendered).toBeLessThanOrEqual(estimateAnalyzerTokens(fragments, 'Where are invoices stored?', meter, oracle.overhead(meter)))
  })

  it('propagates transport errors', async () => {
    vi.mocked(generateText).mockRejectedValue(new Error('503 Service Unavailable'))
    const oracle = new LLMAnalyzerOracle(new LLMClient({ provider: 'google' }))

    await expect(oracle.analyze({ question: 'q', fragments: [] })).rejects.toThrow('503 Service Unavailable')
  })
})
