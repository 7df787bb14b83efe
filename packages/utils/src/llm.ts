import type { ZodType } from 'zod/v4'
import { createAnthropic } from '@ai-sdk/anthropic'
import { createGoogleGenerativeAI } from '@ai-sdk/google'
import { createOpenAI } from '@ai-sdk/openai'
import { generateText, Output } from 'ai'
import { createLogger } from './logger'

const log = createLogger('LLMClient')

/**
 * LLM provider type
 */
export type LLMProvider = 'openai' | 'anthropic' | 'google'

/**
 * LLM client options
 */
export interface LLMOptions {
  /** Provider (openai, anthropic or google) */
  provider: LLMProvider
  /** API key (defaults to environment variable) */
  apiKey?: string
  /** Model name */
  model?: string
  /** Max tokens for response */
  maxTokens?: number
  /** Temperature for sampling */
  temperature?: number
  /** Timeout in milliseconds (default: 120000) */
  timeout?: number
  /** Transport-level retries handed to the AI SDK (default: 2) */
  maxRetries?: number
  /** Error callback */
  onError?: (error: Error, context: { model: string, promptLength: number }) => void
}

/**
 * Per-call options
 */
export interface CallOptions {
  /** Aborts the request together with the client timeout */
  signal?: AbortSignal
}

/**
 * LLM response
 */
export interface LLMResponse {
  /** Generated text */
  content: string
  /** Token usage */
  usage: {
    promptTokens: number
    completionTokens: number
    totalTokens: number
  }
  /** Model used */
  model: string
}

/**
 * Default models for each provider
 */
const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: 'gpt-4.1',
  anthropic: 'claude-sonnet-4-5',
  google: 'gemini-2.5-flash',
}

const PROVIDERS = Object.keys(DEFAULT_MODELS)

/**
 * Create provider instance
 */
function createProvider(provider: LLMProvider, apiKey?: string) {
  switch (provider) {
    case 'openai':
      return createOpenAI({
        apiKey: apiKey ?? process.env.OPENAI_API_KEY,
      })
    case 'anthropic':
      return createAnthropic({
        apiKey: apiKey ?? process.env.ANTHROPIC_API_KEY,
      })
    case 'google':
      return createGoogleGenerativeAI({
        apiKey: apiKey ?? process.env.GOOGLE_API_KEY,
      })
    default:
      throw new Error(`Unsupported LLM provider: ${String(provider satisfies never)}`)
  }
}

/**
 * Cumulative token usage statistics
 */
export interface TokenUsageStats {
  totalPromptTokens: number
  totalCompletionTokens: number
  totalTokens: number
  requestCount: number
}

const INITIAL_USAGE_STATS: TokenUsageStats = {
  totalPromptTokens: 0,
  totalCompletionTokens: 0,
  totalTokens: 0,
  requestCount: 0,
}

/**
 * Parse a "provider/model" format string into provider and model components.
 *
 * @example
 * parseModelString('openai/gpt-4.1') // { provider: 'openai', model: 'gpt-4.1' }
 * parseModelString('google') // { provider: 'google', model: undefined }
 */
export function parseModelString(modelString: string): { provider: LLMProvider, model?: string } {
  const slashIndex = modelString.indexOf('/')
  if (slashIndex === -1) {
    return { provider: validateProvider(modelString) }
  }
  const provider = validateProvider(modelString.substring(0, slashIndex))
  const model = modelString.substring(slashIndex + 1)
  return { provider, model: model || undefined }
}

function isProvider(name: string): name is LLMProvider {
  return PROVIDERS.includes(name)
}

function validateProvider(name: string): LLMProvider {
  if (!isProvider(name)) {
    throw new Error(`Unknown LLM provider: "${name}". Valid providers: ${PROVIDERS.join(', ')}`)
  }
  return name
}

/**
 * The model answered, but not with output that satisfies the requested schema.
 */
export class LLMOutputError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message)
    this.name = 'LLMOutputError'
  }
}

function extractJSON(text: string): unknown {
  const jsonMatch = text.match(/```(?:json)?\n?([\s\S]*?)```/) || text.match(/\{[\s\S]*\}/)
  if (!jsonMatch) {
    throw new LLMOutputError('No JSON found in response')
  }
  try {
    return JSON.parse(jsonMatch[1] ?? jsonMatch[0])
  }
  catch (error) {
    throw new LLMOutputError(`Invalid JSON in response: ${error instanceof Error ? error.message : String(error)}`)
  }
}

function validateOutput<T>(schema: ZodType<T>, value: unknown): T {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
    throw new LLMOutputError('Model output does not match the schema', issues)
  }
  return parsed.data
}

// The SDK's `output` getter throws when no structured output was produced.
function readStructuredOutput(result: Awaited<ReturnType<typeof generateText>>): unknown {
  try {
    return result.output
  }
  catch (error) {
    log.debug(`Structured output unreadable: ${error instanceof Error ? error.message : String(error)}`)
    return undefined
  }
}

/**
 * LLM client over the Vercel AI SDK.
 *
 * Used for the relevance selector calls and the final analysis call.
 *
 * @example
 * ```typescript
 * const selector = new LLMClient({ provider: 'google', model: 'gemini-2.5-flash' })
 * const analyzer = new LLMClient({ provider: 'google', model: 'gemini-2.5-pro', temperature: 0.2 })
 * ```
 */
export class LLMClient {
  private readonly options: LLMOptions
  private readonly providerInstance: ReturnType<typeof createProvider>
  private usageStats: TokenUsageStats = { ...INITIAL_USAGE_STATS }

  constructor(options: LLMOptions) {
    this.options = {
      ...options,
      model: options.model ?? DEFAULT_MODELS[options.provider],
      maxTokens: options.maxTokens ?? 4096,
      temperature: options.temperature ?? 0,
    }
    this.providerInstance = createProvider(options.provider, options.apiKey)
  }

  /**
   * Shared helper for generateText calls with error handling and usage tracking.
   */
  private async callGenerateText(
    prompt: string,
    systemPrompt: string | undefined,
    call: CallOptions,
    output?: Parameters<typeof generateText>[0]['output'],
  ): Promise<Awaited<ReturnType<typeof generateText>>> {
    const modelId = this.getModel()
    const model = this.providerInstance(modelId)
    const timeout = AbortSignal.timeout(this.options.timeout ?? 120_000)
    const abortSignal = call.signal ? AbortSignal.any([call.signal, timeout]) : timeout

    let result: Awaited<ReturnType<typeof generateText>>
    try {
      result = await generateText({
        model,
        output,
        system: systemPrompt,
        prompt,
        maxOutputTokens: this.options.maxTokens,
        temperature: this.options.temperature,
        maxRetries: this.options.maxRetries,
        abortSignal,
      })
    }
    catch (error) {
      const err = error instanceof Error ? error : new Error(String(error))
      log.error(`${modelId} error: ${err.message}`)
      this.options.onError?.(err, { model: modelId, promptLength: prompt.length })
      throw err
    }

    const inputTokens = result.usage?.inputTokens ?? 0
    const outputTokens = result.usage?.outputTokens ?? 0
    this.usageStats.totalPromptTokens += inputTokens
    this.usageStats.totalCompletionTokens += outputTokens
    this.usageStats.totalTokens += inputTokens + outputTokens
    this.usageStats.requestCount++

    return result
  }

  /**
   * Generate a completion
   */
  async complete(prompt: string, systemPrompt?: string, call: CallOptions = {}): Promise<LLMResponse> {
    const result = await this.callGenerateText(prompt, systemPrompt, call)
    const inputTokens = result.usage?.inputTokens ?? 0
    const outputTokens = result.usage?.outputTokens ?? 0

    return {
      content: result.text,
      usage: {
        promptTokens: inputTokens,
        completionTokens: outputTokens,
        totalTokens: inputTokens + outputTokens,
      },
      model: this.getModel(),
    }
  }

  /**
   * Generate structured JSON output validated by a Zod schema.
   * Uses AI SDK's Output.object() and falls back to extracting JSON from
   * the text when the provider returns no structured output.
   */
  async completeJSON<T>(prompt: string, systemPrompt: string | undefined, schema: ZodType<T>, call: CallOptions = {}): Promise<T> {
    let result: Awaited<ReturnType<typeof generateText>>
    try {
      result = await this.callGenerateText(prompt, systemPrompt, call, Output.object({ schema }))
    }
    catch (error) {
      // Raised by the SDK when the structured output fails to parse or validate
      if (error instanceof Error && error.name === 'AI_NoObjectGeneratedError')
        throw new LLMOutputError(`Model output does not match the schema: ${error.message}`)
      throw error
    }

    const structured = readStructuredOutput(result)
    if (structured != null) {
      return validateOutput(schema, structured)
    }

    const lastStep = result.steps?.[result.steps.length - 1]
    const finishReason = lastStep?.finishReason ?? 'unknown'
    log.debug(`Structured output unavailable (finishReason: ${finishReason}), trying text fallback`)

    if (result.text) {
      return validateOutput(schema, extractJSON(result.text))
    }
    throw new LLMOutputError(`No structured output from model (finishReason: ${finishReason})`)
  }

  /**
   * Get the current provider
   */
  getProvider(): LLMProvider {
    return this.options.provider
  }

  /**
   * Get the current model
   */
  getModel(): string {
    return this.options.model ?? DEFAULT_MODELS[this.options.provider]
  }

  /**
   * Get cumulative token usage statistics
   */
  getUsageStats(): TokenUsageStats {
    return { ...this.usageStats }
  }

  /**
   * Reset usage statistics
   */
  resetUsageStats(): void {
    this.usageStats = { ...INITIAL_USAGE_STATS }
  }
}
