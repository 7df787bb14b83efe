import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { ConfigError } from '@reposieve/core/errors'
import { parse } from 'yaml'
import { z } from 'zod/v4'

export const CONFIG_FILE = '.reposieve.yml'

const positiveInt = z.number().int().positive()

/**
 * Project settings read from `.reposieve.yml`. CLI flags take precedence.
 */
export const ProjectConfigSchema = z.object({
  selectorModel: z.string().min(1).optional(),
  analysisModel: z.string().min(1).optional(),
  selectorTokens: positiveInt.optional(),
  analyzerTokens: positiveInt.optional(),
  headroom: z.number().min(0).lt(1).optional(),
  fileCapBytes: positiveInt.optional(),
  maxConcurrency: positiveInt.optional(),
  maxLevels: positiveInt.optional(),
  lastResort: z.enum(['first', 'last']).optional(),
  mode: z.enum(['C', 'B']).optional(),
  include: z.array(z.string()).optional(),
  exclude: z.array(z.string()).optional(),
  allowSecrets: z.boolean().optional(),
  earlyFit: z.boolean().optional(),
  timeoutS: positiveInt.optional(),
  tokenizer: z.enum(['tiktoken', 'estimate']).optional(),
}).strict()

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>

/**
 * Read and validate `.reposieve.yml` under `root`. A missing or empty file
 * yields an empty config.
 */
export async function loadProjectConfig(root: string): Promise<ProjectConfig> {
  const file = path.join(root, CONFIG_FILE)
  if (!existsSync(file))
    return {}

  let raw: unknown
  try {
    raw = parse(await readFile(file, 'utf-8'))
  }
  catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Invalid ${CONFIG_FILE}: ${msg}`)
  }
  if (raw === null || raw === undefined)
    return {}

  const parsed = ProjectConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid ${CONFIG_FILE}: ${issues}`)
  }
  return parsed.data
}
