import type { Fragment } from '../fragment'
import { renderDocuments } from '../cxml'

export const SELECTOR_SYSTEM_PROMPT = `You are a codebase file selector optimizing for RECALL.
You see a project overview and one group of files from a larger repository.
Decide for every file in the group whether it may help answer the user's request.

## Rules
1. Mark a file relevant when it defines, configures, tests or documents behavior the request asks about.
2. When in doubt, mark it relevant. Later passes trim by budget.
3. Judge only the files inside <documents>. Use their <source> value as the path, unchanged.
4. Never invent paths and never repeat a path.

Always respond with valid JSON:
{
  "verdicts": [
    { "path": "exact <source> value", "relevant": true, "rationale": "short reason" }
  ]
}`

export const ANALYZER_SYSTEM_PROMPT = `You are a senior staff-level engineer.
Use the provided files (CXML blocks) and answer the user's request precisely and concisely.
If the answer may depend on omitted code, call it out explicitly.`

export function buildSelectorPrompt(question: string, overview: string, fragments: readonly Fragment[]): string {
  return `${question}
----
PROJECT OVERVIEW:
${overview}
----
FILES:
${renderDocuments(fragments)}

Return one verdict per file.`
}

export function buildAnalyzerPrompt(question: string, fragments: readonly Fragment[]): string {
  return `${question}

${renderDocuments(fragments)}`
}
