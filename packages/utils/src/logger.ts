import type { ConsolaInstance } from 'consola'
import { createConsola, LogLevels } from 'consola'

// Stdout is reserved for the final answer, so every level goes to stderr.
export const logger: ConsolaInstance = createConsola({
  level: LogLevels.info,
  stdout: process.stderr,
  stderr: process.stderr,
})

// withTag() copies the options of its parent, so tagged children are tracked
// here for setLogLevel.
const tagged: ConsolaInstance[] = []

// Scoped logger with [tag] prefix
export function createLogger(tag: string): ConsolaInstance {
  const child = logger.withTag(tag)
  tagged.push(child)
  return child
}

// Set global log level (affects the root and every createLogger child)
export function setLogLevel(level: number): void {
  logger.level = level
  for (const child of tagged) {
    child.level = level
  }
}

export { LogLevels } from 'consola'
