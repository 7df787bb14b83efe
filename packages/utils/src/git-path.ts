import { accessSync, constants } from 'node:fs'
import { delimiter, join } from 'node:path'

let cachedGitPath: string | undefined

/**
 * Candidate executable names for git; on Windows the PATHEXT extensions are
 * tried as well.
 */
function gitCandidateNames(): string[] {
  const names = ['git']
  const pathExt = process.env.PATHEXT
  if (pathExt) {
    for (const ext of pathExt.split(';').filter(Boolean)) {
      names.push(`git${ext.toLowerCase()}`)
    }
  }
  return names
}

/**
 * Resolve the absolute path to the `git` binary by searching PATH, so that
 * child processes never rely on implicit PATH lookup. The result is cached.
 *
 * @throws {Error} if git is not found in any PATH directory
 */
export function resolveGitBinary(): string {
  if (cachedGitPath)
    return cachedGitPath

  const dirs = (process.env.PATH ?? '').split(delimiter).filter(Boolean)
  for (const dir of dirs) {
    for (const name of gitCandidateNames()) {
      const candidate = join(dir, name)
      try {
        accessSync(candidate, constants.X_OK)
        cachedGitPath = candidate
        return candidate
      }
      catch {
        continue
      }
    }
  }

  throw new Error('git binary not found in PATH')
}

/**
 * Clear the cached git path (for tests).
 */
export function clearGitPathCache(): void {
  cachedGitPath = undefined
}
