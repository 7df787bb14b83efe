import { rmSync, writeFileSync } from 'node:fs'
import path from 'node:path'
import { discoverFiles, globMatch, matchesPattern } from '@reposieve/source/discover'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { commitAll, hasGit, makeTree } from './helpers'

describe('globMatch', () => {
  it('lets ** span any number of segments', () => {
    expect(globMatch('src/a.ts', '**/*.ts')).toBe(true)
    expect(globMatch('a.ts', '**/*.ts')).toBe(true)
    expect(globMatch('node_modules', '**/node_modules/**')).toBe(true)
    expect(globMatch('pkg/node_modules/x/index.js', '**/node_modules/**')).toBe(true)
  })

  it('keeps * and ? inside one segment', () => {
    expect(globMatch('src/a.ts', '*.ts')).toBe(false)
    expect(globMatch('src/a.ts', 'src/?.ts')).toBe(true)
    expect(globMatch('src/ab.ts', 'src/?.ts')).toBe(false)
  })

  it('treats regex characters literally', () => {
    expect(globMatch('src/a+b.ts', 'src/a+b.ts')).toBe(true)
    expect(globMatch('src/aab.ts', 'src/a+b.ts')).toBe(false)
    expect(globMatch('lib/app.min.js', '**/*.min.*')).toBe(true)
    expect(globMatch('lib/appXminXjs', '**/*.min.*')).toBe(false)
  })

  it('matches any of several patterns', () => {
    expect(matchesPattern('logo.png', ['**/*.jpg', '**/*.png'])).toBe(true)
    expect(matchesPattern('logo.svg', ['**/*.jpg', '**/*.png'])).toBe(false)
  })
})

describe('discoverFiles', () => {
  let root: string

  beforeAll(() => {
    root = makeTree({
      'README.md': '# demo',
      'src/a.ts': 'export const a = 1',
      'src/b.ts': 'export const b = 2',
      'deep/a/b/c.ts': 'export const c = 3',
      'node_modules/x/index.js': 'module.exports = 1',
      'dist/out.js': 'console.log(1)',
      'logo.png': 'png',
      'lib/app.min.js': 'x',
    })
  })

  afterAll(() => {
    rmSync(root, { recursive: true, force: true })
  })

  it('walks the tree in path order with the default excludes', async () => {
    const files = await discoverFiles(root, { respectGitignore: false })
    expect(files).toEqual(['README.md', 'deep/a/b/c.ts', 'src/a.ts', 'src/b.ts'])
  })

  it('applies include globs', async () => {
    const files = await discoverFiles(root, { respectGitignore: false, include: ['**/*.ts'] })
    expect(files).toEqual(['deep/a/b/c.ts', 'src/a.ts', 'src/b.ts'])
  })

  it('replaces the default excludes when given', async () => {
    const files = await discoverFiles(root, { respectGitignore: false, exclude: ['**/*.md', '**/*.ts'] })
    expect(files).toEqual(['dist/out.js', 'lib/app.min.js', 'logo.png', 'node_modules/x/index.js'])
  })

  it('stops at maxDepth', async () => {
    const files = await discoverFiles(root, { respectGitignore: false, maxDepth: 1 })
    expect(files).toEqual(['README.md', 'src/a.ts', 'src/b.ts'])
  })

  it('falls back to a walk outside a git repository', async () => {
    const files = await discoverFiles(path.join(root, 'src'))
    expect(files).toEqual(['a.ts', 'b.ts'])
  })

  it('rejects a missing root', async () => {
    await expect(discoverFiles(path.join(root, 'missing'))).rejects.toThrow('Repository path does not exist')
  })
})

describe.skipIf(!hasGit())('discoverFiles in a git checkout', () => {
  let root: string

  beforeAll(() => {
    root = makeTree({
      '.gitignore': 'generated/\n',
      'src/a.ts': 'export const a = 1\n',
      'generated/schema.ts': 'export {}\n',
    })
    commitAll(root)
    writeFileSync(path.join(root, 'src/new.ts'), 'export {}\n')
  })

  afterAll(() => {
    rmSync(root, { recursive: true, force: true })
  })

  it('lists tracked and untracked files that are not ignored', async () => {
    expect(await discoverFiles(root)).toEqual(['.gitignore', 'src/a.ts', 'src/new.ts'])
  })

  it('includes ignored files when .gitignore is disabled', async () => {
    expect(await discoverFiles(root, { respectGitignore: false })).toEqual(['.gitignore', 'generated/schema.ts', 'src/a.ts', 'src/new.ts'])
  })
})
