import { findHighEntropySpans, isSecretPath, REDACTION_MARKER, redactHighEntropy, shannonEntropy } from '@reposieve/source/secrets'
import { describe, expect, it } from 'vitest'

const KEY = 'aB3dE5fG7hJ9kL1mN2pQ4rS6'

describe('isSecretPath', () => {
  it.each([
    '.env',
    'config/.env.local',
    'certs/server.pem',
    'home/.ssh/id_rsa.pub',
    'config/secrets.yaml',
    'deploy/tls.key',
    'android/release.keystore',
    'deploy/aws/credentials',
    'infra/gcloud/service.json',
  ])('blocks %s', (filePath) => {
    expect(isSecretPath(filePath)).toBe(true)
  })

  it.each([
    'src/keyboard.ts',
    'docs/environment.md',
    'src/secrets-manager.ts',
    'README.md',
  ])('allows %s', (filePath) => {
    expect(isSecretPath(filePath)).toBe(false)
  })

  it('accepts Windows separators', () => {
    expect(isSecretPath('deploy\\aws\\credentials')).toBe(true)
  })
})

describe('shannonEntropy', () => {
  it('measures bits per character', () => {
    expect(shannonEntropy('')).toBe(0)
    expect(shannonEntropy('aaaa')).toBe(0)
    expect(shannonEntropy('abab')).toBe(1)
    expect(shannonEntropy('abcd')).toBe(2)
  })
})

describe('findHighEntropySpans', () => {
  it('finds key-like runs including punctuation', () => {
    expect(findHighEntropySpans('x = xY7_qP2-zK9.mW4+nR8/vT3=;')).toEqual([[4, 28]])
  })

  it('ignores short or repetitive runs', () => {
    expect(findHighEntropySpans('aB3dE5fG7hJ9kL1mN2p')).toEqual([])
    expect(findHighEntropySpans('abababababababababababab')).toEqual([])
  })

  it('honors custom limits', () => {
    expect(findHighEntropySpans('aB3dE5fG7h', { minLength: 10, threshold: 3 })).toEqual([[0, 10]])
  })
})

describe('redactHighEntropy', () => {
  it('replaces keys and keeps ordinary paths', () => {
    const text = `const key = "${KEY}"\nconst dir = "packages/source/src/loader"\n`
    expect(redactHighEntropy(text)).toEqual({
      text: `const key = "${REDACTION_MARKER}"\nconst dir = "packages/source/src/loader"\n`,
      count: 1,
    })
  })

  it('counts every replacement', () => {
    expect(redactHighEntropy(`${KEY} ${KEY}`)).toEqual({ text: '‹REDACTED› ‹REDACTED›', count: 2 })
  })

  it('returns clean text unchanged', () => {
    expect(redactHighEntropy('nothing to see here')).toEqual({ text: 'nothing to see here', count: 0 })
  })
})
