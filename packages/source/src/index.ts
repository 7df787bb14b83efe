export { DEFAULT_EXCLUDES, discoverFiles, globMatch, matchesPattern } from './discover'
export type { DiscoverFilesOptions } from './discover'

export { DEFAULT_FILE_CAP_BYTES, loadFragments } from './loader'
export type { LoadFragmentsOptions, LoadResult, RedactedFile, SkippedFile, UnreadableFile } from './loader'

export { findHighEntropySpans, isSecretPath, REDACTION_MARKER, redactHighEntropy, SECRET_GLOBS, shannonEntropy } from './secrets'
export type { EntropyOptions } from './secrets'
