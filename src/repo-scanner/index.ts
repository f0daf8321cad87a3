// src/repo-scanner/index.ts
export { RepoScanner, decodeLossy, splitLines } from './scanner.js'
export { shouldIgnore, isSourceFile, detectLanguage } from './filter.js'
export type { SourceFile, RepoStats, ScanOptions } from './types.js'
export { SOURCE_EXTENSIONS } from './types.js'
