// src/repo-scanner/types.ts
export interface SourceFile {
  /** Path relative to the scan root, always `/`-separated */
  relativePath: string
  extension: string
  lines: readonly string[]
}

export interface RepoStats {
  totalFiles: number
  totalLines: number
  languages: Record<string, number>
}

export interface ScanOptions {
  ignore?: string[]
  maxFiles?: number
  maxFileBytes?: number
}

export const SOURCE_EXTENSIONS = ['.js', '.ts', '.tsx', '.jsx', '.py', '.java', '.cpp', '.cs'] as const

export const DEFAULT_MAX_FILES = 20000

export const DEFAULT_MAX_FILE_BYTES = 5 * 1024 * 1024
