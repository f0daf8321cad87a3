// src/repo-scanner/scanner.ts
import * as fs from 'fs'
import * as path from 'path'
import type { Logger } from '../logger/index.js'
import { createNullLogger } from '../logger/index.js'
import type { RepoStats, ScanOptions, SourceFile } from './types.js'
import { DEFAULT_MAX_FILE_BYTES, DEFAULT_MAX_FILES } from './types.js'
import { detectLanguage, isSourceFile, shouldIgnore } from './filter.js'

const COMPONENT = 'scanner'

const decoder = new TextDecoder('utf-8')

/**
 * Decode UTF-8, dropping invalid byte sequences instead of failing.
 */
export function decodeLossy(buffer: Uint8Array): string {
  return decoder.decode(buffer).replace(/\uFFFD/g, '')
}

/**
 * Split file content into lines. A trailing newline does not produce an
 * extra empty line and `\r` before a newline is removed.
 */
export function splitLines(content: string): string[] {
  if (content.length === 0) return []
  const lines = content.split('\n')
  if (lines[lines.length - 1] === '') {
    lines.pop()
  }
  return lines.map(line => (line.endsWith('\r') ? line.slice(0, -1) : line))
}

export class RepoScanner {
  private rootPath: string
  private options: ScanOptions
  private logger: Logger
  private files: SourceFile[] = []
  private limitReached = false

  constructor(rootPath: string, options: ScanOptions = {}, logger: Logger = createNullLogger()) {
    this.rootPath = rootPath
    this.options = options
    this.logger = logger
  }

  scanFiles(): SourceFile[] {
    this.files = []
    this.limitReached = false

    const stat = fs.statSync(this.rootPath, { throwIfNoEntry: false })
    if (!stat || !stat.isDirectory()) {
      throw new Error(`Code directory not found: ${this.rootPath}`)
    }

    this.logger.info(COMPONENT, `Scanning ${this.rootPath}`)
    this.scanDirectory(this.rootPath)
    this.logger.info(COMPONENT, `Scan complete, ${this.files.length} source files read`)
    return this.files
  }

  private scanDirectory(dirPath: string): void {
    const entries = fs.readdirSync(dirPath, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

    for (const entry of entries) {
      if (this.limitReached) return

      const fullPath = path.join(dirPath, entry.name)
      const relativePath = path.relative(this.rootPath, fullPath).split(path.sep).join('/')

      if (shouldIgnore(relativePath, this.options.ignore ?? [])) {
        continue
      }

      if (entry.isDirectory()) {
        this.scanDirectory(fullPath)
      } else if ((entry.isFile() || entry.isSymbolicLink()) && isSourceFile(entry.name)) {
        this.readSourceFile(fullPath, relativePath)
      }
    }
  }

  private readSourceFile(fullPath: string, relativePath: string): void {
    const maxFiles = this.options.maxFiles ?? DEFAULT_MAX_FILES
    if (this.files.length >= maxFiles) {
      this.limitReached = true
      this.logger.warn(COMPONENT, `File limit of ${maxFiles} reached, remaining files are not scanned`)
      return
    }

    try {
      const maxBytes = this.options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES
      const size = fs.statSync(fullPath).size
      if (size > maxBytes) {
        this.logger.warn(COMPONENT, `Skipping ${relativePath}: ${size} bytes exceeds limit`, { maxBytes })
        return
      }

      const content = decodeLossy(fs.readFileSync(fullPath))
      this.files.push({
        relativePath,
        extension: path.extname(relativePath),
        lines: splitLines(content)
      })
      this.logger.debug(COMPONENT, `Read ${relativePath}`)
    } catch (error) {
      // One unreadable file never aborts the scan
      this.logger.error(
        COMPONENT,
        `Failed to read ${fullPath}`,
        error instanceof Error ? error : new Error(String(error))
      )
    }
  }

  getStats(): RepoStats {
    const languages: Record<string, number> = {}
    let totalLines = 0

    for (const file of this.files) {
      totalLines += file.lines.length
      const language = detectLanguage(file.relativePath)
      languages[language] = (languages[language] || 0) + 1
    }

    return {
      totalFiles: this.files.length,
      totalLines,
      languages
    }
  }
}
