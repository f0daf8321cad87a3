// src/repo-scanner/filter.ts
import { extname } from 'path'
import { SOURCE_EXTENSIONS } from './types.js'

const LANGUAGE_MAP: Record<string, string> = {
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.py': 'python',
  '.java': 'java',
  '.cpp': 'cpp',
  '.cs': 'csharp'
}

const SOURCE_SET: ReadonlySet<string> = new Set(SOURCE_EXTENSIONS)

export function shouldIgnore(filePath: string, ignore: string[]): boolean {
  if (ignore.length === 0) return false

  const lowerPath = filePath.toLowerCase()
  // Split path into segments for proper matching
  const pathSegments = filePath.split(/[/\\]/)
  const lowerSegments = lowerPath.split(/[/\\]/)

  for (const pattern of ignore) {
    // Reject patterns with path traversal attempts
    if (pattern.includes('..')) continue

    if (pattern.startsWith('*.')) {
      if (lowerPath.endsWith(pattern.slice(1).toLowerCase())) return true
    } else {
      // "node_modules" matches "node_modules/foo" but not "my_node_modules"
      const lowerPattern = pattern.toLowerCase()
      if (lowerSegments.some(seg => seg === lowerPattern)) return true
      // Prefix match for dot-directories such as ".git"
      if (pattern.startsWith('.') && pathSegments.some(seg => seg.startsWith(pattern))) return true
    }
  }

  return false
}

/** Extension comparison is case-sensitive: `Main.PY` is not scanned. */
export function isSourceFile(filePath: string): boolean {
  return SOURCE_SET.has(extname(filePath))
}

export function detectLanguage(filePath: string): string {
  return LANGUAGE_MAP[extname(filePath)] ?? 'unknown'
}
