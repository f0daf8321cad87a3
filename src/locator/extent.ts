// src/locator/extent.ts
import type { Language } from './types.js'
import { rulesFor } from './language.js'

export function indentationOf(line: string): number {
  const match = /^\s*/.exec(line)
  return match ? match[0].length : 0
}

/**
 * Estimate the last line of a function body starting at `startLine`
 * (1-based). The body ends before the first non-blank, non-comment line
 * indented no deeper than the declaration, or at the first line with no
 * indentation at all. Brace depth, strings and block comments are not
 * tracked.
 */
export function findFunctionEnd(lines: readonly string[], startLine: number, language: Language): number {
  const rules = rulesFor(language)
  const declarationIndent = indentationOf(lines[startLine - 1] ?? '')

  for (let i = startLine; i < lines.length; i++) {
    const line = lines[i]
    if (line.trim() === '') continue
    if (rules.isComment(line)) continue

    const indent = indentationOf(line)
    if (indent === 0 || indent <= declarationIndent) {
      // Index of the boundary line is the 1-based number of the line before it
      return i
    }
  }

  return lines.length
}
