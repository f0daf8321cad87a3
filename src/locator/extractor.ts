// src/locator/extractor.ts
import type { FunctionRecord } from './types.js'
import { languageForExtension, rulesFor } from './language.js'
import { findFunctionEnd } from './extent.js'

/**
 * Detect single-line function declarations. Keyed by name: a later
 * declaration with the same name replaces the earlier record.
 */
export function extractFunctions(lines: readonly string[], extension: string): Map<string, FunctionRecord> {
  const functions = new Map<string, FunctionRecord>()
  const language = languageForExtension(extension)
  if (!language) return functions

  const rules = rulesFor(language)

  lines.forEach((line, index) => {
    const declaration = rules.matchDeclaration(line)
    if (!declaration) return

    const startLine = index + 1
    functions.set(declaration.name, {
      name: declaration.name,
      params: declaration.params,
      startLine,
      endLine: findFunctionEnd(lines, startLine, language)
    })
  })

  return functions
}
