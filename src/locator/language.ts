// src/locator/language.ts
import type { Language } from './types.js'

export interface DeclarationMatch {
  name: string
  params: string
}

export interface LanguageRules {
  /** First declaration found on the line, or null */
  matchDeclaration(line: string): DeclarationMatch | null
  isComment(line: string): boolean
}

const EXTENSION_LANGUAGE: Record<string, Language> = {
  '.py': 'python',
  '.js': 'javascript',
  '.ts': 'javascript',
  '.tsx': 'javascript',
  '.jsx': 'javascript',
  '.java': 'jvm',
  '.cs': 'jvm',
  '.cpp': 'cpp'
}

// Identifiers are Unicode letters, digits and underscores
const PYTHON_DEF = /^\s*def\s+([\p{L}\p{N}_]+)\s*\(([^)]*)\)\s*:/u
const JS_FUNCTION = /^(?:export\s+)?(?:async\s+)?function\s+([\p{L}\p{N}_]+)\s*\(([^)]*)\)|^\s*(?:const|let|var)\s+([\p{L}\p{N}_]+)\s*=\s*(?:async\s+)?\(\s*([^)]*)\s*\)\s*=>/u
// Modifier keyword first, then any run of type words (generics and arrays allowed)
const JVM_METHOD = /^\s*(?:public|private|protected|static|final|abstract)\s+(?:[\p{L}\p{N}_<>\[\]]+\s+)*([\p{L}\p{N}_]+)\s*\(([^)]*)\)/u
const CPP_FUNCTION = /^(?:[\p{L}\p{N}_]+\s+)*(?:\*|&)?\s*([\p{L}\p{N}_]+)\s*\(([^)]*)\)/u

const SLASH_COMMENT = /^\s*(\/\/|\/\*|\*\/)/
const HASH_COMMENT = /^\s*#/

function singlePattern(pattern: RegExp): (line: string) => DeclarationMatch | null {
  return line => {
    const match = pattern.exec(line)
    if (!match) return null
    return { name: match[1], params: (match[2] ?? '').trim() }
  }
}

const RULES: Record<Language, LanguageRules> = {
  python: {
    matchDeclaration: singlePattern(PYTHON_DEF),
    isComment: line => HASH_COMMENT.test(line)
  },
  javascript: {
    matchDeclaration(line) {
      const match = JS_FUNCTION.exec(line)
      if (!match) return null
      // Named declaration fills groups 1-2, arrow assignment fills 3-4
      const name = match[1] ?? match[3]
      const params = match[2] ?? match[4] ?? ''
      return { name, params: params.trim() }
    },
    isComment: line => SLASH_COMMENT.test(line)
  },
  jvm: {
    matchDeclaration: singlePattern(JVM_METHOD),
    isComment: line => SLASH_COMMENT.test(line)
  },
  cpp: {
    matchDeclaration: singlePattern(CPP_FUNCTION),
    isComment: line => SLASH_COMMENT.test(line)
  }
}

export function languageForExtension(extension: string): Language | null {
  return EXTENSION_LANGUAGE[extension] ?? null
}

export function rulesFor(language: Language): LanguageRules {
  return RULES[language]
}
