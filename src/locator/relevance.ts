// src/locator/relevance.ts

const CJK_RUN = /[\u4e00-\u9fa5]+/g
const WORD_TOKEN = /[a-zA-Z_]+/g
const LOWER_RUN = /[a-z]+/g
const UPPERCASE = /[A-Z]/

const MIN_WORD_LENGTH = 3

/**
 * Lexical relevance of a function to a feature. Checks run in order and
 * stop at the first hit:
 *
 * 1. the whole feature text inside the path or function name
 * 2. a run of CJK ideographs from the feature inside the path or name
 * 3. an English token (3+ letters) inside the path or name, or matching
 *    the head or a lowercase word of a camelCase name
 *
 * Matching is case-insensitive and intentionally loose.
 */
export function isRelevant(filePath: string, functionName: string, feature: string): boolean {
  const pathLower = filePath.toLowerCase()
  const nameLower = functionName.toLowerCase()
  const featureLower = feature.toLowerCase()

  if (pathLower.includes(featureLower) || nameLower.includes(featureLower)) {
    return true
  }

  for (const word of feature.match(CJK_RUN) ?? []) {
    const wordLower = word.toLowerCase()
    if (pathLower.includes(wordLower) || nameLower.includes(wordLower)) {
      return true
    }
  }

  const camelCase = UPPERCASE.test(functionName)
  const nameWords: string[] = nameLower.match(LOWER_RUN) ?? []

  for (const word of feature.match(WORD_TOKEN) ?? []) {
    if (word.length < MIN_WORD_LENGTH) continue

    const wordLower = word.toLowerCase()
    if (pathLower.includes(wordLower)) return true
    if (nameLower.includes(wordLower)) return true
    if (camelCase && (nameLower.slice(0, wordLower.length) === wordLower || nameWords.includes(wordLower))) {
      return true
    }
  }

  return false
}
