// src/locator/splitter.ts

export const FEATURE_KEYWORDS = ['实现', '添加', '创建', '支持', '提供', '开发', '设计'] as const

const SENTENCE_DELIMITERS = /[。；;]/

/** Sentences at or below this length (in characters) are never merged */
const MIN_DETAIL_LENGTH = 10

/**
 * Split a requirement into feature statements. A sentence with a trigger
 * keyword opens a feature; longer sentences without one are appended to
 * the feature before them. Without any trigger the whole text is returned.
 */
export function splitFeatures(requirement: string): string[] {
  const sentences = requirement
    .split(SENTENCE_DELIMITERS)
    .map(s => s.trim())
    .filter(s => s.length > 0)

  const features: string[] = []

  for (const sentence of sentences) {
    if (FEATURE_KEYWORDS.some(keyword => sentence.includes(keyword))) {
      features.push(sentence)
    } else if (features.length > 0 && [...sentence].length > MIN_DETAIL_LENGTH) {
      features[features.length - 1] += ' ' + sentence
    }
  }

  if (features.length === 0) {
    return [requirement]
  }

  return features
}
