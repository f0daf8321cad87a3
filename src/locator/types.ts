// src/locator/types.ts
export type Language = 'python' | 'javascript' | 'jvm' | 'cpp'

export interface FunctionRecord {
  name: string
  /** Raw parameter text, trimmed */
  params: string
  /** 1-based */
  startLine: number
  /** Inclusive, heuristically estimated */
  endLine: number
}

export interface ImplementationLocation {
  file: string
  function: string
  /** "start-end" */
  lines: string
}

export interface FeatureAnalysis {
  feature: string
  locations: ImplementationLocation[]
}

export type AnalysisResult = FeatureAnalysis[]
