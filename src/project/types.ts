// src/project/types.ts
export type ProjectType = 'nodejs' | 'python' | 'java' | 'dotnet' | 'unknown'

export type Locale = 'zh' | 'en'

/** Marker files looked up at the project root */
export interface ProjectMarkers {
  packageJson: boolean
  requirementsTxt: boolean
}

export interface VerificationResult {
  testsPassed: boolean
  log: string
  /** Always true: nothing is executed */
  simulated: true
}
