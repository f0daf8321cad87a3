// src/reporter/types.ts
import type { RepoStats } from '../repo-scanner/types.js'
import type { AnalysisResult } from '../locator/types.js'
import type { ProjectType, VerificationResult } from '../project/types.js'

export type ReportFormat = 'markdown' | 'json'

export interface FunctionalVerification {
  generatedTestCode: string
  executionResult: VerificationResult
}

export interface FeatureReport {
  projectName: string
  generatedAt: Date
  requirement: string
  projectType: ProjectType
  stats: RepoStats
  featureAnalysis: AnalysisResult
  executionPlanSuggestion: string
  functionalVerification?: FunctionalVerification
}

export interface Reporter {
  generate(report: FeatureReport): string
}
