// src/index.ts
import { FeatureLocator } from './locator/locator.js'
import type { FeatureLocatorOptions } from './locator/locator.js'
import type { AnalysisResult } from './locator/types.js'
import type { VerificationResult } from './project/types.js'
import { verifyFunctionality as simulatedVerification } from './project/verifier.js'

export { FeatureLocator } from './locator/locator.js'
export type { FeatureLocatorOptions } from './locator/locator.js'
export { extractFunctions } from './locator/extractor.js'
export { findFunctionEnd } from './locator/extent.js'
export { splitFeatures, FEATURE_KEYWORDS } from './locator/splitter.js'
export { isRelevant } from './locator/relevance.js'
export { languageForExtension } from './locator/language.js'
export type {
  AnalysisResult,
  FeatureAnalysis,
  FunctionRecord,
  ImplementationLocation,
  Language
} from './locator/types.js'
export { RepoScanner } from './repo-scanner/index.js'
export type { SourceFile, RepoStats, ScanOptions } from './repo-scanner/index.js'
export { detectProjectType, readProjectMarkers } from './project/index.js'
export type { Locale, ProjectMarkers, ProjectType, VerificationResult } from './project/index.js'
export { MarkdownReporter, JsonReporter, buildReport, createReporter } from './reporter/index.js'
export type { FeatureReport, ReportFormat } from './reporter/index.js'
export { createLogger, createNullLogger } from './logger/index.js'
export type { Logger, LogLevel, LogSink } from './logger/index.js'
export { loadConfig, parseConfig } from './config/loader.js'
export type { LocatorConfig } from './config/types.js'

export function analyzeFeatures(codeDir: string, requirement: string, options?: FeatureLocatorOptions): AnalysisResult {
  return new FeatureLocator(codeDir, options).analyzeFeatures(requirement)
}

export function suggestExecutionPlan(codeDir: string, options?: FeatureLocatorOptions): string {
  return new FeatureLocator(codeDir, options).suggestExecutionPlan()
}

export function generateTestCode(codeDir: string, options?: FeatureLocatorOptions): string {
  return new FeatureLocator(codeDir, options).generateTestCode()
}

/**
 * Always reports a simulated pass. No generated test is executed.
 */
export function verifyFunctionality(options: Pick<FeatureLocatorOptions, 'locale'> = {}): VerificationResult {
  return simulatedVerification(options.locale)
}
