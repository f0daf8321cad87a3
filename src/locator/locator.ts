// src/locator/locator.ts
import type { Logger } from '../logger/index.js'
import { createNullLogger } from '../logger/index.js'
import { RepoScanner } from '../repo-scanner/scanner.js'
import type { RepoStats, ScanOptions, SourceFile } from '../repo-scanner/types.js'
import type { Locale, ProjectMarkers, ProjectType, VerificationResult } from '../project/types.js'
import { detectProjectType, readProjectMarkers } from '../project/detector.js'
import { executionPlanText, testCodeText } from '../project/templates.js'
import { verifyFunctionality } from '../project/verifier.js'
import type { AnalysisResult, FunctionRecord, ImplementationLocation } from './types.js'
import { extractFunctions } from './extractor.js'
import { splitFeatures } from './splitter.js'
import { isRelevant } from './relevance.js'

const COMPONENT = 'locator'

export interface FeatureLocatorOptions {
  scan?: ScanOptions
  locale?: Locale
  logger?: Logger
}

interface ExtractedFile {
  path: string
  functions: Map<string, FunctionRecord>
}

/**
 * Scans `codeDir` once on construction. Every analysis re-extracts
 * functions from the scanned lines, so repeated calls give equal results.
 */
export class FeatureLocator {
  private codeDir: string
  private locale: Locale
  private logger: Logger
  private files: SourceFile[]
  private stats: RepoStats
  private markers: ProjectMarkers

  constructor(codeDir: string, options: FeatureLocatorOptions = {}) {
    this.codeDir = codeDir
    this.locale = options.locale ?? 'zh'
    this.logger = options.logger ?? createNullLogger()

    const scanner = new RepoScanner(codeDir, options.scan, this.logger)
    this.files = scanner.scanFiles()
    this.stats = scanner.getStats()
    this.markers = readProjectMarkers(codeDir)
  }

  analyzeFeatures(requirement: string): AnalysisResult {
    this.logger.info(COMPONENT, 'Starting feature analysis')

    const features = splitFeatures(requirement)
    this.logger.info(COMPONENT, `Extracted ${features.length} features from the requirement`)

    const extracted: ExtractedFile[] = this.files.map(file => ({
      path: file.relativePath,
      functions: extractFunctions(file.lines, file.extension)
    }))

    return features.map(feature => {
      const locations: ImplementationLocation[] = []

      for (const file of extracted) {
        for (const [name, record] of file.functions) {
          if (isRelevant(file.path, name, feature)) {
            locations.push({
              file: file.path,
              function: name,
              lines: `${record.startLine}-${record.endLine}`
            })
          }
        }
      }

      this.logger.info(COMPONENT, `Feature "${feature}" matched ${locations.length} locations`)
      return { feature, locations }
    })
  }

  detectProjectType(): ProjectType {
    return detectProjectType(this.files.map(f => f.relativePath), this.markers)
  }

  suggestExecutionPlan(): string {
    return executionPlanText(this.detectProjectType(), this.markers, this.locale)
  }

  generateTestCode(): string {
    return testCodeText(this.detectProjectType(), this.locale)
  }

  verifyFunctionality(): VerificationResult {
    return verifyFunctionality(this.locale)
  }

  getCodeDir(): string {
    return this.codeDir
  }

  getFiles(): readonly SourceFile[] {
    return this.files
  }

  getStats(): RepoStats {
    return this.stats
  }
}
