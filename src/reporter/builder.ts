// src/reporter/builder.ts
import { basename, resolve } from 'path'
import type { FeatureLocator } from '../locator/locator.js'
import type { FeatureReport } from './types.js'

export interface BuildReportOptions {
  /** Include generated test code and the simulated verification result */
  verify?: boolean
  now?: Date
}

export function buildReport(
  locator: FeatureLocator,
  requirement: string,
  options: BuildReportOptions = {}
): FeatureReport {
  const report: FeatureReport = {
    projectName: basename(resolve(locator.getCodeDir())),
    generatedAt: options.now ?? new Date(),
    requirement,
    projectType: locator.detectProjectType(),
    stats: locator.getStats(),
    featureAnalysis: locator.analyzeFeatures(requirement),
    executionPlanSuggestion: locator.suggestExecutionPlan()
  }

  if (options.verify) {
    report.functionalVerification = {
      generatedTestCode: locator.generateTestCode(),
      executionResult: locator.verifyFunctionality()
    }
  }

  return report
}
