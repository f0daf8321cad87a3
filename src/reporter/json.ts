// src/reporter/json.ts
import type { FeatureReport, Reporter } from './types.js'

/**
 * Serializes with the snake_case field names of the analysis API.
 */
export class JsonReporter implements Reporter {
  generate(report: FeatureReport): string {
    const body: Record<string, unknown> = {
      feature_analysis: report.featureAnalysis.map(entry => ({
        feature_description: entry.feature,
        implementation_location: entry.locations.map(loc => ({
          file: loc.file,
          function: loc.function,
          lines: loc.lines
        }))
      })),
      execution_plan_suggestion: report.executionPlanSuggestion
    }

    if (report.functionalVerification) {
      const { generatedTestCode, executionResult } = report.functionalVerification
      body.functional_verification = {
        generated_test_code: generatedTestCode,
        execution_result: {
          tests_passed: executionResult.testsPassed,
          log: executionResult.log,
          simulated: executionResult.simulated
        }
      }
    }

    return JSON.stringify(body, null, 2)
  }
}
