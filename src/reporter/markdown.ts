// src/reporter/markdown.ts
import type { FeatureAnalysis } from '../locator/types.js'
import type { FeatureReport, Reporter } from './types.js'

const FENCE_LANGUAGE: Record<string, string> = {
  nodejs: 'javascript',
  python: 'python'
}

function singleLine(text: string): string {
  return text.replace(/\s*\r?\n\s*/g, ' ')
}

function escapeCell(text: string): string {
  return singleLine(text).replace(/\|/g, '\\|')
}

export class MarkdownReporter implements Reporter {
  generate(report: FeatureReport): string {
    const lines: string[] = []

    // Header
    lines.push(`# Feature Location Report: ${report.projectName}`)
    lines.push(`Generated: ${report.generatedAt.toISOString().split('T')[0]}`)
    lines.push(`Scope: ${report.stats.totalFiles} source files, ${report.stats.totalLines} lines (project type: ${report.projectType})`)
    lines.push('')

    // Summary
    lines.push('## Summary')
    const located = report.featureAnalysis.filter(f => f.locations.length > 0).length
    lines.push(`- Features: ${report.featureAnalysis.length} (located: ${located}, not located: ${report.featureAnalysis.length - located})`)
    lines.push('')

    lines.push('## Feature Analysis')
    lines.push('')
    report.featureAnalysis.forEach((entry, index) => {
      lines.push(`### ${index + 1}. ${singleLine(entry.feature)}`)
      lines.push(this.formatLocations(entry))
      lines.push('')
    })

    lines.push('## Execution Plan')
    lines.push('')
    lines.push(report.executionPlanSuggestion)

    if (report.functionalVerification) {
      const { generatedTestCode, executionResult } = report.functionalVerification
      lines.push('')
      lines.push('## Functional Verification')
      lines.push('')
      lines.push('### Generated Test Code')
      lines.push('```' + (FENCE_LANGUAGE[report.projectType] ?? ''))
      lines.push(generatedTestCode.trimEnd())
      lines.push('```')
      lines.push('')
      lines.push('### Execution Result')
      lines.push(`- Tests passed: ${executionResult.testsPassed ? 'yes' : 'no'}${executionResult.simulated ? ' (simulated, no test was run)' : ''}`)
      lines.push(`- Log: ${executionResult.log}`)
    }

    return lines.join('\n')
  }

  private formatLocations(entry: FeatureAnalysis): string {
    if (entry.locations.length === 0) {
      return '_No candidate functions found._'
    }
    const lines: string[] = []
    lines.push('| File | Function | Lines |')
    lines.push('|------|----------|-------|')
    for (const loc of entry.locations) {
      lines.push(`| ${escapeCell(loc.file)} | ${escapeCell(loc.function)} | ${loc.lines} |`)
    }
    return lines.join('\n')
  }
}
