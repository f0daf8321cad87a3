// src/reporter/index.ts
import type { Reporter, ReportFormat } from './types.js'
import { MarkdownReporter } from './markdown.js'
import { JsonReporter } from './json.js'

export { MarkdownReporter } from './markdown.js'
export { JsonReporter } from './json.js'
export { buildReport } from './builder.js'
export type { BuildReportOptions } from './builder.js'
export type { FeatureReport, FunctionalVerification, Reporter, ReportFormat } from './types.js'

export function createReporter(format: ReportFormat): Reporter {
  return format === 'json' ? new JsonReporter() : new MarkdownReporter()
}
