// src/config/types.ts
import { z } from 'zod'

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
  sink: z.enum(['console', 'file', 'silent']).default('console'),
  file: z.string().optional()
}).refine(cfg => cfg.sink !== 'file' || !!cfg.file, {
  message: 'logging.file is required when logging.sink is "file"',
  path: ['file']
})

export const ScanConfigSchema = z.object({
  ignore: z.array(z.string()).default([]),
  maxFiles: z.number().int().positive().default(20000),
  maxFileBytes: z.number().int().positive().default(5 * 1024 * 1024)
})

export const ReportConfigSchema = z.object({
  format: z.enum(['markdown', 'json']).default('markdown'),
  locale: z.enum(['zh', 'en']).default('zh'),
  verify: z.boolean().default(false)
})

export const LocatorConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  scan: ScanConfigSchema.default({}),
  report: ReportConfigSchema.default({})
})

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>
export type ScanConfig = z.infer<typeof ScanConfigSchema>
export type ReportConfig = z.infer<typeof ReportConfigSchema>
export type LocatorConfig = z.infer<typeof LocatorConfigSchema>
