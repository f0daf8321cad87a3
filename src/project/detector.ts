// src/project/detector.ts
import { existsSync } from 'fs'
import { join } from 'path'
import type { ProjectMarkers, ProjectType } from './types.js'

export function readProjectMarkers(codeDir: string): ProjectMarkers {
  return {
    packageJson: existsSync(join(codeDir, 'package.json')),
    requirementsTxt: existsSync(join(codeDir, 'requirements.txt'))
  }
}

/**
 * Classify a project from its scanned source paths and root markers.
 * Precedence: nodejs, python, java, dotnet.
 */
export function detectProjectType(filePaths: readonly string[], markers: ProjectMarkers): ProjectType {
  const hasNonTestScript = filePaths.some(f => f.endsWith('.js') && !f.endsWith('.test.js'))
  if (hasNonTestScript && markers.packageJson) {
    return 'nodejs'
  }
  if (filePaths.some(f => f.endsWith('.py'))) return 'python'
  if (filePaths.some(f => f.endsWith('.java'))) return 'java'
  if (filePaths.some(f => f.endsWith('.cs'))) return 'dotnet'
  return 'unknown'
}
