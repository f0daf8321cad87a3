// src/project/index.ts
export { detectProjectType, readProjectMarkers } from './detector.js'
export { executionPlanText, testCodeText } from './templates.js'
export { verifyFunctionality } from './verifier.js'
export type { Locale, ProjectMarkers, ProjectType, VerificationResult } from './types.js'
