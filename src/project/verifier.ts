// src/project/verifier.ts
import type { Locale, VerificationResult } from './types.js'
import { SIMULATED_VERIFICATION_LOG } from './templates.js'

/**
 * Placeholder for functional verification. Nothing is executed: the result
 * is always a simulated pass and is flagged as such.
 */
export function verifyFunctionality(locale: Locale = 'zh'): VerificationResult {
  return {
    testsPassed: true,
    log: SIMULATED_VERIFICATION_LOG[locale],
    simulated: true
  }
}
