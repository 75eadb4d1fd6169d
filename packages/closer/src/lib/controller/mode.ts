/**
 * Mode selection: a pure function of the audit report.
 */

import type { AuditReport, ModeType } from './types.js';

/** Implement while anything is Missing or Partial, otherwise Verify. */
export function selectMode(report: AuditReport): ModeType {
  return report.requirements.some((r) => r.classification !== 'covered') ? 'implement' : 'verify';
}

/**
 * True when some line of the agent's output, trimmed, is exactly the sentinel.
 * Punctuation, casing or surrounding prose on the same line do not count.
 */
export function containsSentinel(output: string, sentinel: string): boolean {
  return output.split(/\r?\n/).some((line) => line.trim() === sentinel);
}
