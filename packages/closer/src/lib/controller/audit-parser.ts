/**
 * Normalizes raw audit tool output into an AuditReport.
 *
 * Two shapes are recognized:
 *
 *   {"covered": ["F-01"], "partial": [], "missing": ["F-06"]}
 *
 * and the sectioned text the audit tool prints:
 *
 *   [COVERED] (1)
 *   - F-01
 *   [MISSING] (1)
 *   - F-06
 *
 * Anything else yields an empty report that still carries the raw text.
 * An identifier listed under more than one classification keeps the first.
 */

import { z } from 'zod';

import type { AuditReport, ClassificationType, RequirementStatus } from './types.js';

export type AuditFormat = 'auto' | 'json' | 'sections';

const IdListSchema = z.array(z.string());

const SECTION_HEADER_RE = /\[(COVERED|PARTIAL|MISSING)\]/i;

function toClassification(key: string): ClassificationType | null {
  switch (key.toLowerCase()) {
    case 'missing':
      return 'missing';
    case 'partial':
      return 'partial';
    case 'covered':
      return 'covered';
    default:
      return null;
  }
}

/** Collects statuses in order, dropping ids already classified. */
class RequirementCollector {
  private readonly seen = new Set<string>();
  readonly statuses: RequirementStatus[] = [];

  add(id: string, classification: ClassificationType): void {
    const trimmed = id.trim();
    if (!trimmed || this.seen.has(trimmed)) return;
    this.seen.add(trimmed);
    this.statuses.push({ id: trimmed, classification });
  }
}

function tryParseJsonObject(text: string): Record<string, unknown> | null {
  try {
    const value: unknown = JSON.parse(text);
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
  } catch {
    // Not JSON
  }
  return null;
}

/**
 * Find a JSON object in the output: the whole text first, then the first
 * line that starts with `{`.
 */
function extractJsonObject(raw: string): Record<string, unknown> | null {
  const whole = tryParseJsonObject(raw.trim());
  if (whole) return whole;

  for (const line of raw.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.startsWith('{')) {
      return tryParseJsonObject(trimmed);
    }
  }
  return null;
}

function parseJson(raw: string): RequirementStatus[] | null {
  const obj = extractJsonObject(raw);
  if (!obj) return null;

  const collector = new RequirementCollector();
  let recognized = false;

  // Object key order is emission order
  for (const [key, value] of Object.entries(obj)) {
    const classification = toClassification(key);
    if (!classification) continue;

    const ids = IdListSchema.safeParse(value);
    if (!ids.success) return null;

    recognized = true;
    for (const id of ids.data) collector.add(id, classification);
  }

  return recognized ? collector.statuses : null;
}

function parseSections(raw: string): RequirementStatus[] | null {
  const collector = new RequirementCollector();
  let current: ClassificationType | null = null;
  let recognized = false;

  for (const rawLine of raw.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    const header = SECTION_HEADER_RE.exec(line);
    if (header?.[1]) {
      current = toClassification(header[1]);
      recognized = true;
      continue;
    }

    if (line.startsWith('-') && current) {
      // "- F-06" or "- F-06: note"
      const parts = line.split(/\s+/);
      const id = parts[1]?.replace(/[:,]+$/, '');
      if (id) collector.add(id, current);
    }
  }

  return recognized ? collector.statuses : null;
}

/** Parse audit output. Never throws. */
export function parseAuditOutput(
  raw: string,
  exitCode: number,
  format: AuditFormat = 'auto',
): AuditReport {
  let requirements: RequirementStatus[] | null = null;

  if (format === 'json' || format === 'auto') {
    requirements = parseJson(raw);
  }
  if (!requirements && (format === 'sections' || format === 'auto')) {
    requirements = parseSections(raw);
  }

  return {
    requirements: requirements ?? [],
    raw,
    exitCode,
    parsed: requirements !== null,
  };
}

// =============================================================================
// Report Accessors
// =============================================================================

/** Identifiers with the given classification, in emission order. */
export function idsWith(report: AuditReport, classification: ClassificationType): string[] {
  return report.requirements.filter((r) => r.classification === classification).map((r) => r.id);
}

export function missingIds(report: AuditReport): string[] {
  return idsWith(report, 'missing');
}

export function partialIds(report: AuditReport): string[] {
  return idsWith(report, 'partial');
}

export function coveredIds(report: AuditReport): string[] {
  return idsWith(report, 'covered');
}

/** Identifiers still needing work: Missing ∪ Partial, in emission order. */
export function openIds(report: AuditReport): string[] {
  return report.requirements.filter((r) => r.classification !== 'covered').map((r) => r.id);
}
