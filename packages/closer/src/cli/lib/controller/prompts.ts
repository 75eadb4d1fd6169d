/**
 * Prompt assembly for the code-generation agent.
 *
 * Output is a pure function of its inputs: identical reports and markers
 * produce byte-identical prompts, which keeps stuck loops reproducible.
 */

import { coveredIds, missingIds, partialIds } from '../../../lib/controller/audit-parser.js';
import type { AuditReport, ModeType, PromptPayload } from '../../../lib/controller/types.js';

export interface PromptContext {
  specPath: string;
  agentRulesPath: string;
  sentinel: string;
  /** Test runner invocation, shown to the agent as-is. */
  testCommand: string;
}

function formatIds(ids: string[]): string {
  return ids.length > 0 ? ids.join(', ') : '(none)';
}

/** Missing/Partial/Covered listing in audit-emission order. */
export function buildRequirementSummary(report: AuditReport): string {
  const missing = missingIds(report);
  const partial = partialIds(report);
  const covered = coveredIds(report);

  return [
    `- MISSING (${missing.length}): ${formatIds(missing)}`,
    `- PARTIAL (${partial.length}): ${formatIds(partial)}`,
    `- COVERED (${covered.length}): ${formatIds(covered)}`,
  ].join('\n');
}

function buildImplementDirectives(report: AuditReport, ctx: PromptContext): string {
  const open = [...missingIds(report), ...partialIds(report)];

  return `## Task: IMPLEMENT

Resolve every MISSING and PARTIAL requirement in this pass: ${open.join(', ')}

1. Read ${ctx.specPath} for each identifier above.
2. Implement the behavior in the source tree now. Do not defer any identifier.
3. Add tests that verify each identifier's acceptance criteria. Tag every test
   with its identifier (for example a comment \`PRD: ${open[0] ?? 'F-01'}\`) so the
   audit can see it.
4. Run \`${ctx.testCommand}\` and fix failures until it passes.`;
}

/** What the audit established, stated without claiming more than it reported. */
function describeAuditResult(report: AuditReport, ctx: PromptContext): string {
  if (report.parsed) {
    return `The audit reports every requirement as COVERED. Check the code for drift
against ${ctx.specPath}.`;
  }

  const raw = report.raw.trim() || '(no output)';
  return `The audit output was not recognized (exit code ${report.exitCode}), so coverage is
unknown. Check every requirement in ${ctx.specPath} against the code yourself.

Raw audit output:

\`\`\`
${raw}
\`\`\``;
}

function buildVerifyDirectives(report: AuditReport, ctx: PromptContext): string {
  return `## Task: VERIFY

${describeAuditResult(report, ctx)}

1. Inspect the implementation and tests for each requirement.
2. If you find drift, fix it now with real edits, and run \`${ctx.testCommand}\`.
3. If nothing needs to change, end your reply with a line that contains only
   \`${ctx.sentinel}\` (without the backticks).

Only that exact line counts as "no changes needed". Any other wording is
treated as unfinished work.`;
}

/**
 * Build the agent prompt for one invocation.
 *
 * `loopMarker` is the iteration number, suffixed `-retry` for the single
 * escalation retry of a stalled iteration.
 */
export function buildAgentPrompt(
  mode: ModeType,
  report: AuditReport,
  loopMarker: string,
  ctx: PromptContext,
): PromptPayload {
  const requirementSummary = buildRequirementSummary(report);
  const directives =
    mode === 'implement'
      ? buildImplementDirectives(report, ctx)
      : buildVerifyDirectives(report, ctx);

  const retryNote = loopMarker.endsWith('-retry')
    ? `\n\nThe previous attempt in this loop changed no files in scope. Edit files now.`
    : '';

  const header = `[loop ${loopMarker}] [mode ${mode.toUpperCase()}]`;
  const text = `You are the coding agent for this repository. ${header}

Follow ${ctx.agentRulesPath}. The specification ${ctx.specPath} is the only source of truth.

## Audit Status

${requirementSummary}

${directives}

## Rules

- You MUST produce edits now, not a description of edits.
- Do NOT answer with only a plan, a summary, or a list of next steps.
- Do NOT claim work is done unless the files are changed on disk.
- Do NOT ask for confirmation; act directly on the working tree.${retryNote}`;

  return { mode, requirementSummary, loopMarker, text };
}
