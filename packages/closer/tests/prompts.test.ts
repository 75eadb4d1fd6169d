import { describe, it, expect } from 'vitest';

import { parseAuditOutput } from '../src/lib/controller/audit-parser.js';
import { containsSentinel } from '../src/lib/controller/mode.js';
import {
  buildAgentPrompt,
  buildRequirementSummary,
  type PromptContext,
} from '../src/cli/lib/controller/prompts.js';

const ctx: PromptContext = {
  specPath: 'PRD/product_prd.md',
  agentRulesPath: 'AGENTS.md',
  sentinel: 'NO_CHANGES_NEEDED',
  testCommand: 'pytest -q',
};

const openReport = parseAuditOutput(
  '{"covered":["F-01","F-02"],"partial":["F-04"],"missing":["F-06"]}',
  1,
);
const coveredReport = parseAuditOutput('{"covered":["F-01","F-02"],"partial":[],"missing":[]}', 0);

describe('buildRequirementSummary', () => {
  it('lists each classification with counts in emission order', () => {
    expect(buildRequirementSummary(openReport)).toBe(
      [
        '- MISSING (1): F-06',
        '- PARTIAL (1): F-04',
        '- COVERED (2): F-01, F-02',
      ].join('\n'),
    );
  });

  it('marks empty classifications', () => {
    expect(buildRequirementSummary(coveredReport)).toBe(
      ['- MISSING (0): (none)', '- PARTIAL (0): (none)', '- COVERED (2): F-01, F-02'].join('\n'),
    );
  });
});

describe('buildAgentPrompt', () => {
  it('names every open identifier in implement mode', () => {
    const prompt = buildAgentPrompt('implement', openReport, '2', ctx);

    expect(prompt.mode).toBe('implement');
    expect(prompt.loopMarker).toBe('2');
    expect(prompt.text).toContain('[loop 2] [mode IMPLEMENT]');
    expect(prompt.text).toContain(
      'Resolve every MISSING and PARTIAL requirement in this pass: F-06, F-04',
    );
    expect(prompt.text).toContain('`PRD: F-06`');
    expect(prompt.text).toContain('Run `pytest -q` and fix failures until it passes.');
  });

  it('embeds the requirement summary', () => {
    const prompt = buildAgentPrompt('implement', openReport, '1', ctx);
    expect(prompt.text).toContain(prompt.requirementSummary);
  });

  it('forbids plan-only answers', () => {
    const prompt = buildAgentPrompt('implement', openReport, '1', ctx);
    expect(prompt.text).toContain('- You MUST produce edits now, not a description of edits.');
    expect(prompt.text).toContain(
      '- Do NOT answer with only a plan, a summary, or a list of next steps.',
    );
  });

  it('asks for the sentinel in verify mode', () => {
    const prompt = buildAgentPrompt('verify', coveredReport, '3', ctx);

    expect(prompt.text).toContain('[loop 3] [mode VERIFY]');
    expect(prompt.text).toContain('## Task: VERIFY');
    expect(prompt.text).toContain('`NO_CHANGES_NEEDED` (without the backticks)');
    expect(prompt.text).not.toContain('## Task: IMPLEMENT');
  });

  it('states covered status only for a recognized audit', () => {
    const prompt = buildAgentPrompt('verify', coveredReport, '1', ctx);
    expect(prompt.text).toContain('The audit reports every requirement as COVERED.');
  });

  it('passes unrecognized audit output through instead of claiming coverage', () => {
    const crashed = parseAuditOutput('Traceback (most recent call last):\nKeyError: x\n', 1);
    const prompt = buildAgentPrompt('verify', crashed, '1', ctx);

    expect(crashed.parsed).toBe(false);
    expect(prompt.text).not.toContain('every requirement as COVERED');
    expect(prompt.text).toContain('The audit output was not recognized (exit code 1)');
    expect(prompt.text).toContain(
      '```\nTraceback (most recent call last):\nKeyError: x\n```',
    );
  });

  it('does not itself satisfy the sentinel check when echoed back', () => {
    const prompt = buildAgentPrompt('verify', coveredReport, '1', ctx);
    expect(containsSentinel(prompt.text, ctx.sentinel)).toBe(false);
  });

  it('is deterministic for identical inputs', () => {
    const a = buildAgentPrompt('implement', openReport, '4', ctx);
    const b = buildAgentPrompt('implement', openReport, '4', ctx);
    expect(a).toEqual(b);
  });

  it('adds an escalation note only on the retry marker', () => {
    const first = buildAgentPrompt('implement', openReport, '2', ctx);
    const retry = buildAgentPrompt('implement', openReport, '2-retry', ctx);

    expect(retry.text).toContain('[loop 2-retry] [mode IMPLEMENT]');
    expect(retry.text.endsWith('changed no files in scope. Edit files now.')).toBe(true);
    expect(first.text).not.toContain('The previous attempt in this loop');
  });
});
