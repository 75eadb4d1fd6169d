import { describe, it, expect } from 'vitest';

import { parseAuditOutput } from '../src/lib/controller/audit-parser.js';
import { containsSentinel, selectMode } from '../src/lib/controller/mode.js';
import type { AuditReport } from '../src/lib/controller/types.js';

function report(json: string): AuditReport {
  return parseAuditOutput(json, 0);
}

describe('selectMode', () => {
  it('implements while anything is missing', () => {
    expect(selectMode(report('{"covered":["F-01"],"missing":["F-06"]}'))).toBe('implement');
  });

  it('implements while anything is partial', () => {
    expect(selectMode(report('{"covered":["F-01"],"partial":["F-04"]}'))).toBe('implement');
  });

  it('verifies when everything is covered', () => {
    expect(selectMode(report('{"covered":["F-01","F-02"],"partial":[],"missing":[]}'))).toBe(
      'verify',
    );
  });

  it('verifies on an empty report', () => {
    expect(selectMode(parseAuditOutput('not an audit', 1))).toBe('verify');
  });
});

describe('containsSentinel', () => {
  const SENTINEL = 'NO_CHANGES_NEEDED';

  it('matches the sentinel on its own line', () => {
    expect(containsSentinel('Checked everything.\nNO_CHANGES_NEEDED\n', SENTINEL)).toBe(true);
  });

  it('tolerates surrounding whitespace and CRLF line endings', () => {
    expect(containsSentinel('done\r\n   NO_CHANGES_NEEDED  \r\n', SENTINEL)).toBe(true);
  });

  it('rejects a paraphrase', () => {
    expect(containsSentinel('looks fine, no action needed', SENTINEL)).toBe(false);
  });

  it('rejects trailing punctuation', () => {
    expect(containsSentinel('NO_CHANGES_NEEDED.', SENTINEL)).toBe(false);
  });

  it('rejects the sentinel inside prose', () => {
    expect(containsSentinel('I would say NO_CHANGES_NEEDED here', SENTINEL)).toBe(false);
  });

  it('rejects a different case', () => {
    expect(containsSentinel('no_changes_needed', SENTINEL)).toBe(false);
  });

  it('honours a custom sentinel', () => {
    expect(containsSentinel('ALL_GOOD', 'ALL_GOOD')).toBe(true);
    expect(containsSentinel('NO_CHANGES_NEEDED', 'ALL_GOOD')).toBe(false);
  });
});
