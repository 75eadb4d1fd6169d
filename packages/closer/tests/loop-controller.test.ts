/**
 * LoopController state machine tests.
 *
 * Every collaborator is a fake injected through `deps`; a real temp
 * directory holds the run lock, events and run log.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir, hostname } from 'node:os';
import { parse as yamlParse } from 'yaml';

import type {
  AgentBackend,
  AgentResult,
  AuditReport,
  AuditSource,
  ChangeSource,
  ControllerEvent,
  SpawnOptions,
  TestGateResult,
  TestSource,
} from '../src/lib/controller/types.js';
import { ControllerEventSchema, RunLogSchema, exitCodeFor } from '../src/lib/controller/types.js';
import { parseControllerConfig } from '../src/lib/controller/config.js';
import { missingIds, parseAuditOutput } from '../src/lib/controller/audit-parser.js';
import { ControllerError, controllerError } from '../src/cli/lib/errors.js';
import { LoopController, type ControllerDeps } from '../src/cli/lib/controller/loop-controller.js';

vi.mock('../src/cli/lib/controller/console-reporter.js', () => ({
  ConsoleReporter: new Proxy(
    {},
    {
      get: () => () => {
        // no-op stub
      },
    },
  ),
}));

// =============================================================================
// Fakes
// =============================================================================

const OPEN = '{"covered":["F-01"],"partial":[],"missing":["F-06"]}';
const COVERED = '{"covered":["F-01","F-06"],"partial":[],"missing":[]}';

class FakeAgent implements AgentBackend {
  name = 'fake';
  executable = 'fake-agent';
  outputs: string[] = [];
  statuses: AgentResult['status'][] = [];
  spawnCalls: SpawnOptions[] = [];

  spawn(opts: SpawnOptions): Promise<AgentResult> {
    this.spawnCalls.push(opts);
    const status = this.statuses.shift() ?? 'success';
    return Promise.resolve({
      status,
      exitCode: status === 'success' ? 0 : 1,
      output: this.outputs.shift() ?? 'Edited files.',
      duration: 10,
    });
  }

  get markers(): (string | undefined)[] {
    return this.spawnCalls.map((c) => c.env?.CLOSER_LOOP_MARKER);
  }
}

/** Plays back audit outputs; the last one repeats. */
class FakeAudit implements AuditSource {
  calls = 0;

  constructor(
    private readonly outputs: string[],
    private readonly exitCode = 1,
  ) {}

  run(): Promise<AuditReport> {
    const raw = this.outputs[Math.min(this.calls, this.outputs.length - 1)] ?? '';
    this.calls++;
    return Promise.resolve(parseAuditOutput(raw, this.exitCode));
  }
}

/** Answers hasInScopeChange from a queue; defaults to "changed". */
class FakeChanges implements ChangeSource {
  checkpoints = 0;
  answers: boolean[] = [];

  checkpoint(): Promise<void> {
    this.checkpoints++;
    return Promise.resolve();
  }

  hasInScopeChange(): Promise<boolean> {
    return Promise.resolve(this.answers.shift() ?? true);
  }
}

class FakeTests implements TestSource {
  calls = 0;
  results: boolean[] = [];

  run(): Promise<TestGateResult> {
    this.calls++;
    const passed = this.results.shift() ?? true;
    return Promise.resolve({ passed, exitCode: passed ? 0 : 1, output: '', duration: 5 });
  }
}

// =============================================================================
// Harness
// =============================================================================

let root: string;
let agent: FakeAgent;
let changes: FakeChanges;
let tests: FakeTests;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'closer-loop-'));
  agent = new FakeAgent();
  changes = new FakeChanges();
  tests = new FakeTests();
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

function createController(
  audit: AuditSource,
  opts: { maxLoops?: number; deps?: Partial<ControllerDeps>; branch?: boolean } = {},
): LoopController {
  const config = parseControllerConfig({
    loop: { max_loops: opts.maxLoops ?? 5 },
    git: { branch: opts.branch ?? false },
  });
  return new LoopController({
    config,
    projectRoot: root,
    deps: {
      agent,
      audit,
      changes,
      tests,
      integrityFiles: () => Promise.resolve([]),
      preconditions: () => Promise.resolve(),
      createBranch: () => Promise.resolve('closer/20260101-000000'),
      ...opts.deps,
    },
  });
}

async function readEvents(runId: string): Promise<ControllerEvent[]> {
  const content = await readFile(join(root, '.closer', 'runs', runId, 'events.jsonl'), 'utf-8');
  return content
    .trim()
    .split('\n')
    .map((line) => ControllerEventSchema.parse(JSON.parse(line)));
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

// =============================================================================
// Convergence
// =============================================================================

describe('LoopController convergence', () => {
  it('converges on the first iteration when covered and the sentinel is printed', async () => {
    agent.outputs = ['Checked every requirement.\nNO_CHANGES_NEEDED\n'];
    const audit = new FakeAudit([COVERED], 0);

    const result = await createController(audit).run();

    expect(result.status).toBe('converged');
    expect(result.iterations).toBe(1);
    expect(exitCodeFor(result)).toBe(0);
    expect(audit.calls).toBe(1);
    expect(agent.spawnCalls).toHaveLength(1);
    expect(agent.spawnCalls[0]?.env?.CLOSER_MODE).toBe('verify');
    // Final confirmation run only; no change detection in verify mode
    expect(tests.calls).toBe(1);
    expect(changes.checkpoints).toBe(0);
  });

  it('keeps looping when the agent paraphrases the sentinel', async () => {
    agent.outputs = ['looks fine, no action needed', 'NO_CHANGES_NEEDED'];
    const audit = new FakeAudit([COVERED], 0);

    const result = await createController(audit).run();

    expect(result.status).toBe('converged');
    expect(result.iterations).toBe(2);
    expect(audit.calls).toBe(2);
    // Iteration 1 test gate, then the final confirmation run
    expect(tests.calls).toBe(2);
  });

  it('ignores the sentinel in implement mode', async () => {
    agent.outputs = ['NO_CHANGES_NEEDED', 'NO_CHANGES_NEEDED'];
    const audit = new FakeAudit([OPEN, COVERED]);

    const result = await createController(audit).run();

    expect(result.status).toBe('converged');
    expect(result.iterations).toBe(2);
    expect(agent.spawnCalls.map((c) => c.env?.CLOSER_MODE)).toEqual(['implement', 'verify']);
  });

  it('converges even when the final test run fails', async () => {
    agent.outputs = ['NO_CHANGES_NEEDED'];
    tests.results = [false];

    const result = await createController(new FakeAudit([COVERED], 0)).run();

    expect(result.status).toBe('converged');
    expect(result.message).toBe(
      'Audit fully covered and agent reported no changes needed; final test run failed.',
    );
  });

  it('selects verify mode for unparseable audit output with a failing exit', async () => {
    agent.outputs = ['NO_CHANGES_NEEDED'];
    const audit = new FakeAudit(['Traceback: audit crashed'], 1);

    const result = await createController(audit).run();

    expect(result.status).toBe('converged');
    expect(agent.spawnCalls[0]?.env?.CLOSER_MODE).toBe('verify');
  });
});

// =============================================================================
// Loop bound and stall handling
// =============================================================================

describe('LoopController loop bound', () => {
  it('stops after exactly max_loops iterations', async () => {
    const audit = new FakeAudit([OPEN]);

    const result = await createController(audit, { maxLoops: 3 }).run();

    expect(result.status).toBe('max_loops_exceeded');
    expect(result.iterations).toBe(3);
    expect(result.code).toBe('E_MAX_LOOPS');
    expect(exitCodeFor(result)).toBe(5);
    expect(audit.calls).toBe(3);
    expect(agent.markers).toEqual(['1', '2', '3']);
    expect(result.finalReport && missingIds(result.finalReport)).toEqual(['F-06']);
  });

  it('does not stop early when tests fail in implement mode', async () => {
    tests.results = [false, false];

    const result = await createController(new FakeAudit([OPEN]), { maxLoops: 2 }).run();

    expect(result.status).toBe('max_loops_exceeded');
    expect(agent.spawnCalls).toHaveLength(2);
  });

  it('retries a stalled iteration once with an escalated marker', async () => {
    changes.answers = [false, true, true];

    const result = await createController(new FakeAudit([OPEN]), { maxLoops: 2 }).run();

    expect(result.status).toBe('max_loops_exceeded');
    expect(agent.markers).toEqual(['1', '1-retry', '2']);
    expect(agent.spawnCalls[1]?.prompt).toContain('[loop 1-retry] [mode IMPLEMENT]');
    expect(changes.checkpoints).toBe(3);
  });

  it('retries at most once per iteration', async () => {
    changes.answers = [false, false, false, false];

    await createController(new FakeAudit([OPEN]), { maxLoops: 2 }).run();

    expect(agent.markers).toEqual(['1', '1-retry', '2', '2-retry']);
  });

  it('counts agent invocations in the run log', async () => {
    changes.answers = [false, true];

    const result = await createController(new FakeAudit([OPEN]), { maxLoops: 1 }).run();

    const content = await readFile(
      join(root, '.closer', 'runs', result.runId, 'run-log.yml'),
      'utf-8',
    );
    const log = RunLogSchema.parse(yamlParse(content));
    expect(log.status).toBe('max_loops_exceeded');
    expect(log.totalAgentInvocations).toBe(2);
    expect(log.iterations).toHaveLength(1);
    expect(log.iterations[0]).toMatchObject({
      iteration: 1,
      mode: 'implement',
      missing: ['F-06'],
      agentInvocations: 2,
      retried: true,
      changed: true,
    });
  });
});

// =============================================================================
// Fatal preconditions
// =============================================================================

describe('LoopController fatal preconditions', () => {
  it('aborts on a corrupted source file before any audit', async () => {
    const corrupt = join(root, 'loop-controller.ts');
    await writeFile(corrupt, Buffer.from([0x61, 0xef, 0xbf, 0xbd]));
    const preconditions = vi.fn(() => Promise.resolve());
    const audit = new FakeAudit([OPEN]);

    const result = await createController(audit, {
      deps: { integrityFiles: () => Promise.resolve([corrupt]), preconditions },
    }).run();

    expect(result.status).toBe('fatal_precondition');
    expect(result.code).toBe('E_INTEGRITY_CORRUPT');
    expect(result.iterations).toBe(0);
    expect(exitCodeFor(result)).toBe(2);
    expect(preconditions).not.toHaveBeenCalled();
    expect(audit.calls).toBe(0);
    expect(agent.spawnCalls).toHaveLength(0);
  });

  it('aborts when a collaborator is missing', async () => {
    const audit = new FakeAudit([OPEN]);
    const preconditions = () =>
      Promise.reject(
        controllerError(
          'E_PRECONDITION_MISSING',
          'Missing agent executable: "codex" not found in PATH',
        ),
      );

    const result = await createController(audit, { deps: { preconditions } }).run();

    expect(result).toMatchObject({
      status: 'fatal_precondition',
      iterations: 0,
      code: 'E_PRECONDITION_MISSING',
      message: 'Missing agent executable: "codex" not found in PATH',
    });
    expect(audit.calls).toBe(0);
    expect(await exists(join(root, '.closer'))).toBe(false);
  });

  it('refuses to run while another run holds the lock', async () => {
    await mkdir(join(root, '.closer'), { recursive: true });
    const now = new Date().toISOString();
    await writeFile(
      join(root, '.closer', 'lock.json'),
      JSON.stringify({
        runId: 'run-other',
        pid: process.pid,
        hostname: hostname(),
        startedAt: now,
        heartbeatAt: now,
      }),
    );
    const audit = new FakeAudit([OPEN]);

    const result = await createController(audit).run();

    expect(result.status).toBe('fatal_precondition');
    expect(result.code).toBe('E_RUN_LOCKED');
    expect(exitCodeFor(result)).toBe(3);
    expect(audit.calls).toBe(0);
    expect(await exists(join(root, '.closer', 'runs'))).toBe(false);
  });

  it('releases the lock when the run directory cannot be created', async () => {
    await mkdir(join(root, '.closer'), { recursive: true });
    await writeFile(join(root, '.closer', 'runs'), 'not a directory');
    const audit = new FakeAudit([OPEN]);

    await expect(createController(audit).run()).rejects.toThrow();

    expect(audit.calls).toBe(0);
    expect(await exists(join(root, '.closer', 'lock.json'))).toBe(false);
  });
});

// =============================================================================
// Run records, branch and interruption
// =============================================================================

describe('LoopController run records', () => {
  it('writes events in loop order and releases the lock', async () => {
    agent.outputs = ['NO_CHANGES_NEEDED'];

    const result = await createController(new FakeAudit([COVERED], 0)).run();

    const events = await readEvents(result.runId);
    expect(events.map((e) => e.event)).toEqual([
      'run_started',
      'audit_finished',
      'mode_selected',
      'agent_started',
      'agent_finished',
      'sentinel_seen',
      'final_tests_finished',
      'run_completed',
    ]);
    expect(events.at(-1)).toMatchObject({ status: 'converged', iterations: 1 });
    expect(await exists(join(root, '.closer', 'lock.json'))).toBe(false);
  });

  it('creates a run branch when configured', async () => {
    agent.outputs = ['NO_CHANGES_NEEDED'];
    const createBranch = vi.fn(() => Promise.resolve('closer/20260101-000000'));

    const result = await createController(new FakeAudit([COVERED], 0), {
      branch: true,
      deps: { createBranch },
    }).run();

    expect(createBranch).toHaveBeenCalledTimes(1);
    expect(createBranch).toHaveBeenCalledWith(root);
    const events = await readEvents(result.runId);
    expect(events[1]).toMatchObject({ event: 'branch_created', branch: 'closer/20260101-000000' });
  });

  it('ends with E_INTERRUPTED when the agent call is aborted', async () => {
    agent.statuses = ['aborted'];

    const error = await createController(new FakeAudit([OPEN]))
      .run()
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ControllerError);
    expect(error).toMatchObject({ code: 'E_INTERRUPTED', exitCode: 130 });
    expect(await exists(join(root, '.closer', 'lock.json'))).toBe(false);
  });

  it('stops before the next step once the signal has fired', async () => {
    const abort = new AbortController();
    abort.abort();
    const audit = new FakeAudit([OPEN]);
    const controller = new LoopController({
      config: parseControllerConfig({}),
      projectRoot: root,
      signal: abort.signal,
      deps: {
        agent,
        audit,
        changes,
        tests,
        integrityFiles: () => Promise.resolve([]),
        preconditions: () => Promise.resolve(),
      },
    });

    await expect(controller.run()).rejects.toMatchObject({ code: 'E_INTERRUPTED' });
    expect(audit.calls).toBe(0);
  });
});

// =============================================================================
// Dry run
// =============================================================================

describe('LoopController.preview', () => {
  it('audits once and renders the prompt without invoking the agent', async () => {
    const audit = new FakeAudit([OPEN]);

    const result = await createController(audit).preview();

    if ('status' in result) throw new Error(`unexpected termination: ${result.status}`);
    expect(result.mode).toBe('implement');
    expect(result.prompt.loopMarker).toBe('1');
    expect(result.prompt.text).toContain('in this pass: F-06');
    expect(audit.calls).toBe(1);
    expect(agent.spawnCalls).toHaveLength(0);
    expect(await exists(join(root, '.closer'))).toBe(false);
  });
});
