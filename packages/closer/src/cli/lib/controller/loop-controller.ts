/**
 * Bounded convergence loop.
 *
 * integrity → preconditions → (audit → mode → prompt → agent → post-check)
 * repeated at most loop.max_loops times, ending Converged, MaxLoopsExceeded
 * or FatalPrecondition.
 *
 * Every step is awaited before the next starts: the agent mutates the one
 * shared working tree, so nothing here runs concurrently.
 */

import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import type { ControllerConfig } from '../../../lib/controller/config.js';
import { getAgentTimeoutMs } from '../../../lib/controller/config.js';
import { missingIds, partialIds, coveredIds } from '../../../lib/controller/audit-parser.js';
import { containsSentinel, selectMode } from '../../../lib/controller/mode.js';
import type {
  AgentBackend,
  AuditReport,
  AuditSource,
  ChangeSource,
  ControllerEventInput,
  LoopState,
  ModeType,
  PromptPayload,
  TerminationResult,
  TestSource,
} from '../../../lib/controller/types.js';
import { CLOSER_DIR, runDir as runDirFor } from '../../../lib/paths.js';
import { ControllerError, controllerError, isFatalPrecondition } from '../errors.js';
import { AuditRunner } from './audit-runner.js';
import { createAgentBackend } from './backends/detect.js';
import { ChangeDetector } from './change-detector.js';
import { ConsoleReporter } from './console-reporter.js';
import { EventLogger } from './events.js';
import { createRunBranch } from './git.js';
import { controllerSourceFiles, verifyIntegrity } from './integrity-guard.js';
import { checkPreconditions, requiredResources } from './preconditions.js';
import { buildAgentPrompt, type PromptContext } from './prompts.js';
import { RunLock } from './run-lock.js';
import { RunLogWriter } from './run-log.js';
import { TestGate } from './test-gate.js';

// =============================================================================
// Run ID Generation
// =============================================================================

function generateRunId(): string {
  const date = new Date().toISOString().slice(0, 10);
  const hash = Math.random().toString(36).slice(2, 8);
  return `run-${date}-${hash}`;
}

// =============================================================================
// Collaborators
// =============================================================================

/** Everything the loop talks to. Defaults are built from config. */
export interface ControllerDeps {
  agent: AgentBackend;
  audit: AuditSource;
  changes: ChangeSource;
  tests: TestSource;
  /** Files checked by the integrity guard. */
  integrityFiles: () => Promise<string[]>;
  /** Throws a ControllerError when a required collaborator is absent. */
  preconditions: () => Promise<void>;
  createBranch: (projectRoot: string) => Promise<string | null>;
}

export interface LoopControllerOptions {
  config: ControllerConfig;
  projectRoot: string;
  /** Aborts the current step and ends the run with E_INTERRUPTED. */
  signal?: AbortSignal;
  deps?: Partial<ControllerDeps>;
}

export interface PreviewResult {
  report: AuditReport;
  mode: ModeType;
  prompt: PromptPayload;
}

interface AttemptOutcome {
  sentinel: boolean;
  /** Only measured in implement mode. */
  changed?: boolean;
  testsPassed?: boolean;
}

// =============================================================================
// Loop Controller
// =============================================================================

export class LoopController {
  private readonly config: ControllerConfig;
  private readonly projectRoot: string;
  private readonly signal: AbortSignal | undefined;
  private readonly deps: ControllerDeps;
  private readonly promptContext: PromptContext;
  private readonly agentTimeout: number | undefined;
  private runId = '';
  private eventLogger: EventLogger | null = null;
  private runLog: RunLogWriter | null = null;
  private totalAgentInvocations = 0;

  constructor(opts: LoopControllerOptions) {
    this.config = opts.config;
    this.projectRoot = opts.projectRoot;
    this.signal = opts.signal;
    this.agentTimeout = getAgentTimeoutMs(opts.config);
    this.deps = this.resolveDeps(opts.deps ?? {});
    this.promptContext = {
      specPath: this.config.spec,
      agentRulesPath: this.config.agent_rules,
      sentinel: this.config.loop.sentinel,
      testCommand: [this.config.test.command, ...this.config.test.args].join(' '),
    };
  }

  private resolveDeps(overrides: Partial<ControllerDeps>): ControllerDeps {
    const agent = overrides.agent ?? createAgentBackend(this.config);
    return {
      agent,
      audit: overrides.audit ?? AuditRunner.fromConfig(this.config, this.projectRoot),
      changes: overrides.changes ?? new ChangeDetector(this.projectRoot, this.config.scope),
      tests: overrides.tests ?? TestGate.fromConfig(this.config, this.projectRoot),
      integrityFiles: overrides.integrityFiles ?? controllerSourceFiles,
      preconditions:
        overrides.preconditions ??
        (() =>
          checkPreconditions(requiredResources(this.config, agent.executable), {
            projectRoot: this.projectRoot,
          })),
      createBranch: overrides.createBranch ?? createRunBranch,
    };
  }

  /** Run the loop to termination. Throws only E_INTERRUPTED. */
  async run(): Promise<TerminationResult> {
    this.runId = generateRunId();

    const fatal = await this.checkStartup();
    if (fatal) return fatal;

    const stateDir = join(this.projectRoot, CLOSER_DIR);
    await mkdir(stateDir, { recursive: true });

    // Lock before creating anything run-specific
    const runLock = new RunLock(stateDir, this.runId);
    try {
      await runLock.acquire();
    } catch (error) {
      if (error instanceof ControllerError) return this.fatalResult(error);
      throw error;
    }

    const runDir = join(this.projectRoot, runDirFor(this.runId));
    const eventLogger = new EventLogger(join(runDir, 'events.jsonl'));

    try {
      await mkdir(runDir, { recursive: true });
      await eventLogger.open();
      this.eventLogger = eventLogger;
      this.runLog = new RunLogWriter(runDir, this.runId, this.config.spec, this.maxLoops);

      this.emit({ event: 'run_started', run_id: this.runId, max_loops: this.maxLoops });
      ConsoleReporter.runStarted(this.runId, this.config.spec, this.maxLoops);

      if (this.config.git.branch) {
        const branch = await this.deps.createBranch(this.projectRoot);
        this.emit({ event: 'branch_created', branch });
        ConsoleReporter.branchCreated(branch);
      }

      return await this.loop();
    } catch (error) {
      if (error instanceof ControllerError && error.code === 'E_INTERRUPTED') {
        this.emit({ event: 'run_interrupted' });
        ConsoleReporter.runInterrupted();
      }
      throw error;
    } finally {
      this.eventLogger = null;
      try {
        await eventLogger.close();
      } finally {
        await runLock.release();
      }
    }
  }

  /** Checks, one audit, and the prompt that would be sent. Invokes no agent. */
  async preview(): Promise<PreviewResult | TerminationResult> {
    const fatal = await this.checkStartup();
    if (fatal) return fatal;

    const report = await this.deps.audit.run(this.signal);
    const mode = selectMode(report);
    return { report, mode, prompt: this.buildPrompt(mode, report, '1') };
  }

  private get maxLoops(): number {
    return this.config.loop.max_loops;
  }

  // ===========================================================================
  // Startup
  // ===========================================================================

  /** Integrity first, then preconditions. Returns a fatal result or null. */
  private async checkStartup(): Promise<TerminationResult | null> {
    try {
      await verifyIntegrity(await this.deps.integrityFiles());
      await this.deps.preconditions();
    } catch (error) {
      if (error instanceof ControllerError && isFatalPrecondition(error.code)) {
        return this.fatalResult(error);
      }
      throw error;
    }
    ConsoleReporter.preconditionsPassed();
    return null;
  }

  private fatalResult(error: ControllerError): TerminationResult {
    ConsoleReporter.fatal(error.message);
    return {
      status: 'fatal_precondition',
      runId: this.runId,
      iterations: 0,
      message: error.message,
      code: error.code,
    };
  }

  // ===========================================================================
  // Main Loop
  // ===========================================================================

  private async loop(): Promise<TerminationResult> {
    const state: LoopState = { iteration: 0, mode: 'implement', consecutiveNoChangeCount: 0 };
    let lastReport: AuditReport | undefined;

    for (let i = 1; i <= this.maxLoops; i++) {
      this.throwIfAborted();
      state.iteration = i;
      ConsoleReporter.iterationStarted(i, this.maxLoops);

      // Audit → mode
      const report = await this.deps.audit.run(this.signal);
      this.throwIfAborted();
      lastReport = report;
      state.mode = selectMode(report);

      ConsoleReporter.auditFinished(report);
      ConsoleReporter.modeSelected(state.mode, report);
      this.emit({
        event: 'audit_finished',
        iteration: i,
        exit_code: report.exitCode,
        parsed: report.parsed,
        missing: missingIds(report),
        partial: partialIds(report),
        covered: coveredIds(report).length,
      });
      this.emit({ event: 'mode_selected', iteration: i, mode: state.mode });
      this.runLog?.startIteration({
        iteration: i,
        mode: state.mode,
        auditExitCode: report.exitCode,
        missing: missingIds(report),
        partial: partialIds(report),
        covered: coveredIds(report),
        agentInvocations: 0,
        retried: false,
        sentinel: false,
      });

      const outcome = await this.attempt(state, report, String(i));

      if (state.mode === 'verify' && outcome.sentinel) {
        return await this.converge(i, report);
      }

      if (state.mode === 'implement') {
        if (outcome.changed) {
          state.consecutiveNoChangeCount = 0;
        } else {
          state.consecutiveNoChangeCount++;
          const retryMarker = `${i}-retry`;
          ConsoleReporter.retrying(retryMarker);
          this.emit({ event: 'stall_retry', iteration: i, loop_marker: retryMarker });
          this.runLog?.updateIteration({ retried: true });

          const retry = await this.attempt(state, report, retryMarker);
          state.consecutiveNoChangeCount = retry.changed ? 0 : state.consecutiveNoChangeCount + 1;
        }
      }

      await this.runLog?.flush();
    }

    return await this.exceedMaxLoops(lastReport);
  }

  /**
   * One agent invocation and its post-checks: prompt, agent, sentinel
   * (verify), tests, change detection (implement).
   */
  private async attempt(
    state: LoopState,
    report: AuditReport,
    loopMarker: string,
  ): Promise<AttemptOutcome> {
    if (state.mode === 'implement') {
      await this.deps.changes.checkpoint();
    }

    const prompt = this.buildPrompt(state.mode, report, loopMarker);
    const output = await this.invokeAgent(prompt);

    if (state.mode === 'verify' && containsSentinel(output, this.config.loop.sentinel)) {
      ConsoleReporter.sentinelSeen();
      this.emit({ event: 'sentinel_seen', iteration: state.iteration, loop_marker: loopMarker });
      this.runLog?.updateIteration({ sentinel: true });
      return { sentinel: true };
    }

    const tests = await this.deps.tests.run(this.signal);
    this.throwIfAborted();
    ConsoleReporter.testsFinished(tests.passed, tests.exitCode, tests.duration);
    this.emit({
      event: 'tests_finished',
      iteration: state.iteration,
      loop_marker: loopMarker,
      passed: tests.passed,
      exit_code: tests.exitCode,
    });
    this.runLog?.updateIteration({ testsPassed: tests.passed });

    if (state.mode !== 'implement') {
      return { sentinel: false, testsPassed: tests.passed };
    }

    const changed = await this.deps.changes.hasInScopeChange();
    this.runLog?.updateIteration({ changed });
    if (!changed) {
      ConsoleReporter.stallDetected(loopMarker);
      this.emit({ event: 'stall_detected', iteration: state.iteration, loop_marker: loopMarker });
    }
    return { sentinel: false, changed, testsPassed: tests.passed };
  }

  private buildPrompt(mode: ModeType, report: AuditReport, loopMarker: string): PromptPayload {
    return buildAgentPrompt(mode, report, loopMarker, this.promptContext);
  }

  private async invokeAgent(prompt: PromptPayload): Promise<string> {
    this.throwIfAborted();
    ConsoleReporter.agentStarted(this.deps.agent.name, prompt.loopMarker);
    this.emit({ event: 'agent_started', loop_marker: prompt.loopMarker, mode: prompt.mode });

    const result = await this.deps.agent.spawn({
      workdir: this.projectRoot,
      prompt: prompt.text,
      timeout: this.agentTimeout,
      signal: this.signal,
      env: {
        CLOSER_RUN_ID: this.runId,
        CLOSER_LOOP_MARKER: prompt.loopMarker,
        CLOSER_MODE: prompt.mode,
      },
    });
    this.totalAgentInvocations++;

    const current = this.runLog?.getLog().iterations.at(-1);
    this.runLog?.updateIteration({ agentInvocations: (current?.agentInvocations ?? 0) + 1 });

    ConsoleReporter.agentFinished(result.status, result.duration);
    this.emit({
      event: 'agent_finished',
      loop_marker: prompt.loopMarker,
      status: result.status,
      exit_code: result.exitCode,
      duration_ms: result.duration,
    });

    if (result.status === 'aborted') {
      throw controllerError('E_INTERRUPTED', 'Run interrupted during agent call');
    }
    return result.output;
  }

  // ===========================================================================
  // Termination
  // ===========================================================================

  private async converge(iteration: number, report: AuditReport): Promise<TerminationResult> {
    // Confirmation only: audit + sentinel already decided the outcome
    const finalTests = await this.deps.tests.run(this.signal);
    this.throwIfAborted();
    if (finalTests.passed) {
      ConsoleReporter.testsFinished(true, finalTests.exitCode, finalTests.duration);
    } else {
      ConsoleReporter.finalTestsFailed(finalTests.exitCode);
    }
    this.emit({
      event: 'final_tests_finished',
      iteration,
      passed: finalTests.passed,
      exit_code: finalTests.exitCode,
    });
    this.runLog?.updateIteration({ testsPassed: finalTests.passed });

    const message = finalTests.passed
      ? 'Audit fully covered and agent reported no changes needed.'
      : 'Audit fully covered and agent reported no changes needed; final test run failed.';

    ConsoleReporter.converged(iteration);
    this.emit({ event: 'run_completed', status: 'converged', iterations: iteration });
    this.runLog?.finish('converged', this.totalAgentInvocations, message);
    await this.runLog?.flush();

    return {
      status: 'converged',
      runId: this.runId,
      iterations: iteration,
      message,
      finalReport: report,
    };
  }

  private async exceedMaxLoops(report: AuditReport | undefined): Promise<TerminationResult> {
    const message = `Max loops (${this.maxLoops}) reached without convergence.`;

    ConsoleReporter.maxLoopsExceeded(this.maxLoops, report);
    this.emit({
      event: 'run_completed',
      status: 'max_loops_exceeded',
      iterations: this.maxLoops,
      missing: report ? missingIds(report) : [],
      partial: report ? partialIds(report) : [],
    });
    this.runLog?.finish('max_loops_exceeded', this.totalAgentInvocations, message);
    await this.runLog?.flush();

    return {
      status: 'max_loops_exceeded',
      runId: this.runId,
      iterations: this.maxLoops,
      message,
      code: 'E_MAX_LOOPS',
      finalReport: report,
    };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private emit(event: ControllerEventInput): void {
    this.eventLogger?.emit(event);
  }

  private throwIfAborted(): void {
    if (this.signal?.aborted) {
      throw controllerError('E_INTERRUPTED', 'Run interrupted');
    }
  }
}
