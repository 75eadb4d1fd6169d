/**
 * Real-time console reporter for controller milestones.
 *
 * Prints to stderr so stdout stays clean for the final summary or JSON.
 */

import pc from 'picocolors';

import type { AuditReport, ModeType } from '../../../lib/controller/types.js';
import { missingIds, partialIds, coveredIds } from '../../../lib/controller/audit-parser.js';
import { formatDuration } from './run-log.js';

const PREFIX = pc.dim('[closer]');

function ts(): string {
  return pc.dim(new Date().toLocaleTimeString());
}

function log(msg: string): void {
  console.error(`${PREFIX} ${ts()} ${msg}`);
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `    ${line}`)
    .join('\n');
}

export const ConsoleReporter = {
  runStarted(runId: string, specPath: string, maxLoops: number): void {
    log(`${pc.bold('Run started')} ${pc.dim(runId)}`);
    log(`  Spec: ${specPath}  Max loops: ${maxLoops}`);
  },

  branchCreated(branch: string | null): void {
    if (branch) {
      log(`${pc.green('✓')} Working on branch ${pc.bold(branch)}`);
    } else {
      log(`${pc.yellow('⚠')} Could not create run branch, continuing on current branch`);
    }
  },

  preconditionsPassed(): void {
    log(`${pc.green('✓')} Integrity and preconditions OK`);
  },

  iterationStarted(iteration: number, maxLoops: number): void {
    log(`${pc.blue('→')} Loop ${pc.bold(`${iteration}/${maxLoops}`)}`);
  },

  auditFinished(report: AuditReport): void {
    log(`  Audit exit ${report.exitCode}. Raw output:`);
    console.error(indent(report.raw.trimEnd() || '(no output)'));
    if (!report.parsed) {
      log(`  ${pc.yellow('⚠')} Audit output not recognized, treating as empty report`);
    }
  },

  modeSelected(mode: ModeType, report: AuditReport): void {
    const label = mode === 'implement' ? pc.magenta('IMPLEMENT') : pc.cyan('VERIFY');
    log(
      `  Mode: ${pc.bold(label)} ` +
        pc.dim(
          `(missing ${missingIds(report).length}, partial ${partialIds(report).length}, ` +
            `covered ${coveredIds(report).length})`,
        ),
    );
  },

  agentStarted(backend: string, loopMarker: string): void {
    log(`  ${pc.dim('▶')} Agent ${backend} started ${pc.dim(`[loop ${loopMarker}]`)}`);
  },

  agentFinished(status: string, durationMs: number): void {
    const icon = status === 'success' ? pc.green('✓') : pc.red('✗');
    log(`  ${icon} Agent finished (${status}) ${pc.dim(formatDuration(durationMs))}`);
  },

  stallDetected(loopMarker: string): void {
    log(`  ${pc.yellow('●')} No in-scope change after ${pc.dim(`[loop ${loopMarker}]`)}`);
  },

  retrying(loopMarker: string): void {
    log(`  ${pc.yellow('↻')} Escalation retry ${pc.dim(`[loop ${loopMarker}]`)}`);
  },

  testsFinished(passed: boolean, exitCode: number, durationMs: number): void {
    const dur = pc.dim(formatDuration(durationMs));
    if (passed) {
      log(`  ${pc.green('✓')} Tests passed ${dur}`);
    } else {
      log(`  ${pc.yellow('⚠')} Tests failed (exit ${exitCode}) ${dur}`);
    }
  },

  sentinelSeen(): void {
    log(`  ${pc.green('✓')} Agent reported no changes needed`);
  },

  finalTestsFailed(exitCode: number): void {
    log(
      `  ${pc.yellow('⚠')} Final test run failed (exit ${exitCode}); ` +
        'converging on audit + sentinel',
    );
  },

  converged(iterations: number): void {
    log(`${pc.green(pc.bold('✓ Converged'))} after ${iterations} loop(s)`);
  },

  maxLoopsExceeded(maxLoops: number, report: AuditReport | undefined): void {
    log(`${pc.red(pc.bold('✗ Max loops exceeded'))} (${maxLoops})`);
    if (report) {
      log(`  Final missing: ${missingIds(report).join(', ') || '(none)'}`);
      log(`  Final partial: ${partialIds(report).join(', ') || '(none)'}`);
    }
  },

  fatal(message: string): void {
    log(`${pc.red(pc.bold('✗ Fatal precondition'))}: ${message}`);
  },

  runInterrupted(): void {
    log(`${pc.yellow('⚠')} Run interrupted, agent stopped`);
  },
};
