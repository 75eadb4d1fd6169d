/**
 * Structured run log (run-log.yml) writer.
 *
 * Rewritten after every iteration so an operator can read progress
 * while the loop is still running.
 */

import { writeFile } from 'atomically';
import { join } from 'node:path';
import { stringify as yamlStringify } from 'yaml';

import type {
  RunLog,
  RunLogIteration,
  TerminationStatusType,
} from '../../../lib/controller/types.js';

export const RUN_LOG_FILENAME = 'run-log.yml';

export class RunLogWriter {
  private readonly logPath: string;
  private readonly log: RunLog;

  constructor(runDir: string, runId: string, spec: string, maxLoops: number) {
    this.logPath = join(runDir, RUN_LOG_FILENAME);
    this.log = {
      runId,
      spec,
      startedAt: new Date().toISOString(),
      status: 'in_progress',
      maxLoops,
      iterations: [],
    };
  }

  /** Start a new iteration. */
  startIteration(entry: Omit<RunLogIteration, 'startedAt'>): void {
    this.log.iterations.push({ ...entry, startedAt: new Date().toISOString() });
  }

  /** Update the current iteration. */
  updateIteration(updates: Partial<RunLogIteration>): void {
    const current = this.log.iterations[this.log.iterations.length - 1];
    if (current) {
      Object.assign(current, updates);
    }
  }

  /** Record how the run ended. */
  finish(status: TerminationStatusType, totalAgentInvocations: number, message?: string): void {
    this.log.status = status;
    this.log.completedAt = new Date().toISOString();
    this.log.totalAgentInvocations = totalAgentInvocations;
    if (message) this.log.message = message;

    const start = new Date(this.log.startedAt).getTime();
    const end = new Date(this.log.completedAt).getTime();
    this.log.totalDuration = formatDuration(end - start);
  }

  /** Write the run log to disk. */
  async flush(): Promise<void> {
    await writeFile(this.logPath, yamlStringify(this.log), 'utf-8');
  }

  /** Get the current log state (for status display). */
  getLog(): RunLog {
    return this.log;
  }
}

export function formatDuration(ms: number): string {
  const hours = Math.floor(ms / (60 * 60 * 1000));
  const minutes = Math.floor((ms % (60 * 60 * 1000)) / (60 * 1000));
  const seconds = Math.floor((ms % (60 * 1000)) / 1000);
  if (hours > 0) {
    return `${hours}h${minutes}m`;
  }
  if (minutes > 0) {
    return `${minutes}m${seconds}s`;
  }
  return `${seconds}s`;
}
