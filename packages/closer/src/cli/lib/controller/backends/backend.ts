/**
 * Shared subprocess utilities for agents, the audit tool and the test runner.
 */

import { spawn, type ChildProcess } from 'node:child_process';

import type { AgentResult } from '../../../../lib/controller/types.js';

// =============================================================================
// Shared Process Spawn
// =============================================================================

const MAX_OUTPUT_LINES = 5_000;
const KILL_GRACE_MS = 10_000;

// =============================================================================
// Active Process Registry (for signal handler cleanup)
// =============================================================================

const activeProcesses = new Map<number, ChildProcess>();

/** Kill all active child process groups. Used by signal handler. */
export function killAllActiveProcesses(): void {
  for (const [, proc] of activeProcesses) {
    killProcessGroup(proc);
  }
}

export interface ProcessResult {
  exitCode: number;
  /** Combined stdout and stderr, in arrival order (tail only for huge outputs). */
  output: string;
  duration: number;
  timedOut: boolean;
  aborted: boolean;
  /** Set when the process could not be started at all. */
  spawnError?: string;
}

export interface SpawnProcessOptions {
  cwd: string;
  /** Milliseconds; undefined means no limit. */
  timeout?: number;
  signal?: AbortSignal;
  env?: Record<string, string>;
}

/** Line buffer that keeps the last N complete lines plus a trailing partial line. */
class OutputTail {
  private readonly lines: string[] = [];
  private partial = '';

  push(chunk: string): void {
    const parts = (this.partial + chunk).split('\n');
    this.partial = parts.pop() ?? '';
    this.lines.push(...parts);
    while (this.lines.length > MAX_OUTPUT_LINES) this.lines.shift();
  }

  toString(): string {
    return this.partial ? [...this.lines, this.partial].join('\n') : this.lines.join('\n');
  }
}

/**
 * Spawn a process with:
 * - detached process group (for clean tree-kill)
 * - a tail buffer of combined output
 * - optional timeout and abort signal via SIGTERM → grace → SIGKILL
 *
 * Never rejects; a failure to start resolves with exit code 127.
 */
export function spawnProcess(
  command: string,
  args: string[],
  opts: SpawnProcessOptions,
): Promise<ProcessResult> {
  return new Promise((resolve) => {
    const startTime = Date.now();
    let timedOut = false;
    let aborted = false;
    let settled = false;

    if (opts.signal?.aborted) {
      resolve({ exitCode: 130, output: '', duration: 0, timedOut: false, aborted: true });
      return;
    }

    const proc: ChildProcess = spawn(command, args, {
      cwd: opts.cwd,
      detached: true,
      env: { ...process.env, ...opts.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    if (proc.pid) activeProcesses.set(proc.pid, proc);

    // Decode per stream so a character split across chunks survives
    const tail = new OutputTail();
    proc.stdout?.setEncoding('utf8').on('data', (chunk: string) => tail.push(chunk));
    proc.stderr?.setEncoding('utf8').on('data', (chunk: string) => tail.push(chunk));

    const timeoutId =
      opts.timeout !== undefined
        ? setTimeout(() => {
            timedOut = true;
            killProcessGroup(proc);
          }, opts.timeout)
        : undefined;

    const onAbort = () => {
      aborted = true;
      killProcessGroup(proc);
    };
    opts.signal?.addEventListener('abort', onAbort, { once: true });

    const finish = (result: Omit<ProcessResult, 'duration' | 'output'>) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeoutId);
      opts.signal?.removeEventListener('abort', onAbort);
      if (proc.pid) activeProcesses.delete(proc.pid);
      resolve({ ...result, output: tail.toString(), duration: Date.now() - startTime });
    };

    proc.on('close', (code) => {
      finish({ exitCode: code ?? 1, timedOut, aborted });
    });

    proc.on('error', (err) => {
      finish({ exitCode: 127, timedOut: false, aborted, spawnError: err.message });
    });
  });
}

/**
 * Kill a process group: SIGTERM → grace period → SIGKILL.
 */
export function killProcessGroup(proc: ChildProcess): void {
  const pid = proc.pid;
  if (!pid) return;

  try {
    // Send SIGTERM to the entire process group
    process.kill(-pid, 'SIGTERM');
  } catch {
    // Process may already be dead
    return;
  }

  const forceKill = setTimeout(() => {
    try {
      process.kill(-pid, 'SIGKILL');
    } catch {
      // Process already exited
    }
  }, KILL_GRACE_MS);
  forceKill.unref();
}

/**
 * Convert a ProcessResult into an AgentResult.
 */
export function toAgentResult(result: ProcessResult): AgentResult {
  return {
    status: result.aborted
      ? 'aborted'
      : result.timedOut
        ? 'timeout'
        : result.exitCode === 0
          ? 'success'
          : 'failure',
    exitCode: result.exitCode,
    output: result.spawnError ? `${result.output}\n${result.spawnError}`.trim() : result.output,
    duration: result.duration,
  };
}
