/**
 * Read-only git queries plus the optional per-run branch.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

/** Large enough for a full diff of the in-scope directories. */
const MAX_BUFFER = 256 * 1024 * 1024;

export async function git(repoRoot: string, args: string[]): Promise<string> {
  const { stdout } = await execFileAsync('git', ['-C', repoRoot, ...args], {
    maxBuffer: MAX_BUFFER,
  });
  return stdout;
}

/** True when `repoRoot` is inside a git working tree. */
export async function isInsideWorkTree(repoRoot: string): Promise<boolean> {
  try {
    const stdout = await git(repoRoot, ['rev-parse', '--is-inside-work-tree']);
    return stdout.trim() === 'true';
  } catch {
    return false;
  }
}

function timestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Create and check out `closer/<timestamp>`.
 * Returns the branch name, or null when git refuses (detached HEAD, name clash).
 */
export async function createRunBranch(repoRoot: string, now = new Date()): Promise<string | null> {
  const branchName = `closer/${timestamp(now)}`;
  try {
    await git(repoRoot, ['checkout', '-b', branchName]);
    return branchName;
  } catch {
    return null;
  }
}
