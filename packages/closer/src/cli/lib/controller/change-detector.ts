/**
 * Detects whether the working tree changed inside the in-scope directories
 * since the last checkpoint.
 *
 * A checkpoint pins the commit HEAD points at and takes a SHA-256
 * fingerprint over:
 * - `git diff <pinned commit> --binary` limited to the scope
 * - every untracked, non-ignored file in the scope, by path and content hash
 *
 * Later fingerprints diff against the same pinned commit, so edits the agent
 * commits still show up. Before the first commit there is nothing to pin,
 * so every file in the index is hashed by content instead.
 *
 * Any addition, deletion or modification changes the fingerprint.
 */

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { ChangeSource } from '../../../lib/controller/types.js';
import { git } from './git.js';

export class ChangeDetector implements ChangeSource {
  private baseline: string | null = null;
  private baseCommit: string | null = null;

  constructor(
    private readonly repoRoot: string,
    private readonly scope: string[],
  ) {}

  /** Record the current state of the in-scope directories. */
  async checkpoint(): Promise<void> {
    this.baseCommit = await this.resolveHead();
    this.baseline = await this.fingerprint(this.baseCommit);
  }

  /** True unless the scope is byte-identical to the last checkpoint. */
  async hasInScopeChange(): Promise<boolean> {
    if (this.baseline === null) {
      throw new Error('ChangeDetector.hasInScopeChange() called before checkpoint()');
    }
    return (await this.fingerprint(this.baseCommit)) !== this.baseline;
  }

  /** Commit id HEAD points at, or null before the first commit. */
  private async resolveHead(): Promise<string | null> {
    try {
      return (await git(this.repoRoot, ['rev-parse', '--verify', '--quiet', 'HEAD'])).trim();
    } catch {
      return null;
    }
  }

  async fingerprint(baseCommit: string | null): Promise<string> {
    const hash = createHash('sha256');

    const listArgs = ['ls-files', '--others', '--exclude-standard'];
    if (baseCommit) {
      const diff = await git(this.repoRoot, ['diff', baseCommit, '--binary', '--', ...this.scope]);
      hash.update('diff\0').update(diff);
    } else {
      listArgs.push('--cached');
    }

    const listed = await git(this.repoRoot, [...listArgs, '-z', '--', ...this.scope]);
    const files = listed.split('\0').filter(Boolean).sort();

    for (const file of files) {
      hash.update(`file\0${file}\0`);
      try {
        const content = await readFile(join(this.repoRoot, file));
        hash.update(createHash('sha256').update(content).digest('hex'));
      } catch {
        // Removed between listing and reading
        hash.update('missing');
      }
    }

    return hash.digest('hex');
  }
}
