/**
 * Codex CLI backend implementation.
 *
 * Spawns `codex exec --cd <workdir> --sandbox <mode> --ask-for-approval never "..."`
 */

import type { AgentBackend, AgentResult, SpawnOptions } from '../../../../lib/controller/types.js';
import { spawnProcess, toAgentResult } from './backend.js';

const DEFAULT_SANDBOX = 'workspace-write';

export class CodexBackend implements AgentBackend {
  name = 'codex';
  readonly executable: string;
  private readonly sandbox: string;

  constructor(opts: { executable?: string | null; sandbox?: string | null } = {}) {
    this.executable = opts.executable ?? 'codex';
    this.sandbox = opts.sandbox ?? DEFAULT_SANDBOX;
  }

  async spawn(opts: SpawnOptions): Promise<AgentResult> {
    const args = [
      'exec',
      '--cd',
      opts.workdir,
      '--sandbox',
      this.sandbox,
      '--ask-for-approval',
      'never',
      opts.prompt,
    ];

    const result = await spawnProcess(this.executable, args, {
      cwd: opts.workdir,
      timeout: opts.timeout,
      signal: opts.signal,
      env: opts.env,
    });

    return toAgentResult(result);
  }
}
