/**
 * Claude Code backend implementation.
 *
 * Spawns `claude -p "..." --permission-mode <mode> --output-format text`
 */

import type { AgentBackend, AgentResult, SpawnOptions } from '../../../../lib/controller/types.js';
import { spawnProcess, toAgentResult } from './backend.js';

const DEFAULT_PERMISSION_MODE = 'acceptEdits';

export class ClaudeCodeBackend implements AgentBackend {
  name = 'claude-code';
  readonly executable: string;
  private readonly permissionMode: string;

  constructor(opts: { executable?: string | null; sandbox?: string | null } = {}) {
    this.executable = opts.executable ?? 'claude';
    this.permissionMode = opts.sandbox ?? DEFAULT_PERMISSION_MODE;
  }

  async spawn(opts: SpawnOptions): Promise<AgentResult> {
    // Plain text output: the sentinel check reads the transcript as-is
    const args = [
      '-p',
      opts.prompt,
      '--permission-mode',
      this.permissionMode,
      '--output-format',
      'text',
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
