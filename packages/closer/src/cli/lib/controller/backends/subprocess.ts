/**
 * Subprocess backend: a configurable command line for custom agents.
 *
 * The prompt is passed as the final argument.
 */

import type { AgentBackend, AgentResult, SpawnOptions } from '../../../../lib/controller/types.js';
import { spawnProcess, toAgentResult } from './backend.js';

export class SubprocessBackend implements AgentBackend {
  name = 'subprocess';
  readonly executable: string;
  private readonly baseArgs: string[];

  constructor(command: string) {
    const [executable, ...baseArgs] = command.trim().split(/\s+/);
    if (!executable) {
      throw new Error('Subprocess backend requires a non-empty agent.command');
    }
    this.executable = executable;
    this.baseArgs = baseArgs;
  }

  async spawn(opts: SpawnOptions): Promise<AgentResult> {
    const result = await spawnProcess(this.executable, [...this.baseArgs, opts.prompt], {
      cwd: opts.workdir,
      timeout: opts.timeout,
      signal: opts.signal,
      env: opts.env,
    });

    return toAgentResult(result);
  }
}
