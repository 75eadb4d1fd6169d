/**
 * Agent backend construction and PATH lookup.
 */

import { execFileSync } from 'node:child_process';

import type { ControllerConfig } from '../../../../lib/controller/config.js';
import type { AgentBackend } from '../../../../lib/controller/types.js';
import { controllerError } from '../../errors.js';
import { ClaudeCodeBackend } from './claude-code.js';
import { CodexBackend } from './codex.js';
import { SubprocessBackend } from './subprocess.js';

/** True when `command` resolves to an executable on PATH (or is an executable path). */
export function isInPath(command: string): boolean {
  try {
    execFileSync('which', [command], { stdio: 'ignore' });
    return true;
  } catch {
    return false;
  }
}

/**
 * Create the agent backend named in config.
 *
 * `agent.command` replaces the backend's executable; for the subprocess
 * backend it is the whole command line and is required.
 */
export function createAgentBackend(config: ControllerConfig): AgentBackend {
  const { backend, command, sandbox } = config.agent;

  switch (backend) {
    case 'subprocess':
      if (!command) {
        throw controllerError(
          'E_CONFIG_INVALID',
          'Subprocess backend requires agent.command (or CLOSER_AGENT)',
        );
      }
      return new SubprocessBackend(command);
    case 'claude-code':
      return new ClaudeCodeBackend({ executable: command, sandbox });
    case 'codex':
      return new CodexBackend({ executable: command, sandbox });
  }
}
