/**
 * Runs the project's test runner over the whole project.
 * Pass/fail comes from the exit status alone; output is kept for display.
 */

import type { ControllerConfig } from '../../../lib/controller/config.js';
import type { TestGateResult, TestSource } from '../../../lib/controller/types.js';
import { spawnProcess } from './backends/backend.js';

export class TestGate implements TestSource {
  constructor(
    private readonly projectRoot: string,
    private readonly command: string,
    private readonly args: string[] = [],
  ) {}

  static fromConfig(config: ControllerConfig, projectRoot: string): TestGate {
    return new TestGate(projectRoot, config.test.command, config.test.args);
  }

  async run(signal?: AbortSignal): Promise<TestGateResult> {
    const result = await spawnProcess(this.command, this.args, { cwd: this.projectRoot, signal });
    return {
      passed: result.exitCode === 0 && !result.aborted,
      exitCode: result.exitCode,
      output: result.spawnError ? `${result.output}\n${result.spawnError}`.trim() : result.output,
      duration: result.duration,
    };
  }
}
