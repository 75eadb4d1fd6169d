/**
 * Runs the external audit tool once and parses what it prints.
 *
 * A non-zero exit is the audit saying "not yet compliant", never a
 * controller failure.
 */

import type { ControllerConfig } from '../../../lib/controller/config.js';
import { parseAuditOutput, type AuditFormat } from '../../../lib/controller/audit-parser.js';
import type { AuditReport, AuditSource } from '../../../lib/controller/types.js';
import { spawnProcess } from './backends/backend.js';

export interface AuditRunnerOptions {
  projectRoot: string;
  /** Script or executable, relative to the project root. */
  toolPath: string;
  /** Interpreter to run the script with; null runs the path directly. */
  interpreter: string | null;
  format: AuditFormat;
}

export class AuditRunner implements AuditSource {
  constructor(private readonly opts: AuditRunnerOptions) {}

  static fromConfig(config: ControllerConfig, projectRoot: string): AuditRunner {
    return new AuditRunner({
      projectRoot,
      toolPath: config.audit.path,
      interpreter: config.audit.interpreter,
      format: config.audit.format,
    });
  }

  async run(signal?: AbortSignal): Promise<AuditReport> {
    const command = this.opts.interpreter ?? this.opts.toolPath;
    const args = this.opts.interpreter ? [this.opts.toolPath] : [];

    const result = await spawnProcess(command, args, { cwd: this.opts.projectRoot, signal });
    const raw = result.spawnError ? `${result.output}\n${result.spawnError}`.trim() : result.output;
    return parseAuditOutput(raw, result.exitCode, this.opts.format);
  }
}
