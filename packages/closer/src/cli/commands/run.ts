/**
 * `closer` - Drive the audit → agent → test loop until the audit is fully
 * covered and the agent confirms nothing is left to change.
 */

import { Command } from 'commander';
import { readFile, readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { parse as yamlParse } from 'yaml';
import { ZodError } from 'zod';

import { BaseCommand } from '../lib/base-command.js';
import { ControllerError, controllerError } from '../lib/errors.js';
import { CONFIG_FILENAME, RUNS_DIR } from '../../lib/paths.js';
import {
  applyOverrides,
  overridesFromEnv,
  parseControllerConfig,
  type ConfigOverrides,
  type ControllerConfig,
} from '../../lib/controller/config.js';
import { missingIds, partialIds } from '../../lib/controller/audit-parser.js';
import { RunLogSchema, exitCodeFor } from '../../lib/controller/types.js';
import { killAllActiveProcesses } from '../lib/controller/backends/backend.js';
import { LoopController } from '../lib/controller/loop-controller.js';
import { RUN_LOG_FILENAME } from '../lib/controller/run-log.js';

// =============================================================================
// Options
// =============================================================================

interface RunOptions {
  config?: string;
  agent?: string;
  sandbox?: string;
  maxLoops?: string;
  backend?: string;
  status?: string | true;
  dryRun?: boolean;
}

// =============================================================================
// Handler
// =============================================================================

class RunHandler extends BaseCommand {
  async run(options: RunOptions): Promise<void> {
    const projectRoot = process.cwd();

    try {
      if (options.status !== undefined) {
        await this.showStatus(projectRoot, options.status);
        return;
      }

      const config = await loadConfig(projectRoot, options);

      if (options.dryRun) {
        await this.preview(projectRoot, config);
        return;
      }

      await this.execute(projectRoot, config);
    } catch (err: unknown) {
      this.exitWithError(err);
    }
  }

  private async execute(projectRoot: string, config: ControllerConfig): Promise<void> {
    const abort = new AbortController();
    let signalCount = 0;
    const onSignal = () => {
      signalCount++;
      if (signalCount > 1) {
        killAllActiveProcesses();
        process.exit(130);
      }
      abort.abort();
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

    try {
      const controller = new LoopController({ config, projectRoot, signal: abort.signal });
      const result = await controller.run();

      this.output.data(result, () => {
        const colors = this.output.getColors();
        if (result.status === 'converged') {
          console.log(colors.bold(colors.success('Converged')));
        } else if (result.status === 'max_loops_exceeded') {
          console.log(colors.bold(colors.error('Max loops exceeded')));
        } else {
          console.log(colors.bold(colors.error('Fatal precondition')));
        }
        console.log(`  Run ID:      ${result.runId}`);
        console.log(`  Iterations:  ${result.iterations}`);
        if (result.message) {
          console.log(`  Message:     ${result.message}`);
        }
        if (result.status === 'max_loops_exceeded' && result.finalReport) {
          console.log(`  Missing:     ${missingIds(result.finalReport).join(', ') || '(none)'}`);
          console.log(`  Partial:     ${partialIds(result.finalReport).join(', ') || '(none)'}`);
        }
      });

      process.exitCode = exitCodeFor(result);
    } finally {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    }
  }

  private async preview(projectRoot: string, config: ControllerConfig): Promise<void> {
    const controller = new LoopController({ config, projectRoot });
    const result = await controller.preview();

    if ('status' in result) {
      this.output.data(result, () => {
        const colors = this.output.getColors();
        console.log(colors.bold(colors.error('Fatal precondition')));
        if (result.message) console.log(`  Message:     ${result.message}`);
      });
      process.exitCode = exitCodeFor(result);
      return;
    }

    this.output.data(
      { mode: result.mode, requirements: result.report.requirements, prompt: result.prompt.text },
      () => {
        const colors = this.output.getColors();
        console.log(colors.bold('Dry run complete'));
        console.log(`  Backend:  ${config.agent.backend}`);
        console.log(`  Mode:     ${result.mode.toUpperCase()}`);
        console.log('');
        console.log(colors.bold('  Prompt:'));
        console.log(result.prompt.text);
      },
    );
  }

  // ===========================================================================
  // Status Display
  // ===========================================================================

  private async showStatus(projectRoot: string, runIdArg: string | true): Promise<void> {
    const runsDir = join(projectRoot, RUNS_DIR);
    if (runIdArg === true) {
      await this.listRuns(runsDir);
      return;
    }
    await this.showRunStatus(runsDir, runIdArg);
  }

  private async listRuns(runsDir: string): Promise<void> {
    let entries: string[];
    try {
      entries = await readdir(runsDir);
    } catch {
      this.output.info('No runs found.');
      return;
    }

    const runs = entries
      .filter((e) => e.startsWith('run-'))
      .sort()
      .reverse();

    if (runs.length === 0) {
      this.output.info('No runs found.');
      return;
    }

    const summaries: { runId: string; status: string; iterations: number; startedAt: string }[] =
      [];

    for (const runId of runs) {
      try {
        const content = await readFile(join(runsDir, runId, RUN_LOG_FILENAME), 'utf-8');
        const log = RunLogSchema.parse(yamlParse(content));
        summaries.push({
          runId: log.runId,
          status: log.status,
          iterations: log.iterations.length,
          startedAt: log.startedAt,
        });
      } catch {
        summaries.push({ runId, status: 'unknown', iterations: 0, startedAt: '?' });
      }
    }

    this.output.data(summaries, () => {
      const colors = this.output.getColors();
      console.log(colors.bold('Runs:'));
      console.log('');
      for (const s of summaries) {
        const statusColor =
          s.status === 'converged'
            ? colors.success
            : s.status === 'in_progress'
              ? colors.warn
              : s.status === 'unknown'
                ? colors.dim
                : colors.error;
        console.log(
          `  ${colors.id(s.runId)}  ${statusColor(s.status.padEnd(20))}  ${s.iterations} loop(s)`,
        );
      }
    });
  }

  private async showRunStatus(runsDir: string, runId: string): Promise<void> {
    let logContent: string;
    try {
      logContent = await readFile(join(runsDir, runId, RUN_LOG_FILENAME), 'utf-8');
    } catch {
      throw controllerError('E_PRECONDITION_MISSING', `Run not found: ${runId}`);
    }

    const log = RunLogSchema.parse(yamlParse(logContent));

    this.output.data(log, () => {
      const colors = this.output.getColors();
      console.log(colors.bold(`Run: ${log.runId}`));
      console.log(`  Spec:        ${log.spec}`);
      console.log(`  Status:      ${log.status}`);
      console.log(`  Max loops:   ${log.maxLoops}`);
      console.log(`  Started:     ${log.startedAt}`);
      if (log.completedAt) console.log(`  Completed:   ${log.completedAt}`);
      if (log.totalDuration) console.log(`  Duration:    ${log.totalDuration}`);
      if (log.totalAgentInvocations !== undefined) {
        console.log(`  Agents:      ${log.totalAgentInvocations}`);
      }
      if (log.message) console.log(`  Message:     ${log.message}`);

      if (log.iterations.length > 0) {
        console.log('');
        console.log(colors.bold('  Iterations:'));
        for (const iter of log.iterations) {
          const flags = [
            iter.retried ? 'retried' : null,
            iter.sentinel ? 'sentinel' : null,
            iter.testsPassed === false ? 'tests failed' : null,
          ].filter((f): f is string => f !== null);
          console.log(
            `    #${iter.iteration}: ${iter.mode}, missing ${iter.missing.length}, ` +
              `partial ${iter.partial.length}, ${iter.agentInvocations} agent call(s)` +
              (flags.length > 0 ? colors.dim(` [${flags.join(', ')}]`) : ''),
          );
        }
      }
    });
  }
}

// =============================================================================
// Config Loading
// =============================================================================

/**
 * Resolve the effective configuration: file, then CLOSER_* environment,
 * then CLI flags. Any failure is E_CONFIG_INVALID.
 */
export async function loadConfig(
  projectRoot: string,
  options: Pick<RunOptions, 'config' | 'agent' | 'sandbox' | 'maxLoops' | 'backend'>,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ControllerConfig> {
  const configPath = resolve(projectRoot, options.config ?? CONFIG_FILENAME);
  let rawConfig: unknown = {};

  try {
    const content = await readFile(configPath, 'utf-8');
    rawConfig = yamlParse(content) ?? {};
  } catch (err: unknown) {
    const missing =
      typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
    // An explicitly named config file must exist
    if (!missing || options.config) {
      const msg = err instanceof Error ? err.message : String(err);
      throw controllerError('E_CONFIG_INVALID', `Invalid config at ${configPath}: ${msg}`);
    }
  }

  const cliOverrides: ConfigOverrides = {};
  if (options.agent) cliOverrides.agentCommand = options.agent;
  if (options.sandbox) cliOverrides.sandbox = options.sandbox;
  if (options.maxLoops) cliOverrides.maxLoops = options.maxLoops;
  if (options.backend) cliOverrides.backend = options.backend;

  try {
    return parseControllerConfig(applyOverrides(rawConfig, overridesFromEnv(env), cliOverrides));
  } catch (err: unknown) {
    if (err instanceof ControllerError) throw err;
    const msg =
      err instanceof ZodError
        ? err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
        : err instanceof Error
          ? err.message
          : String(err);
    throw controllerError('E_CONFIG_INVALID', `Invalid config: ${msg}`);
  }
}

// =============================================================================
// Command Definition
// =============================================================================

export const runCommand = new Command('closer')
  .description('Run the audit/agent/test loop until convergence or the loop limit')
  .option('--json', 'Output as JSON')
  .option('--no-color', 'Disable colored output')
  .option('--config <path>', `Config file (default: ${CONFIG_FILENAME})`)
  .option('--agent <command>', 'Agent executable (overrides CLOSER_AGENT)')
  .option('--sandbox <mode>', 'Agent sandbox or permission mode (overrides CLOSER_SANDBOX)')
  .option('--max-loops <n>', 'Maximum loop iterations (overrides CLOSER_MAX_LOOPS)')
  .option('--backend <name>', 'Agent backend: codex, claude-code, subprocess')
  .option('--status [run-id]', 'Show recorded runs, or one run in detail')
  .option('--dry-run', 'Check preconditions, audit once and print the prompt; invoke nothing')
  .action(async (options: RunOptions, command: Command) => {
    const handler = new RunHandler(command);
    await handler.run(options);
  });
