/**
 * Base class for command handlers: output mode and error reporting.
 */

import type { Command } from 'commander';
import pc from 'picocolors';

import { ControllerError } from './errors.js';

export interface GlobalOptions {
  json?: boolean;
  color?: boolean;
}

export type Colors = ReturnType<typeof makeColors>;

function makeColors(enabled: boolean) {
  const c = pc.createColors(enabled);
  return {
    bold: c.bold,
    dim: c.dim,
    success: c.green,
    error: c.red,
    warn: c.yellow,
    id: c.cyan,
  };
}

/**
 * Writes either human-readable text or a single JSON document to stdout.
 * Diagnostics always go to stderr.
 */
export class OutputManager {
  private readonly colors: Colors;

  constructor(private readonly opts: GlobalOptions) {
    this.colors = makeColors(opts.color !== false && !opts.json && pc.isColorSupported);
  }

  get json(): boolean {
    return this.opts.json === true;
  }

  getColors(): Colors {
    return this.colors;
  }

  /** Print `value` as JSON in --json mode, otherwise call `text`. */
  data(value: unknown, text: () => void): void {
    if (this.json) {
      console.log(JSON.stringify(value, null, 2));
    } else {
      text();
    }
  }

  info(message: string): void {
    if (!this.json) console.log(message);
  }

  success(message: string): void {
    if (!this.json) console.log(this.colors.success(message));
  }

  warn(message: string): void {
    console.error(this.colors.warn(message));
  }

  error(message: string): void {
    console.error(this.colors.error(message));
  }
}

export abstract class BaseCommand {
  protected readonly output: OutputManager;

  constructor(command: Command) {
    this.output = new OutputManager(command.optsWithGlobals<GlobalOptions>());
  }

  /** Report a ControllerError and exit with its code; rethrow anything else. */
  protected exitWithError(err: unknown): never {
    if (err instanceof ControllerError) {
      const { code, message, exitCode } = err;
      this.output.data({ error: { code, message } }, () => {
        this.output.error(`Error [${code}]: ${message}`);
      });
      process.exit(exitCode);
    }
    throw err;
  }
}
