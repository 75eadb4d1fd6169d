/**
 * Program definition for the `closer` binary: one command, no subcommands.
 */

import type { Command } from 'commander';

import { runCommand } from './commands/run.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  return runCommand.version(VERSION);
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}
