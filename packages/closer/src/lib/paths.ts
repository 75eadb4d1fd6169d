/**
 * Paths for controller state inside a project.
 */

import { join } from 'node:path';

/** Directory holding all controller state. */
export const CLOSER_DIR = '.closer';

/** Directory holding one subdirectory per run. */
export const RUNS_DIR = join(CLOSER_DIR, 'runs');

/** Default project config file name. */
export const CONFIG_FILENAME = '.closer.yml';

/** Relative path of a run's state directory. */
export function runDir(runId: string): string {
  return join(RUNS_DIR, runId);
}
