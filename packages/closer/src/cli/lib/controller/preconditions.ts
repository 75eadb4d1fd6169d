/**
 * Pre-loop checks for the external collaborators the controller needs.
 */

import { access, constants } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';

import type { ControllerConfig } from '../../../lib/controller/config.js';
import { controllerError } from '../errors.js';
import { isInPath } from './backends/detect.js';
import { isInsideWorkTree } from './git.js';

export type RequiredResource =
  | { kind: 'worktree'; label: string }
  | { kind: 'executable'; name: string; label: string }
  | { kind: 'file'; path: string; label: string; executable?: boolean };

export interface PreconditionOptions {
  projectRoot: string;
  /** Lookup for executables; defaults to a PATH search. */
  which?: (command: string) => boolean;
  /** Working-tree probe; defaults to `git rev-parse --is-inside-work-tree`. */
  isWorkTree?: (root: string) => Promise<boolean>;
}

/** Resources a run needs, in the order they are checked. */
export function requiredResources(
  config: ControllerConfig,
  agentExecutable: string,
): RequiredResource[] {
  const resources: RequiredResource[] = [
    { kind: 'executable', name: 'git', label: 'version control (git)' },
    { kind: 'worktree', label: 'git working tree' },
    { kind: 'executable', name: agentExecutable, label: 'agent executable' },
    { kind: 'executable', name: config.test.command, label: 'test runner' },
  ];
  if (config.audit.interpreter) {
    resources.push({
      kind: 'executable',
      name: config.audit.interpreter,
      label: 'audit interpreter',
    });
  }
  resources.push(
    { kind: 'file', path: config.spec, label: 'specification document' },
    { kind: 'file', path: config.agent_rules, label: 'agent rules document' },
    {
      kind: 'file',
      path: config.audit.path,
      label: 'audit tool',
      executable: config.audit.interpreter === null,
    },
  );
  return resources;
}

/** Throw E_PRECONDITION_MISSING for the first resource that is absent. */
export async function checkPreconditions(
  resources: RequiredResource[],
  opts: PreconditionOptions,
): Promise<void> {
  const which = opts.which ?? isInPath;
  const isWorkTree = opts.isWorkTree ?? isInsideWorkTree;

  for (const resource of resources) {
    if (resource.kind === 'worktree') {
      if (!(await isWorkTree(opts.projectRoot))) {
        throw controllerError(
          'E_PRECONDITION_MISSING',
          `Missing ${resource.label}: ${opts.projectRoot} is not inside a git repository`,
        );
      }
      continue;
    }

    if (resource.kind === 'executable') {
      if (!which(resource.name)) {
        throw controllerError(
          'E_PRECONDITION_MISSING',
          `Missing ${resource.label}: "${resource.name}" not found in PATH`,
        );
      }
      continue;
    }

    const fullPath = isAbsolute(resource.path)
      ? resource.path
      : join(opts.projectRoot, resource.path);
    try {
      await access(fullPath, resource.executable ? constants.X_OK : constants.R_OK);
    } catch {
      throw controllerError(
        'E_PRECONDITION_MISSING',
        `Missing ${resource.label}: ${resource.path}`,
      );
    }
  }
}
