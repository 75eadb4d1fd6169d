/**
 * Integrity guard and precondition checker.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmod, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { parseControllerConfig } from '../src/lib/controller/config.js';
import {
  CORRUPTION_MARKER,
  controllerSourceFiles,
  verifyIntegrity,
} from '../src/cli/lib/controller/integrity-guard.js';
import {
  checkPreconditions,
  requiredResources,
} from '../src/cli/lib/controller/preconditions.js';
import { ControllerError } from '../src/cli/lib/errors.js';

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), 'closer-startup-'));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

// =============================================================================
// Integrity Guard
// =============================================================================

describe('verifyIntegrity', () => {
  it('passes clean files', async () => {
    const file = join(root, 'clean.ts');
    await writeFile(file, 'export const greeting = "héllo ✓";\n');
    await expect(verifyIntegrity([file])).resolves.toBeUndefined();
  });

  it('rejects a file containing the replacement character', async () => {
    const file = join(root, 'broken.ts');
    await writeFile(
      file,
      Buffer.concat([Buffer.from('const a = "'), CORRUPTION_MARKER, Buffer.from('";\n')]),
    );

    const error = await verifyIntegrity([file]).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ControllerError);
    expect(error).toMatchObject({ code: 'E_INTEGRITY_CORRUPT', exitCode: 2 });
    expect(error instanceof Error ? error.message : '').toContain(`${file} is corrupted`);
    expect(error instanceof Error ? error.message : '').toContain('at byte 11');
  });

  it('reports the first corrupt file and stops', async () => {
    const clean = join(root, 'a.ts');
    const broken = join(root, 'b.ts');
    await writeFile(clean, 'ok\n');
    await writeFile(broken, CORRUPTION_MARKER);

    await expect(verifyIntegrity([clean, broken])).rejects.toThrow(`${broken} is corrupted`);
  });

  it('walks nested directories and skips declaration files', async () => {
    await mkdir(join(root, 'a', 'b'), { recursive: true });
    await writeFile(join(root, 'top.ts'), '');
    await writeFile(join(root, 'a', 'b', 'deep.js'), '');
    await writeFile(join(root, 'a', 'types.d.ts'), '');
    await writeFile(join(root, 'a', 'notes.md'), '');

    expect(await controllerSourceFiles(root)).toEqual([
      join(root, 'a', 'b', 'deep.js'),
      join(root, 'top.ts'),
    ]);
  });

  it('treats an unreadable file as corrupt', async () => {
    await expect(verifyIntegrity([join(root, 'gone.ts')])).rejects.toMatchObject({
      code: 'E_INTEGRITY_CORRUPT',
    });
  });

  it('lists the controller sources and finds them intact', async () => {
    const files = await controllerSourceFiles();
    const has = (suffix: string) => files.some((f) => f.endsWith(suffix));

    expect(has(join('cli', 'lib', 'controller', 'loop-controller.ts'))).toBe(true);
    expect(has(join('cli', 'lib', 'controller', 'backends', 'codex.ts'))).toBe(true);
    expect(has(join('src', 'lib', 'controller', 'mode.ts'))).toBe(true);
    expect(has(join('src', 'lib', 'controller', 'audit-parser.ts'))).toBe(true);
    expect(has(join('src', 'index.ts'))).toBe(true);
    await expect(verifyIntegrity(files)).resolves.toBeUndefined();
  });
});

// =============================================================================
// Preconditions
// =============================================================================

describe('checkPreconditions', () => {
  const config = parseControllerConfig({});
  const resources = requiredResources(config, 'codex');

  async function writeProjectFiles(): Promise<void> {
    await mkdir(join(root, 'PRD'), { recursive: true });
    await mkdir(join(root, 'tools'), { recursive: true });
    await writeFile(join(root, 'PRD', 'product_prd.md'), '# PRD\n');
    await writeFile(join(root, 'AGENTS.md'), '# Rules\n');
    await writeFile(join(root, 'tools', 'prd_audit.py'), 'print("ok")\n');
  }

  const allPresent = () => true;
  const inWorkTree = () => Promise.resolve(true);
  const present = { projectRoot: '', which: allPresent, isWorkTree: inWorkTree };

  beforeEach(() => {
    present.projectRoot = root;
  });

  it('checks resources in a fixed order', () => {
    expect(resources.map((r) => r.label)).toEqual([
      'version control (git)',
      'git working tree',
      'agent executable',
      'test runner',
      'audit interpreter',
      'specification document',
      'agent rules document',
      'audit tool',
    ]);
  });

  it('omits the interpreter when the audit tool runs directly', () => {
    const direct = requiredResources(
      parseControllerConfig({ audit: { interpreter: null } }),
      'codex',
    );
    expect(direct.map((r) => r.label)).not.toContain('audit interpreter');
    expect(direct.at(-1)).toMatchObject({ kind: 'file', executable: true });
  });

  it('passes when everything is present', async () => {
    await writeProjectFiles();
    await expect(checkPreconditions(resources, present)).resolves.toBeUndefined();
  });

  it('names a missing agent executable', async () => {
    await writeProjectFiles();
    const which = (cmd: string) => cmd !== 'codex';

    await expect(
      checkPreconditions(resources, { projectRoot: root, which, isWorkTree: inWorkTree }),
    ).rejects.toMatchObject({
      code: 'E_PRECONDITION_MISSING',
      message: 'Missing agent executable: "codex" not found in PATH',
    });
  });

  it('names a missing specification document', async () => {
    await expect(checkPreconditions(resources, present)).rejects.toMatchObject({
      code: 'E_PRECONDITION_MISSING',
      message: 'Missing specification document: PRD/product_prd.md',
    });
  });

  it('fails outside a git working tree before touching files', async () => {
    await expect(
      checkPreconditions(resources, {
        projectRoot: root,
        which: allPresent,
        isWorkTree: () => Promise.resolve(false),
      }),
    ).rejects.toMatchObject({
      message: `Missing git working tree: ${root} is not inside a git repository`,
    });
  });

  it('requires the audit tool to be executable when run directly', async () => {
    await writeProjectFiles();
    await chmod(join(root, 'tools', 'prd_audit.py'), 0o644);
    const direct = requiredResources(
      parseControllerConfig({ audit: { interpreter: null } }),
      'codex',
    );

    await expect(checkPreconditions(direct, present)).rejects.toMatchObject({
      message: 'Missing audit tool: tools/prd_audit.py',
    });
  });
});
