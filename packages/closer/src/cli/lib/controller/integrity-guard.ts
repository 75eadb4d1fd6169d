/**
 * Self-integrity check for the controller's own sources.
 *
 * A lossy re-encode (for example an editor saving UTF-8 text through a
 * legacy code page) leaves U+FFFD replacement characters behind. The
 * controller refuses to run when any of its own files contain one.
 */

import { readdir, readFile } from 'node:fs/promises';
import { dirname, extname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { controllerError } from '../errors.js';

/** UTF-8 encoding of U+FFFD REPLACEMENT CHARACTER. */
export const CORRUPTION_MARKER = Buffer.from([0xef, 0xbf, 0xbd]);

const SOURCE_EXTENSIONS = new Set(['.ts', '.js', '.mjs', '.cjs']);

/** Package source root (`src/` or `dist/`), three levels above this module. */
const SOURCE_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '../../..');

async function collectSources(dir: string, out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      await collectSources(path, out);
    } else if (
      entry.isFile() &&
      SOURCE_EXTENSIONS.has(extname(entry.name)) &&
      !entry.name.endsWith('.d.ts')
    ) {
      out.push(path);
    }
  }
}

/** Every source file of the running controller, walked from the package source root. */
export async function controllerSourceFiles(root = SOURCE_ROOT): Promise<string[]> {
  const files: string[] = [];
  await collectSources(root, files);
  return files.sort();
}

/**
 * Throw E_INTEGRITY_CORRUPT if any file contains the corruption marker.
 * Reads only; an unreadable file is also reported as corrupt.
 */
export async function verifyIntegrity(files: string[]): Promise<void> {
  for (const file of files) {
    let content: Buffer;
    try {
      content = await readFile(file);
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      throw controllerError('E_INTEGRITY_CORRUPT', `Cannot read controller source ${file}: ${msg}`);
    }

    const offset = content.indexOf(CORRUPTION_MARKER);
    if (offset !== -1) {
      throw controllerError(
        'E_INTEGRITY_CORRUPT',
        `Controller source ${file} is corrupted: U+FFFD replacement character at byte ${offset}. ` +
          'Restore the file from version control before running.',
      );
    }
  }
}
