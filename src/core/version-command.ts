/**
 * Version bumping through the project's own version tool.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { pathExists } from 'fs-extra/esm';
import type { Runner } from '../clients/shell.ts';
import { ReleaseError } from '../lib/error.ts';

export const TBUMP_COMMAND = 'tbump --non-interactive --only-patch';
export const BUMP2VERSION_COMMAND = 'bump2version';
export const NPM_VERSION_COMMAND = 'npm version --git-tag-version false';

const BUMP2VERSION_FILES = [
  'bumpversion.cfg',
  '.bumpversion.cfg',
  'bump2version.cfg',
  '.bump2version.cfg',
];

async function fileContains(path: string, needle: string): Promise<boolean> {
  if (!(await pathExists(path))) return false;
  return (await readFile(path, 'utf8')).includes(needle);
}

/**
 * Pick the version command from the files in the project, null when
 * nothing matches.
 *
 * Precedence: a bump2version config file, tbump (tbump.toml or a
 * pyproject.toml mentioning it), a setup.cfg with a bumpversion section,
 * then `npm version` for package.json projects.
 */
export async function detectVersionCommand(root: string): Promise<string | null> {
  for (const name of BUMP2VERSION_FILES) {
    if (await pathExists(join(root, name))) return BUMP2VERSION_COMMAND;
  }

  if (await pathExists(join(root, 'tbump.toml'))) return TBUMP_COMMAND;
  if (await fileContains(join(root, 'pyproject.toml'), 'tbump')) return TBUMP_COMMAND;
  if (await fileContains(join(root, 'setup.cfg'), 'bumpversion')) return BUMP2VERSION_COMMAND;
  if (await pathExists(join(root, 'package.json'))) return NPM_VERSION_COMMAND;

  return null;
}

export interface BumpOptions {
  /** e.g. patch, minor, 1.2.3 */
  spec: string;
  /** Explicit command, detected when omitted */
  command?: string;
  cwd: string;
}

/**
 * Run `<command> <spec>`.
 */
export async function bumpVersion(run: Runner, options: BumpOptions): Promise<string> {
  const command = options.command || (await detectVersionCommand(options.cwd));
  if (!command) {
    throw new ReleaseError(
      'Please specify a version bump command to run',
      'NO_VERSION_COMMAND',
      { cwd: options.cwd },
    );
  }

  await run(`${command} ${options.spec}`, { cwd: options.cwd });
  return command;
}
