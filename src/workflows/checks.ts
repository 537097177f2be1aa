/**
 * Project checks - release-helper check-manifest, check-links
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { ensureDir } from 'fs-extra/esm';
import { createPythonManifest } from '../manifest/mod.ts';
import * as output from '../cli/output.ts';
import type { WorkflowContext } from './context.ts';

export const DEFAULT_LINKS_CACHE = '~/.cache/pytest-link-check';
export const DEFAULT_LINKS_EXPIRE = 604800;

/**
 * `check-manifest -v` for Python projects. Returns false when skipped.
 */
export async function checkManifestWorkflow(ctx: Pick<WorkflowContext, 'git' | 'run'>): Promise<boolean> {
  if (!(await createPythonManifest(ctx.run, ctx.git.cwd))) {
    output.skip('Skipping check-manifest since there are no python package files');
    return false;
  }
  await ctx.run('check-manifest -v', { cwd: ctx.git.cwd });
  return true;
}

export interface CheckLinksOptions {
  ignoreGlob: string[];
  cacheFile: string;
  linksExpire: number;
}

export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

/**
 * Command that link-checks the project's Markdown files.
 */
export function checkLinksCommand(cacheDir: string, options: CheckLinksOptions): string {
  const parts = [
    'pytest --check-links --check-links-cache',
    `--check-links-cache-expire-after ${options.linksExpire}`,
    `--check-links-cache-name ${cacheDir}/check-release-links`,
    '-k .md',
    ...options.ignoreGlob.map((glob) => `--ignore-glob ${glob}`),
  ];
  return parts.join(' ');
}

/**
 * Check Markdown links with a persistent cache. A failing run is retried
 * once for the failed links only, since remote hosts flake.
 */
export async function checkLinksWorkflow(
  ctx: Pick<WorkflowContext, 'git' | 'run'>,
  options: CheckLinksOptions,
): Promise<string> {
  const cacheDir = expandHome(options.cacheFile).replace(/\\/g, '/');
  await ensureDir(cacheDir);

  const command = checkLinksCommand(cacheDir, options);
  try {
    await ctx.run(command, { cwd: ctx.git.cwd });
  } catch {
    await ctx.run(`${command} --lf`, { cwd: ctx.git.cwd });
  }
  return command;
}
