/**
 * Dist Workflows - release-helper build-npm, check-npm, build-python, check-python
 *
 * Each returns null when the project has nothing of that kind to build.
 */

import { join } from 'node:path';
import { pathExists } from 'fs-extra/esm';
import * as npm from '../core/npm.ts';
import * as python from '../core/python.ts';
import * as output from '../cli/output.ts';
import type { WorkflowContext } from './context.ts';

type Context = Pick<WorkflowContext, 'git' | 'run'>;

async function hasPackageJson(ctx: Context): Promise<boolean> {
  if (await pathExists(join(ctx.git.cwd, 'package.json'))) return true;
  output.skip('Skipping since there is no package.json file');
  return false;
}

export async function buildNpmWorkflow(
  ctx: Context,
  options: { package: string; distDir: string },
): Promise<string[] | null> {
  if (!(await hasPackageJson(ctx))) return null;
  return await npm.buildDist(ctx.run, { ...options, cwd: ctx.git.cwd });
}

export async function checkNpmWorkflow(
  ctx: Context,
  options: { distDir: string; testCommand?: string },
): Promise<string[] | null> {
  if (!(await hasPackageJson(ctx))) return null;
  return await npm.checkDist(ctx.run, { ...options, cwd: ctx.git.cwd });
}

export async function buildPythonWorkflow(
  ctx: Context,
  options: { distDir: string },
): Promise<boolean> {
  const built = await python.buildDist(ctx.run, { ...options, cwd: ctx.git.cwd });
  if (!built) {
    output.skip('Skipping build-python since there are no python package files');
  }
  return built;
}

/**
 * Check every Python dist file of the dist dir. Returns the checked files.
 */
export async function checkPythonWorkflow(
  ctx: Context,
  options: { distDir: string; testCommand?: string },
): Promise<string[]> {
  const dists = await python.listDists(join(ctx.git.cwd, options.distDir));
  if (dists.length === 0) {
    output.skip('Skipping check-python since there are no python dist files');
  }
  for (const dist of dists) {
    await python.checkDist(ctx.run, dist, { testCommand: options.testCommand });
  }
  return dists;
}
