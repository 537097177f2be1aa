/**
 * Bump Version Workflow - release-helper bump-version
 */

import { bumpVersion } from '../core/version-command.ts';
import { createPythonManifest, getVersion } from '../manifest/mod.ts';
import { ReleaseError } from '../lib/error.ts';
import { isCanonical } from '../lib/version.ts';
import type { WorkflowContext } from './context.ts';

export interface BumpVersionOptions {
  /** e.g. patch, minor, 1.2.3 */
  spec: string;
  /** Version command, detected when omitted */
  command?: string;
}

export interface BumpVersionResult {
  version: string;
  command: string;
}

export async function bumpVersionWorkflow(
  ctx: Pick<WorkflowContext, 'git' | 'run'>,
  options: BumpVersionOptions,
): Promise<BumpVersionResult> {
  const cwd = ctx.git.cwd;
  const command = await bumpVersion(ctx.run, { spec: options.spec, command: options.command, cwd });
  const version = await getVersion(ctx.run, cwd);

  // PyPI normalizes anything else, which breaks the tag/version match
  if ((await createPythonManifest(ctx.run, cwd)) && !isCanonical(version)) {
    throw new ReleaseError(
      `Python version ${version} is not in canonical form`,
      'INVALID_VERSION',
      { version, hint: 'See https://peps.python.org/pep-0440/#appendix-b-parsing-version-strings-with-regular-expressions' },
    );
  }

  return { version, command };
}
