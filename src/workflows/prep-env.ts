/**
 * Prep Env Workflow - release-helper prep-env
 *
 * Everything a release job needs before building: a clean dist dir, git
 * prepared, the version bumped and checked against existing tags.
 */

import { join } from 'node:path';
import { remove } from 'fs-extra/esm';
import { ReleaseError } from '../lib/error.ts';
import { isPrerelease, tagName } from '../lib/version.ts';
import { bumpVersionWorkflow } from './bump-version.ts';
import { type WorkflowContext, resolveBranch, resolveRepo } from './context.ts';
import { prepGitWorkflow } from './prep-git.ts';

export interface PrepEnvOptions {
  versionSpec: string;
  versionCommand?: string;
  branch?: string | null;
  remote: string;
  repo?: string | null;
  username?: string;
  auth?: string;
  distDir: string;
}

export interface PrepEnvResult {
  branch: string;
  repo: string;
  version: string;
  isPrerelease: boolean;
}

export async function prepEnvWorkflow(
  ctx: WorkflowContext,
  options: PrepEnvOptions,
): Promise<PrepEnvResult> {
  const { git } = ctx;

  await remove(join(git.cwd, options.distDir));

  const branch = await resolveBranch(git, ctx.env, options.branch);
  const isAction = Boolean(ctx.env.GITHUB_ACTIONS);

  // On CI the remote may not exist yet, so the repo cannot come from it
  const repo = options.repo || (isAction ? null : await resolveRepo(git, options.remote));

  await prepGitWorkflow(git, {
    branch,
    remote: options.remote,
    repo,
    username: options.username,
    auth: options.auth,
    isAction,
  });

  const resolvedRepo = repo || (await resolveRepo(git, options.remote));
  const { version } = await bumpVersionWorkflow(ctx, {
    spec: options.versionSpec,
    command: options.versionCommand,
  });

  const tag = tagName(version);
  if (await git.tagExists(tag)) {
    throw new ReleaseError(
      `Tag ${tag} already exists`,
      'TAG_EXISTS',
      { tag, hint: `To delete run: git push --delete ${options.remote} ${tag}` },
    );
  }

  return { branch, repo: resolvedRepo, version, isPrerelease: isPrerelease(version) };
}
