/**
 * Shared inputs of the release workflows.
 */

import type { GitClient } from '../clients/types.ts';
import type { Runner } from '../clients/shell.ts';
import { branchFromEnv, repoFromRemoteUrl } from '../domain/repository.ts';

export type Env = Record<string, string | undefined>;

export interface WorkflowContext {
  git: GitClient;
  run: Runner;
  env: Env;
}

/**
 * Branch to release from: explicit, else the CI ref, else the checkout.
 */
export async function resolveBranch(git: GitClient, env: Env, branch?: string | null): Promise<string> {
  return branch || branchFromEnv(env) || (await git.getCurrentBranch());
}

/**
 * `owner/repo`: explicit, else parsed from the remote url.
 */
export async function resolveRepo(git: GitClient, remote: string, repo?: string | null): Promise<string> {
  return repo || repoFromRemoteUrl(await git.getRemoteUrl(remote));
}
