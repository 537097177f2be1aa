/**
 * Open a pull request with the working tree's changelog changes.
 */

import { randomUUID } from 'node:crypto';
import type { GitClient, GitHubClient } from '../clients/types.ts';
import type { PullRequest } from '../domain/types.ts';

export interface ChangelogPROptions {
  /** Base branch of the PR */
  branch: string;
  remote: string;
  title: string;
  commitMessage: string;
  body: string;
  dryRun: boolean;
}

/**
 * Commit the working changes onto a fresh branch off `<remote>/<branch>`,
 * push it and open the PR. On a dry run nothing leaves the checkout and
 * no PR is returned.
 */
export async function makeChangelogPR(
  git: GitClient,
  github: GitHubClient,
  options: ChangelogPROptions,
): Promise<PullRequest | null> {
  const prBranch = `changelog-${randomUUID().replace(/-/g, '')}`;

  if (!options.dryRun) {
    // Carry the changes over to the new branch
    await git.diff();
    await git.stash();
    await git.fetch(options.remote, options.branch);
    await git.checkoutBranch(prBranch, `${options.remote}/${options.branch}`);
    await git.stashApply();
  }

  await git.commitAll([options.commitMessage]);

  if (options.dryRun) {
    return null;
  }

  await git.push(options.remote, prBranch);

  return await github.createPR({
    title: options.title,
    body: options.body,
    head: prBranch,
    base: options.branch,
    maintainerCanModify: true,
  });
}
