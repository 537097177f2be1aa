/**
 * Prep Git Workflow - release-helper prep-git
 *
 * Makes the checkout ready to release from: bot identity and remote on
 * CI, all tags fetched, the release branch checked out.
 */

import type { GitClient } from '../clients/types.ts';
import { remoteUrl } from '../domain/repository.ts';
import { ReleaseError } from '../lib/error.ts';

export const ACTIONS_BOT_EMAIL = '41898282+github-actions[bot]@users.noreply.github.com';
export const ACTIONS_BOT_NAME = 'GitHub Action';

export interface PrepGitOptions {
  /** Branch to check out, none to stay on the current one */
  branch?: string | null;
  remote: string;
  /** owner/repo, needed to add a missing remote */
  repo?: string | null;
  username?: string;
  auth?: string;
  /** Running on GitHub Actions */
  isAction: boolean;
}

export interface PrepGitResult {
  remoteAdded: boolean;
  branch: string | null;
}

export async function prepGitWorkflow(
  git: GitClient,
  options: PrepGitOptions,
): Promise<PrepGitResult> {
  let remoteAdded = false;

  if (options.isAction) {
    await git.setGlobalConfig('user.email', ACTIONS_BOT_EMAIL);
    await git.setGlobalConfig('user.name', ACTIONS_BOT_NAME);

    const remotes = await git.listRemotes();
    if (!remotes.includes(options.remote)) {
      if (!options.repo) {
        throw new ReleaseError(
          `Remote ${options.remote} is missing and no repository was given`,
          'GIT_ERROR',
          { remote: options.remote },
        );
      }
      await git.addRemote(options.remote, remoteUrl(options.repo, options.username, options.auth));
      remoteAdded = true;
    }
  }

  // Make sure we have all tags
  await git.fetch(options.remote);

  if (!options.branch) {
    return { remoteAdded, branch: null };
  }

  // Check out the remote branch so we can push to it
  await git.fetch(options.remote, options.branch);

  const branches = await git.listBranches();
  if (branches.includes(options.branch)) {
    await git.checkout(options.branch);
  } else {
    await git.checkoutBranch(options.branch, `${options.remote}/${options.branch}`);
  }

  return { remoteAdded, branch: options.branch };
}
