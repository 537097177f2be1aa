/**
 * Forward Port Changelog Workflow - release-helper forwardport-changelog
 *
 * A release cut from a backport branch leaves its changelog entry on that
 * branch only. This carries the entry over to the default branch.
 */

import type { GitHubClient } from '../clients/types.ts';
import { extractCurrentEntry, findPreviousHeader, forwardPortEntry, PR_PREFIX } from '../domain/changelog.ts';
import { findReleaseForUrl, parseReleaseUrl } from '../domain/release-url.ts';
import type { PullRequest } from '../domain/types.ts';
import { ReleaseError } from '../lib/error.ts';
import { makeChangelogPR } from './changelog-pr.ts';
import type { WorkflowContext } from './context.ts';
import { prepGitWorkflow } from './prep-git.ts';

export interface ForwardportChangelogOptions {
  releaseUrl: string;
  remote: string;
  repo?: string | null;
  username?: string;
  auth?: string;
  changelogPath: string;
  dryRun: boolean;
}

export interface ForwardportChangelogResult {
  tag: string;
  /** False when the default branch already has the release */
  ported: boolean;
  pr: PullRequest | null;
}

async function readChangelog(ctx: WorkflowContext, path: string): Promise<string> {
  const text = await ctx.git.readFile(path);
  if (text === null) {
    throw new ReleaseError(`Changelog not found: ${path}`, 'MISSING_CHANGELOG', { path });
  }
  return text;
}

export async function forwardportChangelogWorkflow(
  ctx: WorkflowContext,
  github: GitHubClient,
  options: ForwardportChangelogOptions,
): Promise<ForwardportChangelogResult> {
  const { git } = ctx;

  parseReleaseUrl(options.releaseUrl);
  const release = findReleaseForUrl(await github.listReleases(), options.releaseUrl);
  const tag = release.tagName;

  await prepGitWorkflow(git, {
    remote: options.remote,
    repo: options.repo,
    username: options.username,
    auth: options.auth,
    isAction: Boolean(ctx.env.GITHUB_ACTIONS),
  });

  const branch = await git.getDefaultBranch(options.remote);
  await git.checkoutBranch(branch, `${options.remote}/${branch}`);

  if ((await git.listTags(branch)).includes(tag)) {
    return { tag, ported: false, pr: null };
  }

  // Entry and the header below it, as released
  await git.checkout(tag);
  const released = await readChangelog(ctx, options.changelogPath);
  const entry = extractCurrentEntry(released);
  const previousHeader = findPreviousHeader(released);
  if (previousHeader === null) {
    throw new ReleaseError(
      `Could not find previous header in the changelog of ${tag}`,
      'MISSING_PREVIOUS_HEADER',
      { tag },
    );
  }

  await git.checkoutBranch(branch, `${options.remote}/${branch}`);
  const current = await readChangelog(ctx, options.changelogPath);
  await git.writeFile(options.changelogPath, forwardPortEntry(current, entry, previousHeader));

  const title = `${PR_PREFIX} Forward Ported from ${tag}`;
  const pr = await makeChangelogPR(git, github, {
    branch,
    remote: options.remote,
    title,
    commitMessage: `Forward port changelog entry from ${tag}`,
    body: title,
    dryRun: options.dryRun,
  });

  return { tag, ported: true, pr };
}
