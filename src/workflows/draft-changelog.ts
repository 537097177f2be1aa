/**
 * Draft Changelog Workflow - release-helper draft-changelog
 *
 * Opens the PR that carries the changelog entry for the next release.
 */

import type { GitClient, GitHubClient } from '../clients/types.ts';
import { getPackageVersions } from '../core/npm.ts';
import { PR_PREFIX } from '../domain/changelog.ts';
import type { PullRequest } from '../domain/types.ts';
import { ReleaseError } from '../lib/error.ts';
import { tagName } from '../lib/version.ts';
import { makeChangelogPR } from './changelog-pr.ts';

export interface DraftChangelogOptions {
  version: string;
  versionSpec: string;
  branch: string;
  remote: string;
  changelogPath: string;
  dryRun: boolean;
}

export interface DraftChangelogResult {
  title: string;
  body: string;
  pr: PullRequest | null;
}

export async function draftChangelogWorkflow(
  git: GitClient,
  github: GitHubClient,
  options: DraftChangelogOptions,
): Promise<DraftChangelogResult> {
  const { version, branch } = options;

  const tag = tagName(version);
  if (await git.tagExists(tag)) {
    throw new ReleaseError(
      `Tag ${tag} already exists`,
      'TAG_EXISTS',
      { tag, hint: `To delete run: git push --delete ${options.remote} ${tag}` },
    );
  }

  // Only the changelog goes into the PR; version bumps and builds do not
  const changelog = await git.readFile(options.changelogPath);
  if (changelog === null) {
    throw new ReleaseError(
      `Changelog not found: ${options.changelogPath}`,
      'MISSING_CHANGELOG',
      { path: options.changelogPath },
    );
  }
  await git.discardChanges();
  await git.writeFile(options.changelogPath, changelog);

  const title = `${PR_PREFIX} for ${version} on ${branch}`;
  let body = title;
  body += await getPackageVersions(git.cwd, version);
  body += '\n\nAfter merging this PR run the "Draft Release" Workflow';
  body += `\non Branch: ${branch}`;
  body += `\nwith Version Spec: ${options.versionSpec}`;

  const pr = await makeChangelogPR(git, github, {
    branch,
    remote: options.remote,
    title,
    commitMessage: `Generate changelog for ${version}`,
    body,
    dryRun: options.dryRun,
  });

  return { title, body, pr };
}
