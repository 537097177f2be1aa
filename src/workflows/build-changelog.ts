/**
 * Build/Check Changelog Workflows - release-helper build-changelog, check-changelog
 */

import { outputFile } from 'fs-extra/esm';
import { resolve } from 'node:path';
import type { GitClient, GitHubClient } from '../clients/types.ts';
import { checkEntry, insertEntry, renderEntry } from '../domain/changelog.ts';
import type { Activity, PullRequest } from '../domain/types.ts';
import { ReleaseError } from '../lib/error.ts';

const BACKPORT_TITLE = /Backport PR #(\d+)/;

export interface EntryOptions {
  version: string;
  /** owner/repo */
  repo: string;
  branch: string;
  resolveBackports?: boolean;
}

/**
 * Merged PR activity since the newest tag reachable from HEAD, or since
 * the first commit when nothing is tagged yet.
 */
export async function generateActivity(
  git: GitClient,
  github: GitHubClient,
  options: EntryOptions,
): Promise<Activity> {
  const until = await git.getHeadRevision();
  const since = (await git.latestTag('HEAD')) ?? (await git.getFirstRevision());
  const sinceDate = await git.getCommitDate(since);
  const untilDate = await git.getCommitDate(until);

  let pulls = await github.searchMergedPRs({ branch: options.branch, since: sinceDate });
  if (options.resolveBackports) {
    pulls = await resolveBackports(github, pulls);
  }

  return {
    version: options.version,
    repo: options.repo,
    since,
    until,
    sinceDate,
    untilDate,
    pulls,
  };
}

/**
 * Replace backport PRs by the PRs they port.
 */
export async function resolveBackports(
  github: GitHubClient,
  pulls: PullRequest[],
): Promise<PullRequest[]> {
  const resolved: PullRequest[] = [];
  for (const pull of pulls) {
    const match = BACKPORT_TITLE.exec(pull.title);
    resolved.push(match ? await github.getPR(Number(match[1])) : pull);
  }
  return resolved;
}

export async function generateEntry(
  git: GitClient,
  github: GitHubClient,
  options: EntryOptions,
): Promise<string> {
  return renderEntry(await generateActivity(git, github, options));
}

async function readChangelog(git: GitClient, path: string): Promise<string> {
  const text = await git.readFile(path);
  if (text === null) {
    throw new ReleaseError(
      `Changelog not found: ${path}`,
      'MISSING_CHANGELOG',
      { path },
    );
  }
  return text;
}

export interface BuildChangelogOptions extends EntryOptions {
  changelogPath: string;
}

export interface BuildChangelogResult {
  entry: string;
  changed: boolean;
}

/**
 * Generate the entry for the current version and splice it between the
 * changelog markers. The file is only written when it changed.
 */
export async function buildChangelogWorkflow(
  git: GitClient,
  github: GitHubClient,
  options: BuildChangelogOptions,
): Promise<BuildChangelogResult> {
  const text = await readChangelog(git, options.changelogPath);
  const entry = await generateEntry(git, github, options);
  const updated = insertEntry(text, entry, options.version);

  const changed = updated !== text;
  if (changed) {
    await git.writeFile(options.changelogPath, updated);
  }
  return { entry, changed };
}

export interface CheckChangelogOptions extends EntryOptions {
  changelogPath: string;
  /** Write the final entry here */
  output?: string | null;
}

/**
 * Validate the changelog entry against the PRs merged since the last
 * release. Returns the entry as written.
 */
export async function checkChangelogWorkflow(
  git: GitClient,
  github: GitHubClient,
  options: CheckChangelogOptions,
): Promise<string> {
  const text = await readChangelog(git, options.changelogPath);
  const generated = await generateEntry(git, github, options);
  const entry = checkEntry(text, options.version, generated);

  if (options.output) {
    await outputFile(resolve(git.cwd, options.output), entry);
  }
  return entry;
}
