/**
 * Draft Release Workflow - release-helper draft-release
 *
 * Pushes the release commit and tags, then creates a draft GitHub release
 * with the changelog entry as notes and the dist files as assets.
 */

import { join } from 'node:path';
import type { GitHubClient } from '../clients/types.ts';
import { listDistFiles } from '../core/dist.ts';
import { extractCurrentEntry } from '../domain/changelog.ts';
import type { Release } from '../domain/types.ts';
import * as output from '../cli/output.ts';
import { ReleaseError } from '../lib/error.ts';
import { isPrerelease, tagName } from '../lib/version.ts';
import { bumpVersionWorkflow } from './bump-version.ts';
import type { WorkflowContext } from './context.ts';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DraftReleaseOptions {
  version: string;
  branch: string;
  remote: string;
  changelogPath: string;
  distDir: string;
  /** Bump to this after the release commit, e.g. `minor` for a dev version */
  postVersionSpec?: string | null;
  versionCommand?: string;
  dryRun: boolean;
  /** Injected clock */
  now?: Date;
}

export interface DraftReleaseResult {
  release: Release;
  /** Ids of the stale drafts that were deleted */
  deletedDrafts: number[];
}

/**
 * Delete draft releases created more than a day before `now`.
 */
export async function deleteStaleDrafts(github: GitHubClient, now: Date): Promise<number[]> {
  const deleted: number[] = [];
  for (const release of await github.listReleases()) {
    if (!release.draft) continue;
    if (now.getTime() - Date.parse(release.createdAt) <= DAY_MS) continue;

    output.skip(`Deleting stale draft release ${release.tagName}`);
    await github.deleteRelease(release.id);
    deleted.push(release.id);
  }
  return deleted;
}

export async function draftReleaseWorkflow(
  ctx: WorkflowContext,
  github: GitHubClient,
  options: DraftReleaseOptions,
): Promise<DraftReleaseResult> {
  const { git } = ctx;

  const deletedDrafts = await deleteStaleDrafts(github, options.now ?? new Date());

  const changelog = await git.readFile(options.changelogPath);
  if (changelog === null) {
    throw new ReleaseError(
      `Changelog not found: ${options.changelogPath}`,
      'MISSING_CHANGELOG',
      { path: options.changelogPath },
    );
  }
  const body = extractCurrentEntry(changelog);

  if (options.postVersionSpec) {
    const { version } = await bumpVersionWorkflow(ctx, {
      spec: options.postVersionSpec,
      command: options.versionCommand,
    });
    await git.commitAll([`Bump to ${version}`]);
  }

  if (!options.dryRun) {
    await git.push(options.remote, `HEAD:${options.branch}`, { followTags: true, tags: true });
  }

  const tag = tagName(options.version);
  const release = await github.createRelease({
    tag,
    target: options.branch,
    name: `Release ${tag}`,
    body,
    draft: true,
    prerelease: isPrerelease(options.version),
  });

  const distDir = join(git.cwd, options.distDir);
  for (const name of await listDistFiles(distDir)) {
    await github.uploadReleaseAsset(release, join(distDir, name));
  }

  return { release, deletedDrafts };
}
