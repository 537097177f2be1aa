/**
 * Tag Release Workflow - release-helper tag-release
 *
 * Records the dist digests in a release commit and tags it.
 */

import type { GitClient } from '../clients/types.ts';
import { digestDist } from '../core/dist.ts';
import { tagWorkspacePackages } from '../core/npm.ts';
import { releaseCommitMessages } from '../domain/release-commit.ts';
import { tagName } from '../lib/version.ts';

export interface TagReleaseOptions {
  version: string;
  distDir: string;
  /** Skip `<name>@<version>` tags for npm workspace packages */
  noGitTagWorkspace: boolean;
}

export interface TagReleaseResult {
  tag: string;
  /** Tags created for workspace packages */
  workspaceTags: string[];
}

export async function tagReleaseWorkflow(
  git: GitClient,
  options: TagReleaseOptions,
): Promise<TagReleaseResult> {
  const digests = await digestDist(git.cwd, options.distDir);
  await git.commitAll(releaseCommitMessages(options.version, digests));

  const tag = tagName(options.version);
  await git.createTag(tag, `Release ${tag}`);

  const workspaceTags = options.noGitTagWorkspace ? [] : await tagWorkspacePackages(git);

  return { tag, workspaceTags };
}
