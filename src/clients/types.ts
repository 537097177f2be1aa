/**
 * Client interfaces for infrastructure operations.
 *
 * All I/O against git and GitHub is isolated in these clients, so that
 * workflows can be tested against in-memory fakes.
 */

import type {
  CreatePROptions,
  CreateReleaseOptions,
  PullRequest,
  Release,
  ReleaseAsset,
  Repository,
  TagRef,
  UpdateReleaseOptions,
} from '../domain/types.ts';

export interface PushOptions {
  followTags?: boolean;
  tags?: boolean;
}

/**
 * Git operations interface (local git CLI).
 */
export interface GitClient {
  /** Working tree root */
  readonly cwd: string;

  // Files in the working tree
  readFile(path: string): Promise<string | null>;
  writeFile(path: string, content: string): Promise<void>;

  // Configuration and remotes
  setGlobalConfig(key: string, value: string): Promise<void>;
  listRemotes(): Promise<string[]>;
  getRemoteUrl(remote: string): Promise<string>;
  addRemote(name: string, url: string): Promise<void>;
  getDefaultBranch(remote: string): Promise<string>;

  // Branches
  getCurrentBranch(): Promise<string>;
  listBranches(): Promise<string[]>;
  fetch(remote: string, ref?: string): Promise<void>;
  checkout(ref: string): Promise<void>;
  checkoutBranch(branch: string, startPoint: string): Promise<void>;

  // History
  getHeadRevision(): Promise<string>;
  getFirstRevision(): Promise<string>;
  getCommitDate(rev: string): Promise<string>;
  getCommitMessage(rev: string): Promise<string>;

  // Tags
  listTags(merged?: string): Promise<string[]>;
  latestTag(ref: string): Promise<string | null>;
  tagExists(tag: string): Promise<boolean>;
  createTag(name: string, message?: string): Promise<void>;

  // Changes
  diff(): Promise<string>;
  discardChanges(): Promise<void>;
  stash(): Promise<void>;
  stashApply(): Promise<void>;
  commitAll(messages: string[]): Promise<void>;
  push(remote: string, refspec: string, options?: PushOptions): Promise<void>;

  /** Clone a repository and return a client for the checkout */
  clone(url: string, dir: string): Promise<GitClient>;
}

export interface SearchPullsOptions {
  /** Base branch the PRs were merged into */
  branch: string;
  /** ISO date, only PRs merged at or after it */
  since: string;
}

/**
 * GitHub API operations interface.
 */
export interface GitHubClient {
  getRepository(): Promise<Repository>;

  // PR operations
  getPR(number: number): Promise<PullRequest>;
  createPR(options: CreatePROptions): Promise<PullRequest>;
  searchMergedPRs(options: SearchPullsOptions): Promise<PullRequest[]>;

  // Releases
  listReleases(): Promise<Release[]>;
  createRelease(options: CreateReleaseOptions): Promise<Release>;
  updateRelease(id: number, options: UpdateReleaseOptions): Promise<Release>;
  deleteRelease(id: number): Promise<void>;

  // Release assets
  uploadReleaseAsset(release: Release, path: string): Promise<ReleaseAsset>;
  downloadReleaseAsset(asset: ReleaseAsset, dest: string): Promise<void>;
  deleteReleaseAsset(id: number): Promise<void>;

  // Tags
  listTags(): Promise<TagRef[]>;
}
