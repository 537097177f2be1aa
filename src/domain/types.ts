/**
 * Core domain types for release-helper.
 */

/** Opaque revision identifier. Never parse or assume format. */
export type RevisionId = string;

/** GitHub user reference */
export interface User {
  login: string;
  url: string;
}

/** Pull request representation */
export interface PullRequest {
  number: number;
  title: string;
  body: string;
  url: string;
  author: User | null;
  labels: string[];
  mergedAt: string | null;
}

/** Hosted repository metadata */
export interface Repository {
  fullName: string;
  htmlUrl: string;
  cloneUrl: string;
  defaultBranch: string;
}

/** Asset attached to a GitHub release */
export interface ReleaseAsset {
  id: number;
  name: string;
  /** API url, downloads with Accept: application/octet-stream */
  url: string;
}

/** GitHub release */
export interface Release {
  id: number;
  tagName: string;
  targetCommitish: string;
  name: string;
  body: string;
  draft: boolean;
  prerelease: boolean;
  /** API url */
  url: string;
  htmlUrl: string;
  uploadUrl: string;
  createdAt: string;
  assets: ReleaseAsset[];
}

/** A tag ref as listed by the host */
export interface TagRef {
  /** e.g. refs/tags/v1.0.0 */
  ref: string;
  /** Commit or annotated tag object */
  sha: RevisionId;
}

/** Options for creating a pull request */
export interface CreatePROptions {
  title: string;
  body: string;
  head: string;
  base: string;
  maintainerCanModify?: boolean;
}

/** Options for creating a release */
export interface CreateReleaseOptions {
  tag: string;
  target: string;
  name: string;
  body: string;
  draft: boolean;
  prerelease: boolean;
}

/** Options for updating a release */
export interface UpdateReleaseOptions {
  tag?: string;
  target?: string;
  name?: string;
  body?: string;
  draft?: boolean;
  prerelease?: boolean;
}

/** Merged PR activity between two revisions, input to changelog rendering */
export interface Activity {
  version: string;
  /** owner/name */
  repo: string;
  since: string;
  until: string;
  /** ISO 8601 */
  sinceDate: string;
  /** ISO 8601 */
  untilDate: string;
  pulls: PullRequest[];
}
