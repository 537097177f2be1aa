/**
 * Command definitions shared by the subcommand modules.
 */

import type { GitClient, GitHubClient } from '../clients/types.ts';
import type { Runner } from '../clients/shell.ts';
import { parseReleaseUrl } from '../domain/release-url.ts';
import { type Env, resolveRepo } from '../workflows/context.ts';
import type { Options, OptionSpec, PositionalSpec } from './options.ts';

/**
 * Everything a command touches outside the process.
 */
export interface CliContext {
  cwd: string;
  env: Env;
  git: GitClient;
  run: Runner;
  /** Client for `owner/repo` */
  github(repo: string, token?: string): GitHubClient;
}

export interface Command {
  name: string;
  summary: string;
  options: OptionSpec[];
  positional?: PositionalSpec;
  run(options: Options, ctx: CliContext): Promise<void>;
}

// --- Options shared between commands ---

export const BRANCH: OptionSpec = {
  name: 'branch',
  kind: 'string',
  description: 'The target branch',
  env: ['RH_BRANCH'],
};

export const REMOTE: OptionSpec = {
  name: 'remote',
  kind: 'string',
  description: 'The git remote name',
  env: ['RH_REMOTE'],
  default: 'upstream',
};

export const REPO: OptionSpec = {
  name: 'repo',
  kind: 'string',
  description: 'The git repo (owner/name)',
  env: ['RH_REPOSITORY', 'GITHUB_REPOSITORY'],
};

export const AUTH: OptionSpec = {
  name: 'auth',
  kind: 'string',
  description: 'The GitHub auth token',
  env: ['GITHUB_ACCESS_TOKEN'],
};

export const USERNAME: OptionSpec = {
  name: 'username',
  kind: 'string',
  description: 'The git username',
  env: ['GITHUB_ACTOR'],
};

export const VERSION_SPEC: OptionSpec = {
  name: 'version-spec',
  kind: 'string',
  description: 'The new version specifier',
  env: ['RH_VERSION_SPEC'],
};

export const VERSION_CMD: OptionSpec = {
  name: 'version-cmd',
  kind: 'string',
  description: 'The version command, detected when not given',
  env: ['RH_VERSION_COMMAND'],
};

export const CHANGELOG_PATH: OptionSpec = {
  name: 'changelog-path',
  kind: 'string',
  description: 'The path to the changelog file',
  env: ['RH_CHANGELOG'],
  default: 'CHANGELOG.md',
};

export const RESOLVE_BACKPORTS: OptionSpec = {
  name: 'resolve-backports',
  kind: 'boolean',
  description: 'Resolve backport PRs to their originals',
  env: ['RH_RESOLVE_BACKPORTS'],
};

export const DIST_DIR: OptionSpec = {
  name: 'dist-dir',
  kind: 'string',
  description: 'The folder holding the dist files',
  env: ['RH_DIST_DIR'],
  default: 'dist',
};

export const DRY_RUN: OptionSpec = {
  name: 'dry-run',
  kind: 'boolean',
  description: 'Run as a dry run',
  env: ['RH_DRY_RUN'],
};

export const GIT_OPTIONS = [BRANCH, REMOTE, REPO, AUTH, USERNAME];

export const RELEASE_URL: PositionalSpec = {
  name: 'release-url',
  description: 'The GitHub release url',
  env: ['RH_RELEASE_URL'],
};

/**
 * GitHub client for the repo given by --repo or the remote url.
 */
export async function githubFor(options: Options, ctx: CliContext): Promise<{ repo: string; github: GitHubClient }> {
  const repo = await resolveRepo(ctx.git, options.required('remote'), options.string('repo'));
  return { repo, github: ctx.github(repo, options.string('auth')) };
}

/**
 * GitHub client for the repo a release url points at.
 */
export function githubForRelease(url: string, options: Options, ctx: CliContext): GitHubClient {
  const { owner, repo } = parseReleaseUrl(url);
  return ctx.github(`${owner}/${repo}`, options.string('auth'));
}
