/**
 * Repository and branch names from git remotes and CI environment.
 */

import { ReleaseError } from '../lib/error.ts';

/**
 * `owner/repo` from a remote url. Handles https (with or without
 * credentials), ssh and scp-like urls, with or without `.git`.
 */
export function repoFromRemoteUrl(url: string): string {
  const parts = url.trim().replace(/\\/g, '/').replace(/\/+$/, '').split('/');
  if (parts.length < 2) {
    throw new ReleaseError(`Cannot parse repository from ${url}`, 'GIT_ERROR', { url });
  }

  let owner = parts[parts.length - 2];
  const name = parts[parts.length - 1].replace(/\.git$/, '');

  // git@github.com:owner/repo
  if (owner.includes(':')) {
    owner = owner.slice(owner.lastIndexOf(':') + 1);
  }

  if (!owner || !name) {
    throw new ReleaseError(`Cannot parse repository from ${url}`, 'GIT_ERROR', { url });
  }
  return `${owner}/${name}`;
}

/**
 * Push url for a GitHub repository, with credentials when a token is given.
 */
export function remoteUrl(repo: string, username?: string, token?: string): string {
  if (token) {
    return `https://${username ?? 'x-access-token'}:${token}@github.com/${repo}.git`;
  }
  return `https://github.com/${repo}.git`;
}

/**
 * Branch the CI run targets: the PR base branch, else the pushed branch.
 */
export function branchFromEnv(env: Record<string, string | undefined>): string | null {
  if (env.GITHUB_BASE_REF) {
    return env.GITHUB_BASE_REF;
  }

  const ref = env.GITHUB_REF;
  if (ref) {
    return ref.startsWith('refs/heads/') ? ref.slice('refs/heads/'.length) : ref.split('/').pop() ?? ref;
  }
  return null;
}
