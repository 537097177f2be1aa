/**
 * GitHub release urls.
 *
 * A release is addressed either by its page url
 * (`https://github.com/<owner>/<repo>/releases/tag/<tag>`) or by its
 * API url (`https://api.github.com/repos/<owner>/<repo>/releases/tags/<tag>`).
 */

import type { Release } from './types.ts';
import { ReleaseError } from '../lib/error.ts';

export interface ReleaseLocation {
  owner: string;
  repo: string;
  tag: string;
}

const HTML_PATTERN = /^https:\/\/github\.com\/([^/]+)\/([^/]+)\/releases\/tag\/(.+)$/;
const API_PATTERN = /^https:\/\/api\.github\.com\/repos\/([^/]+)\/([^/]+)\/releases\/tags\/(.+)$/;

export function parseReleaseUrl(url: string): ReleaseLocation {
  const match = HTML_PATTERN.exec(url) ?? API_PATTERN.exec(url);
  if (!match) {
    throw new ReleaseError(
      `Release url is not valid: ${url}`,
      'INVALID_RELEASE_URL',
      { url },
    );
  }

  const [, owner, repo, tag] = match;
  return { owner, repo, tag: decodeURIComponent(tag) };
}

/**
 * Find the release a url points at. Matches either the page or the API url.
 */
export function findReleaseForUrl(releases: Release[], url: string): Release {
  const release = releases.find((r) => r.htmlUrl === url || r.url === url);
  if (!release) {
    throw new ReleaseError(
      `No release found for url ${url}`,
      'RELEASE_NOT_FOUND',
      { url },
    );
  }
  return release;
}
