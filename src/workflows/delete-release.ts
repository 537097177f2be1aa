/**
 * Delete Release Workflow - release-helper delete-release
 */

import type { GitHubClient } from '../clients/types.ts';
import { findReleaseForUrl, parseReleaseUrl } from '../domain/release-url.ts';
import type { Release } from '../domain/types.ts';

/**
 * Delete a release's assets, then the release.
 */
export async function deleteReleaseWorkflow(
  github: GitHubClient,
  releaseUrl: string,
): Promise<Release> {
  parseReleaseUrl(releaseUrl);
  const release = findReleaseForUrl(await github.listReleases(), releaseUrl);

  for (const asset of release.assets) {
    await github.deleteReleaseAsset(asset.id);
  }
  await github.deleteRelease(release.id);

  return release;
}
