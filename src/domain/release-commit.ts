/**
 * The release commit records a SHA256 digest for every dist file, so a
 * later step can verify that the assets attached to a GitHub release are
 * the files that were tagged.
 *
 * Message layout, one paragraph each:
 *
 *   Publish 1.2.3
 *   SHA256 hashes:
 *   dist/widgets-1.2.3.tgz: <hex>
 */

import { ReleaseError } from '../lib/error.ts';

export interface DistDigest {
  /** Path relative to the project root, forward slashes */
  path: string;
  sha256: string;
}

/**
 * Paragraphs of the release commit, each passed as its own `-m`.
 */
export function releaseCommitMessages(version: string, digests: DistDigest[]): string[] {
  if (digests.length === 0) {
    throw new ReleaseError('Missing distribution files', 'NO_ASSETS');
  }

  const files = [...digests]
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
    .map((d) => `${d.path}: ${d.sha256}`);

  return [`Publish ${version}`, 'SHA256 hashes:', ...files];
}

/**
 * Check an asset digest against the release commit message.
 * The asset is valid when a line naming it carries the same digest.
 */
export function verifyAssetDigest(message: string, name: string, sha256: string): void {
  const lines = message.split('\n').filter((line) => line.includes(name));
  const valid = lines.some((line) => line.includes(sha256));

  if (!valid) {
    throw new ReleaseError(
      lines.length > 0 ? `Mismatched sha for ${name}` : `Invalid file ${name}`,
      'INVALID_ASSET',
      { name, sha256 },
    );
  }
}
