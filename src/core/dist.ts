/**
 * Dist dir helpers: listing release files and their digests.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { pathExists } from 'fs-extra/esm';
import type { DistDigest } from '../domain/release-commit.ts';

/**
 * SHA256 hex digest of a file.
 */
export function computeSha256(path: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256');
    createReadStream(path)
      .on('data', (chunk) => hash.update(chunk))
      .on('error', reject)
      .on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * File names in the dist dir, sorted. Empty when the dir does not exist.
 */
export async function listDistFiles(dir: string): Promise<string[]> {
  if (!(await pathExists(dir))) return [];
  const entries = await readdir(dir, { withFileTypes: true });
  return entries.filter((e) => e.isFile()).map((e) => e.name).sort();
}

/**
 * Digests of every dist file, keyed by `<distDir>/<name>` as given.
 */
export async function digestDist(cwd: string, distDir: string): Promise<DistDigest[]> {
  const dir = join(cwd, distDir);
  const prefix = distDir.replace(/\\/g, '/').replace(/\/+$/, '');
  const digests: DistDigest[] = [];

  for (const name of await listDistFiles(dir)) {
    digests.push({ path: `${prefix}/${name}`, sha256: await computeSha256(join(dir, name)) });
  }
  return digests;
}
