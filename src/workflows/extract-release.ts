/**
 * Extract Release Workflow - release-helper extract-release
 *
 * Downloads the assets of a draft release, checks that they install, and
 * verifies them against the digests recorded in the tagged release commit.
 */

import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { extname, join } from 'node:path';
import { ensureDir, remove } from 'fs-extra/esm';
import type { GitHubClient } from '../clients/types.ts';
import { computeSha256 } from '../core/dist.ts';
import * as npm from '../core/npm.ts';
import * as python from '../core/python.ts';
import { verifyAssetDigest } from '../domain/release-commit.ts';
import { findReleaseForUrl, parseReleaseUrl } from '../domain/release-url.ts';
import { remoteUrl } from '../domain/repository.ts';
import type { Release } from '../domain/types.ts';
import * as output from '../cli/output.ts';
import { ReleaseError } from '../lib/error.ts';
import type { WorkflowContext } from './context.ts';

export interface ExtractReleaseOptions {
  releaseUrl: string;
  distDir: string;
  username?: string;
  auth?: string;
  pyTestCommand?: string;
  npmTestCommand?: string;
  dryRun: boolean;
}

export interface ExtractReleaseResult {
  release: Release;
  /** Downloaded asset file names */
  assets: string[];
  /** Digests were checked against the release commit */
  verified: boolean;
}

/**
 * Message of the commit a release tag points at, read from a fresh
 * clone of the repository.
 */
async function releaseCommitMessage(
  ctx: WorkflowContext,
  github: GitHubClient,
  release: Release,
  options: ExtractReleaseOptions,
): Promise<string> {
  const ref = `refs/tags/${release.tagName}`;
  const tag = (await github.listTags()).find((t) => t.ref === ref);
  if (!tag) {
    throw new ReleaseError(
      `Could not find tag ${release.tagName}`,
      'MISSING_TAG',
      { tag: release.tagName },
    );
  }

  const repository = await github.getRepository();
  const url = options.auth
    ? remoteUrl(repository.fullName, options.username, options.auth)
    : repository.cloneUrl;

  const dir = await mkdtemp(join(tmpdir(), 'release-helper-checkout-'));
  try {
    const checkout = await ctx.git.clone(url, dir);
    await checkout.fetch('origin', release.targetCommitish);
    return await checkout.getCommitMessage(tag.sha);
  } finally {
    await remove(dir);
  }
}

export async function extractReleaseWorkflow(
  ctx: WorkflowContext,
  github: GitHubClient,
  options: ExtractReleaseOptions,
): Promise<ExtractReleaseResult> {
  parseReleaseUrl(options.releaseUrl);
  const release = findReleaseForUrl(await github.listReleases(), options.releaseUrl);

  const distDir = join(ctx.git.cwd, options.distDir);
  await remove(distDir);
  await ensureDir(distDir);

  const assets: string[] = [];
  for (const asset of release.assets) {
    await github.downloadReleaseAsset(asset, join(distDir, asset.name));
    assets.push(asset.name);
  }

  let npmChecked = false;
  for (const name of assets) {
    if (python.isPythonDist(name)) {
      await python.checkDist(ctx.run, join(distDir, name), { testCommand: options.pyTestCommand });
    } else if (extname(name) === '.tgz') {
      // One scratch project installs every tarball of the dist dir
      if (!npmChecked) {
        await npm.checkDist(ctx.run, {
          distDir,
          testCommand: options.npmTestCommand,
          cwd: ctx.git.cwd,
        });
        npmChecked = true;
      }
    } else {
      output.skip(`Skipping check of ${name}`);
    }
  }

  if (options.dryRun) {
    return { release, assets, verified: false };
  }

  const message = await releaseCommitMessage(ctx, github, release, options);
  for (const name of assets) {
    verifyAssetDigest(message, name, await computeSha256(join(distDir, name)));
  }

  return { release, assets, verified: true };
}
