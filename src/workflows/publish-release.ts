/**
 * Publish Release Workflow - release-helper publish-release
 *
 * Uploads the dist files to PyPI and npm, then takes the GitHub release
 * out of draft.
 */

import { extname, join } from 'node:path';
import type { GitHubClient } from '../clients/types.ts';
import { listDistFiles } from '../core/dist.ts';
import { handleAuthToken } from '../core/npm.ts';
import { isPythonDist } from '../core/python.ts';
import { findReleaseForUrl, parseReleaseUrl } from '../domain/release-url.ts';
import type { Release } from '../domain/types.ts';
import * as output from '../cli/output.ts';
import { ReleaseError } from '../lib/error.ts';
import type { WorkflowContext } from './context.ts';

export const TEST_PYPI_URL = 'https://test.pypi.org/legacy/';

export interface PublishCommands {
  twine: string;
  npm: string;
}

/**
 * Upload commands, with dry runs going to TestPyPI and `npm publish --dry-run`.
 */
export function defaultPublishCommands(dryRun: boolean): PublishCommands {
  return dryRun
    ? { twine: 'twine upload --skip-existing', npm: 'npm publish --dry-run' }
    : { twine: 'twine upload', npm: 'npm publish' };
}

export interface PublishReleaseOptions {
  releaseUrl: string;
  distDir: string;
  npmToken?: string;
  twineCommand?: string;
  npmCommand?: string;
  dryRun: boolean;
}

export interface PublishReleaseResult {
  release: Release;
  /** Uploaded dist file names */
  published: string[];
}

export async function publishReleaseWorkflow(
  ctx: WorkflowContext,
  github: GitHubClient,
  options: PublishReleaseOptions,
): Promise<PublishReleaseResult> {
  const { git, run, env } = ctx;
  parseReleaseUrl(options.releaseUrl);

  if (options.npmToken) {
    await handleAuthToken(git.cwd, options.npmToken);
  }

  const defaults = defaultPublishCommands(options.dryRun);
  const twine = options.twineCommand || defaults.twine;
  const npm = options.npmCommand || defaults.npm;

  const twineEnv: Record<string, string> = { TWINE_USERNAME: env.TWINE_USERNAME || '__token__' };
  if (options.dryRun) {
    twineEnv.TWINE_REPOSITORY_URL = env.TWINE_REPOSITORY_URL || TEST_PYPI_URL;
  }

  const distDir = join(git.cwd, options.distDir);
  const published: string[] = [];

  for (const name of await listDistFiles(distDir)) {
    if (isPythonDist(name)) {
      await run(`${twine} ${name}`, { cwd: distDir, env: twineEnv });
    } else if (extname(name) === '.tgz') {
      await run(`${npm} ${name}`, { cwd: distDir });
    } else {
      output.skip(`Skipping upload of ${name}`);
      continue;
    }
    published.push(name);
  }

  if (published.length === 0) {
    throw new ReleaseError(
      'No assets published, refusing to finalize release',
      'NO_ASSETS',
      { distDir: options.distDir },
    );
  }

  const current = findReleaseForUrl(await github.listReleases(), options.releaseUrl);
  const release = await github.updateRelease(current.id, {
    tag: current.tagName,
    target: current.targetCommitish,
    name: current.name,
    body: current.body,
    draft: options.dryRun,
    prerelease: current.prerelease,
  });

  return { release, published };
}
