/**
 * release-helper prep-git, bump-version, prep-env
 */

import { resolve } from 'node:path';
import { bumpVersionWorkflow } from '../workflows/bump-version.ts';
import { resolveBranch } from '../workflows/context.ts';
import { prepEnvWorkflow } from '../workflows/prep-env.ts';
import { prepGitWorkflow } from '../workflows/prep-git.ts';
import {
  AUTH,
  BRANCH,
  type Command,
  DIST_DIR,
  GIT_OPTIONS,
  REMOTE,
  REPO,
  USERNAME,
  VERSION_CMD,
  VERSION_SPEC,
} from './command.ts';
import * as output from './output.ts';

const prepGit: Command = {
  name: 'prep-git',
  summary: 'Prepare git for a release',
  options: GIT_OPTIONS,
  async run(options, ctx) {
    output.header('📦 release-helper prep-git');

    const branch = await resolveBranch(ctx.git, ctx.env, options.string('branch'));
    const result = await prepGitWorkflow(ctx.git, {
      branch,
      remote: options.required('remote'),
      repo: options.string('repo'),
      username: options.string('username'),
      auth: options.string('auth'),
      isAction: Boolean(ctx.env.GITHUB_ACTIONS),
    });

    if (result.remoteAdded) {
      output.info('Added remote', options.required('remote'));
    }
    output.success(`Checked out ${branch}`);
  },
};

const bumpVersion: Command = {
  name: 'bump-version',
  summary: 'Bump the version of the package',
  options: [VERSION_SPEC, VERSION_CMD],
  async run(options, ctx) {
    output.header('📦 release-helper bump-version');

    const result = await bumpVersionWorkflow(ctx, {
      spec: options.required('version-spec'),
      command: options.string('version-cmd'),
    });

    output.info('Command', result.command);
    output.success(`Bumped to ${result.version}`);
  },
};

const prepEnv: Command = {
  name: 'prep-env',
  summary: 'Prepare the environment for a release',
  options: [
    VERSION_SPEC,
    VERSION_CMD,
    BRANCH,
    REMOTE,
    REPO,
    AUTH,
    USERNAME,
    DIST_DIR,
    {
      name: 'output',
      kind: 'string',
      description: 'File to append the release variables to',
      env: ['GITHUB_ENV'],
    },
  ],
  async run(options, ctx) {
    const result = await prepEnvWorkflow(ctx, {
      versionSpec: options.required('version-spec'),
      versionCommand: options.string('version-cmd'),
      branch: options.string('branch'),
      remote: options.required('remote'),
      repo: options.string('repo'),
      username: options.string('username'),
      auth: options.string('auth'),
      distDir: options.required('dist-dir'),
    });

    const isPrerelease = String(result.isPrerelease);
    output.variables({
      branch: result.branch,
      repository: result.repo,
      version: result.version,
      is_prerelease: isPrerelease,
    });

    const file = options.string('output');
    if (file) {
      await output.writeEnvFile(resolve(ctx.cwd, file), {
        RH_BRANCH: result.branch,
        RH_VERSION: result.version,
        RH_REPOSITORY: result.repo,
        RH_IS_PRERELEASE: isPrerelease,
      });
    }
  },
};

export const gitCommands: Command[] = [prepGit, bumpVersion, prepEnv];
