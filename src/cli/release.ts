/**
 * release-helper tag-release, draft-release, extract-release,
 * publish-release, delete-release
 */

import { getVersion } from '../manifest/mod.ts';
import { resolveBranch } from '../workflows/context.ts';
import { deleteReleaseWorkflow } from '../workflows/delete-release.ts';
import { draftReleaseWorkflow } from '../workflows/draft-release.ts';
import { extractReleaseWorkflow } from '../workflows/extract-release.ts';
import { publishReleaseWorkflow } from '../workflows/publish-release.ts';
import { tagReleaseWorkflow } from '../workflows/tag-release.ts';
import {
  AUTH,
  BRANCH,
  CHANGELOG_PATH,
  type Command,
  DIST_DIR,
  DRY_RUN,
  githubFor,
  githubForRelease,
  RELEASE_URL,
  REMOTE,
  REPO,
  USERNAME,
  VERSION_CMD,
} from './command.ts';
import * as output from './output.ts';

const tagRelease: Command = {
  name: 'tag-release',
  summary: 'Create release commit and tag',
  options: [
    DIST_DIR,
    {
      name: 'no-git-tag-workspace',
      kind: 'boolean',
      description: 'Do not tag the npm workspace packages',
      env: ['RH_NO_GIT_TAG_WORKSPACE'],
    },
  ],
  async run(options, ctx) {
    output.header('📦 release-helper tag-release');

    const result = await tagReleaseWorkflow(ctx.git, {
      version: await getVersion(ctx.run, ctx.cwd),
      distDir: options.required('dist-dir'),
      noGitTagWorkspace: options.boolean('no-git-tag-workspace'),
    });

    for (const tag of result.workspaceTags) {
      output.info('Tagged', tag);
    }
    output.release(result.tag);
  },
};

const draftRelease: Command = {
  name: 'draft-release',
  summary: 'Publish Draft GitHub release',
  options: [
    BRANCH,
    REMOTE,
    REPO,
    AUTH,
    VERSION_CMD,
    {
      name: 'post-version-spec',
      kind: 'string',
      description: 'The version to bump to after the release commit',
      env: ['RH_POST_VERSION_SPEC'],
    },
    CHANGELOG_PATH,
    DIST_DIR,
    DRY_RUN,
  ],
  async run(options, ctx) {
    output.header('📦 release-helper draft-release');

    const { github } = await githubFor(options, ctx);
    const dryRun = options.boolean('dry-run');

    const { release, deletedDrafts } = await draftReleaseWorkflow(ctx, github, {
      version: await getVersion(ctx.run, ctx.cwd),
      branch: await resolveBranch(ctx.git, ctx.env, options.string('branch')),
      remote: options.required('remote'),
      changelogPath: options.required('changelog-path'),
      distDir: options.required('dist-dir'),
      postVersionSpec: options.string('post-version-spec'),
      versionCommand: options.string('version-cmd'),
      dryRun,
    });

    if (deletedDrafts.length > 0) {
      output.info('Deleted stale drafts', String(deletedDrafts.length));
    }
    output.release(release.tagName, release.htmlUrl);
    await output.actionsOutput('release_url', release.htmlUrl, ctx.env);
    if (dryRun) {
      output.dryRun();
    }
  },
};

const extractRelease: Command = {
  name: 'extract-release',
  summary: 'Download and verify assets from a draft GitHub release',
  positional: RELEASE_URL,
  options: [
    AUTH,
    USERNAME,
    DIST_DIR,
    DRY_RUN,
    {
      name: 'py-test-cmd',
      kind: 'string',
      description: 'The command to run in the Python test venv',
      env: ['RH_PY_TEST_COMMAND'],
    },
    {
      name: 'npm-test-cmd',
      kind: 'string',
      description: 'The command to run in the npm scratch project',
      env: ['RH_NPM_TEST_COMMAND'],
    },
  ],
  async run(options, ctx) {
    output.header('📦 release-helper extract-release');

    const releaseUrl = options.requiredPositional(RELEASE_URL);
    const result = await extractReleaseWorkflow(ctx, githubForRelease(releaseUrl, options, ctx), {
      releaseUrl,
      distDir: options.required('dist-dir'),
      username: options.string('username'),
      auth: options.string('auth'),
      pyTestCommand: options.string('py-test-cmd'),
      npmTestCommand: options.string('npm-test-cmd'),
      dryRun: options.boolean('dry-run'),
    });

    for (const name of result.assets) {
      output.info('Asset', name);
    }
    if (result.verified) {
      output.success(`Verified the assets of ${result.release.tagName}`);
    } else {
      output.dryRun();
    }
  },
};

const publishRelease: Command = {
  name: 'publish-release',
  summary: 'Publish the release assets and finalize the GitHub release',
  positional: RELEASE_URL,
  options: [
    AUTH,
    DIST_DIR,
    {
      name: 'npm-token',
      kind: 'string',
      description: 'A token for the npm release',
      env: ['NPM_TOKEN'],
    },
    {
      name: 'npm-cmd',
      kind: 'string',
      description: 'The command to run for npm release',
      env: ['RH_NPM_COMMAND'],
    },
    {
      name: 'twine-cmd',
      kind: 'string',
      description: 'The twine command to run for Python release',
      env: ['TWINE_COMMAND'],
    },
    DRY_RUN,
  ],
  async run(options, ctx) {
    output.header('📦 release-helper publish-release');

    const releaseUrl = options.requiredPositional(RELEASE_URL);
    const dryRun = options.boolean('dry-run');
    const { release, published } = await publishReleaseWorkflow(
      ctx,
      githubForRelease(releaseUrl, options, ctx),
      {
        releaseUrl,
        distDir: options.required('dist-dir'),
        npmToken: options.string('npm-token'),
        npmCommand: options.string('npm-cmd'),
        twineCommand: options.string('twine-cmd'),
        dryRun,
      },
    );

    for (const name of published) {
      output.info('Published', name);
    }
    output.release(release.tagName, release.htmlUrl);
    await output.actionsOutput('release_url', release.htmlUrl, ctx.env);
    if (dryRun) {
      output.dryRun();
    }
  },
};

const deleteRelease: Command = {
  name: 'delete-release',
  summary: 'Delete a draft GitHub release and its assets',
  positional: RELEASE_URL,
  options: [AUTH],
  async run(options, ctx) {
    output.header('📦 release-helper delete-release');

    const releaseUrl = options.requiredPositional(RELEASE_URL);
    const release = await deleteReleaseWorkflow(githubForRelease(releaseUrl, options, ctx), releaseUrl);

    output.success(`Deleted release ${release.tagName}`);
  },
};

export const releaseCommands: Command[] = [
  tagRelease,
  draftRelease,
  extractRelease,
  publishRelease,
  deleteRelease,
];
