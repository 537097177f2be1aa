/**
 * release-helper build-changelog, check-changelog, draft-changelog,
 * forwardport-changelog
 */

import { getVersion } from '../manifest/mod.ts';
import { buildChangelogWorkflow, checkChangelogWorkflow } from '../workflows/build-changelog.ts';
import { resolveBranch } from '../workflows/context.ts';
import { draftChangelogWorkflow } from '../workflows/draft-changelog.ts';
import { forwardportChangelogWorkflow } from '../workflows/forwardport-changelog.ts';
import {
  AUTH,
  BRANCH,
  CHANGELOG_PATH,
  type CliContext,
  type Command,
  DRY_RUN,
  githubFor,
  githubForRelease,
  RELEASE_URL,
  REMOTE,
  REPO,
  RESOLVE_BACKPORTS,
  USERNAME,
  VERSION_SPEC,
} from './command.ts';
import type { Options } from './options.ts';
import * as output from './output.ts';

const ENTRY_OPTIONS = [BRANCH, REMOTE, REPO, AUTH, CHANGELOG_PATH, RESOLVE_BACKPORTS];

async function entryOptions(options: Options, ctx: CliContext) {
  const { repo, github } = await githubFor(options, ctx);
  const branch = await resolveBranch(ctx.git, ctx.env, options.string('branch'));
  const version = await getVersion(ctx.run, ctx.cwd);

  output.info('Repository', repo);
  output.info('Branch', branch);
  output.info('Version', version);

  return {
    github,
    entry: {
      version,
      repo,
      branch,
      changelogPath: options.required('changelog-path'),
      resolveBackports: options.boolean('resolve-backports'),
    },
  };
}

const buildChangelog: Command = {
  name: 'build-changelog',
  summary: 'Build changelog entry',
  options: ENTRY_OPTIONS,
  async run(options, ctx) {
    output.header('📦 release-helper build-changelog');

    const { github, entry } = await entryOptions(options, ctx);
    const result = await buildChangelogWorkflow(ctx.git, github, entry);

    if (result.changed) {
      output.success(`Updated ${entry.changelogPath}`);
    } else {
      output.skip(`${entry.changelogPath} is up to date`);
    }
  },
};

const checkChangelog: Command = {
  name: 'check-changelog',
  summary: 'Check changelog entry',
  options: [
    ...ENTRY_OPTIONS,
    {
      name: 'output',
      kind: 'string',
      description: 'File to write the final changelog entry to',
      env: ['RH_CHANGELOG_OUTPUT'],
    },
  ],
  async run(options, ctx) {
    output.header('📦 release-helper check-changelog');

    const { github, entry } = await entryOptions(options, ctx);
    await checkChangelogWorkflow(ctx.git, github, { ...entry, output: options.string('output') });

    output.success(`${entry.changelogPath} has an entry for ${entry.version}`);
  },
};

const draftChangelog: Command = {
  name: 'draft-changelog',
  summary: 'Create a changelog entry PR',
  options: [VERSION_SPEC, BRANCH, REMOTE, REPO, AUTH, CHANGELOG_PATH, DRY_RUN],
  async run(options, ctx) {
    output.header('📦 release-helper draft-changelog');

    const { github } = await githubFor(options, ctx);
    const branch = await resolveBranch(ctx.git, ctx.env, options.string('branch'));
    const dryRun = options.boolean('dry-run');

    const result = await draftChangelogWorkflow(ctx.git, github, {
      version: await getVersion(ctx.run, ctx.cwd),
      versionSpec: options.required('version-spec'),
      branch,
      remote: options.required('remote'),
      changelogPath: options.required('changelog-path'),
      dryRun,
    });

    output.info('Title', result.title);
    if (result.pr) {
      output.pr(result.pr.url);
      await output.actionsOutput('pr_url', result.pr.url, ctx.env);
    } else {
      output.dryRun();
    }
  },
};

const forwardportChangelog: Command = {
  name: 'forwardport-changelog',
  summary: 'Forwardport changelog entries to the default branch',
  positional: RELEASE_URL,
  options: [REMOTE, REPO, AUTH, USERNAME, CHANGELOG_PATH, DRY_RUN],
  async run(options, ctx) {
    output.header('📦 release-helper forwardport-changelog');

    const releaseUrl = options.requiredPositional(RELEASE_URL);
    const result = await forwardportChangelogWorkflow(ctx, githubForRelease(releaseUrl, options, ctx), {
      releaseUrl,
      remote: options.required('remote'),
      repo: options.string('repo'),
      username: options.string('username'),
      auth: options.string('auth'),
      changelogPath: options.required('changelog-path'),
      dryRun: options.boolean('dry-run'),
    });

    if (!result.ported) {
      output.skip(`${result.tag} is already on the default branch`);
    } else if (result.pr) {
      output.pr(result.pr.url);
      await output.actionsOutput('pr_url', result.pr.url, ctx.env);
    } else {
      output.dryRun();
    }
  },
};

export const changelogCommands: Command[] = [
  buildChangelog,
  checkChangelog,
  draftChangelog,
  forwardportChangelog,
];
