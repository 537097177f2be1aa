/**
 * release-helper build-npm, check-npm, build-python, check-python,
 * check-manifest, check-links
 */

import { DEFAULT_NPM_TEST_COMMAND } from '../core/npm.ts';
import {
  buildNpmWorkflow,
  buildPythonWorkflow,
  checkNpmWorkflow,
  checkPythonWorkflow,
} from '../workflows/build-dist.ts';
import {
  checkLinksWorkflow,
  checkManifestWorkflow,
  DEFAULT_LINKS_CACHE,
  DEFAULT_LINKS_EXPIRE,
} from '../workflows/checks.ts';
import { type Command, DIST_DIR } from './command.ts';
import * as output from './output.ts';

const buildNpm: Command = {
  name: 'build-npm',
  summary: 'Build npm package',
  positional: { name: 'package', description: 'Package directory or tarball', default: '.' },
  options: [DIST_DIR],
  async run(options, ctx) {
    output.header('📦 release-helper build-npm');

    const built = await buildNpmWorkflow(ctx, {
      package: options.positional ?? '.',
      distDir: options.required('dist-dir'),
    });
    for (const tarball of built ?? []) {
      output.success(`Built ${tarball}`);
    }
  },
};

const checkNpm: Command = {
  name: 'check-npm',
  summary: 'Check npm package',
  options: [
    DIST_DIR,
    {
      name: 'test-cmd',
      kind: 'string',
      description: 'The command to run in the isolated install',
      env: ['RH_NPM_TEST_COMMAND'],
      default: DEFAULT_NPM_TEST_COMMAND,
    },
  ],
  async run(options, ctx) {
    output.header('📦 release-helper check-npm');

    const checked = await checkNpmWorkflow(ctx, {
      distDir: options.required('dist-dir'),
      testCommand: options.string('test-cmd'),
    });
    for (const name of checked ?? []) {
      output.success(`Checked ${name}`);
    }
  },
};

const buildPython: Command = {
  name: 'build-python',
  summary: 'Build Python dist files',
  options: [DIST_DIR],
  async run(options, ctx) {
    output.header('📦 release-helper build-python');

    if (await buildPythonWorkflow(ctx, { distDir: options.required('dist-dir') })) {
      output.success('Built Python dist files');
    }
  },
};

const checkPython: Command = {
  name: 'check-python',
  summary: 'Check Python dist files',
  options: [
    DIST_DIR,
    {
      name: 'test-cmd',
      kind: 'string',
      description: 'The command to run in the test venv, default imports the package',
      env: ['RH_PY_TEST_COMMAND'],
    },
  ],
  async run(options, ctx) {
    output.header('📦 release-helper check-python');

    const checked = await checkPythonWorkflow(ctx, {
      distDir: options.required('dist-dir'),
      testCommand: options.string('test-cmd'),
    });
    for (const dist of checked) {
      output.success(`Checked ${dist}`);
    }
  },
};

const checkManifest: Command = {
  name: 'check-manifest',
  summary: 'Check the project manifest',
  options: [],
  async run(_options, ctx) {
    output.header('📦 release-helper check-manifest');

    if (await checkManifestWorkflow(ctx)) {
      output.success('Manifest is complete');
    }
  },
};

const checkLinks: Command = {
  name: 'check-links',
  summary: 'Check Markdown file links',
  options: [
    {
      name: 'ignore-glob',
      kind: 'list',
      description: 'Markdown files to skip, repeatable',
      env: ['RH_IGNORE_GLOB'],
      default: ['CHANGELOG.md'],
    },
    {
      name: 'cache-file',
      kind: 'string',
      description: 'The cache file to use',
      env: ['RH_CACHE_FILE'],
      default: DEFAULT_LINKS_CACHE,
    },
    {
      name: 'links-expire',
      kind: 'number',
      description: 'Duration in seconds for links to be cached',
      env: ['RH_LINKS_EXPIRE'],
      default: DEFAULT_LINKS_EXPIRE,
    },
  ],
  async run(options, ctx) {
    output.header('📦 release-helper check-links');

    await checkLinksWorkflow(ctx, {
      ignoreGlob: options.list('ignore-glob'),
      cacheFile: options.required('cache-file'),
      linksExpire: options.number('links-expire') ?? DEFAULT_LINKS_EXPIRE,
    });
    output.success('Links are valid');
  },
};

export const buildCommands: Command[] = [
  buildNpm,
  checkNpm,
  buildPython,
  checkPython,
  checkManifest,
  checkLinks,
];
