import assert from 'node:assert/strict';
import { test } from 'node:test';
import { createMockGit, createMockGitHub, withProject } from '../../tests/fakes.ts';
import type { CreatePROptions } from '../domain/types.ts';
import { draftChangelogWorkflow } from './draft-changelog.ts';

const FILES = {
  'CHANGELOG.md': '# Changelog\n',
  'package.json': '{"name": "widgets", "version": "1.1.0"}',
};

const OPTIONS = {
  version: '1.1.0',
  versionSpec: 'minor',
  branch: 'main',
  remote: 'upstream',
  changelogPath: 'CHANGELOG.md',
  dryRun: false,
};

const BODY = 'Automated Changelog Entry for 1.1.0 on main\n\n' +
  'After merging this PR run the "Draft Release" Workflow\n' +
  'on Branch: main\n' +
  'with Version Spec: minor';

test('draftChangelogWorkflow', async (t) => {
  await t.test('opens a PR from a fresh branch', async () => {
    await withProject(FILES, async (dir) => {
      const { git, calls } = createMockGit(dir);
      const created: CreatePROptions[] = [];
      const { github } = createMockGitHub({
        createPR: (options) => {
          created.push(options);
          return Promise.resolve({
            number: 30,
            title: options.title,
            body: options.body,
            url: 'https://github.com/acme/widgets/pull/30',
            author: null,
            labels: [],
            mergedAt: null,
          });
        },
      });

      const result = await draftChangelogWorkflow(git, github, OPTIONS);

      assert.equal(result.title, 'Automated Changelog Entry for 1.1.0 on main');
      assert.equal(result.body, BODY);
      assert.equal(result.pr?.url, 'https://github.com/acme/widgets/pull/30');

      assert.equal(created.length, 1);
      const prBranch = created[0].head;
      assert.match(prBranch, /^changelog-[0-9a-f]{32}$/);
      assert.deepEqual(created[0], {
        title: result.title,
        body: BODY,
        head: prBranch,
        base: 'main',
        maintainerCanModify: true,
      });

      assert.deepEqual(calls, [
        { method: 'discardChanges', args: [] },
        { method: 'diff', args: [] },
        { method: 'stash', args: [] },
        { method: 'fetch', args: ['upstream', 'main'] },
        { method: 'checkoutBranch', args: [prBranch, 'upstream/main'] },
        { method: 'stashApply', args: [] },
        { method: 'commitAll', args: [['Generate changelog for 1.1.0']] },
        { method: 'push', args: ['upstream', prBranch] },
      ]);
    });
  });

  await t.test('lists npm versions that differ from the release version', async () => {
    await withProject({ ...FILES, 'package.json': '{"name": "widgets-js", "version": "0.3.0"}' }, async (dir) => {
      const { git } = createMockGit(dir);
      const { github } = createMockGitHub();

      const result = await draftChangelogWorkflow(git, github, { ...OPTIONS, dryRun: true });

      assert.equal(
        result.body.split('\n\n')[0],
        'Automated Changelog Entry for 1.1.0 on main\nPython version: 1.1.0\nnpm version: widgets-js: 0.3.0',
      );
    });
  });

  await t.test('commits locally on a dry run', async () => {
    await withProject(FILES, async (dir) => {
      const { git, calls } = createMockGit(dir);
      const { github, calls: githubCalls } = createMockGitHub();

      const result = await draftChangelogWorkflow(git, github, { ...OPTIONS, dryRun: true });

      assert.equal(result.pr, null);
      assert.deepEqual(calls.map((c) => c.method), ['discardChanges', 'commitAll']);
      assert.deepEqual(githubCalls, []);
    });
  });

  await t.test('refuses a version that is already tagged', async () => {
    await withProject(FILES, async (dir) => {
      const { git } = createMockGit(dir, { tagExists: () => Promise.resolve(true) });
      const { github } = createMockGitHub();

      await assert.rejects(draftChangelogWorkflow(git, github, OPTIONS), { code: 'TAG_EXISTS' });
    });
  });
});
