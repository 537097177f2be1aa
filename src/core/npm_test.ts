/**
 * Tests for npm packaging helpers. Tarballs are built with tar, npm
 * itself is replaced by a recording runner.
 */

import assert from 'node:assert/strict';
import { mkdtemp, readdir, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { test } from 'node:test';
import { ensureDir, outputFile, pathExists, remove } from 'fs-extra/esm';
import { c } from 'tar';
import {
  buildDist,
  checkDist,
  getPackageVersions,
  handleAuthToken,
  readTarballPackage,
  tagWorkspacePackages,
} from './npm.ts';
import type { Runner } from '../clients/shell.ts';
import type { GitClient } from '../clients/types.ts';

async function makeTarball(dir: string, name: string, data: Record<string, unknown>): Promise<string> {
  const source = await mkdtemp(join(tmpdir(), 'release-helper-pkg-'));
  try {
    await outputFile(join(source, 'package', 'package.json'), JSON.stringify(data));
    await outputFile(join(source, 'package', 'index.js'), 'module.exports = {};\n');
    const file = join(dir, name);
    await ensureDir(dir);
    await c({ gzip: true, file, cwd: source }, ['package']);
    return file;
  } finally {
    await remove(source);
  }
}

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), 'release-helper-npm-test-'));
  try {
    await fn(dir);
  } finally {
    await remove(dir);
  }
}

function recordingRunner(reply: (command: string, cwd: string) => Promise<string> | string = () => '') {
  const calls: Array<{ command: string; cwd: string }> = [];
  const run: Runner = async (command, options = {}) => {
    const cwd = options.cwd ?? '';
    calls.push({ command, cwd });
    return await reply(command, cwd);
  };
  return { run, calls };
}

test('readTarballPackage', async (t) => {
  await t.test('reads package/package.json', async () => {
    await withTempDir(async (dir) => {
      const tarball = await makeTarball(dir, 'widgets-1.0.1.tgz', { name: 'widgets', version: '1.0.1' });

      assert.deepEqual(await readTarballPackage(tarball), {
        name: 'widgets',
        version: '1.0.1',
        private: false,
        workspaces: [],
      });
    });
  });
});

test('buildDist', async (t) => {
  await t.test('moves a public tarball into the dist dir', async () => {
    await withTempDir(async (dir) => {
      const tarball = await makeTarball(dir, 'widgets-1.0.1.tgz', { name: 'widgets', version: '1.0.1' });
      await outputFile(join(dir, 'dist', 'old-0.1.0.tgz'), 'stale');
      await outputFile(join(dir, 'dist', 'widgets-1.0.1.tar.gz'), 'python');

      const { run, calls } = recordingRunner();
      const built = await buildDist(run, { package: tarball, distDir: 'dist', cwd: dir });

      assert.deepEqual(built, [join(dir, 'dist', 'widgets-1.0.1.tgz')]);
      assert.deepEqual((await readdir(join(dir, 'dist'))).sort(), [
        'widgets-1.0.1.tar.gz',
        'widgets-1.0.1.tgz',
      ]);
      assert.deepEqual(calls, []);
    });
  });

  await t.test('packs a directory and its workspace packages', async () => {
    await withTempDir(async (dir) => {
      await outputFile(
        join(dir, 'package.json'),
        JSON.stringify({ name: 'root', private: true, workspaces: ['packages/*'] }),
      );
      await outputFile(join(dir, 'packages', 'a', 'package.json'), JSON.stringify({ name: 'a', version: '1.0.0' }));

      const { run, calls } = recordingRunner(async (_command, cwd) => {
        if (cwd === dir) {
          await makeTarball(dir, 'root-0.0.0.tgz', { name: 'root', private: true });
          return 'npm notice\nroot-0.0.0.tgz';
        }
        await makeTarball(cwd, 'a-1.0.0.tgz', { name: 'a', version: '1.0.0' });
        return 'a-1.0.0.tgz';
      });

      const built = await buildDist(run, { package: '.', distDir: 'dist', cwd: dir });

      assert.deepEqual(built, [join(dir, 'dist', 'a-1.0.0.tgz')]);
      assert.deepEqual(calls.map((call) => call.command), ['npm pack', 'npm pack']);
      assert.equal(await pathExists(join(dir, 'root-0.0.0.tgz')), false);
    });
  });
});

test('checkDist', async (t) => {
  await t.test('installs public packages and requires them', async () => {
    await withTempDir(async (dir) => {
      await makeTarball(join(dir, 'dist'), 'widgets-1.0.1.tgz', { name: 'widgets', version: '1.0.1' });
      await makeTarball(join(dir, 'dist'), 'acme-gears-2.0.0.tgz', { name: '@acme/gears', version: '2.0.0' });
      await makeTarball(join(dir, 'dist'), 'internal-1.0.0.tgz', { name: 'internal', private: true });

      let indexJs = '';
      let staged: string[] = [];
      const { run, calls } = recordingRunner(async (command, cwd) => {
        if (command === 'node index.js') {
          indexJs = await readFile(join(cwd, 'index.js'), 'utf8');
          staged = [
            ...(await readdir(join(cwd, 'staging'))),
            ...(await readdir(join(cwd, 'staging', '@acme'))),
          ].sort();
        }
        return '';
      });

      const names = await checkDist(run, { distDir: 'dist', cwd: dir });

      assert.deepEqual(names, ['@acme/gears', 'widgets']);
      assert.deepEqual(calls.map((call) => call.command), [
        'npm init -y',
        'npm install ./staging/@acme/gears ./staging/widgets',
        'node index.js',
      ]);
      assert.equal(indexJs, 'require("@acme/gears")\nrequire("widgets")');
      assert.deepEqual(staged, ['@acme', 'gears', 'widgets']);
    });
  });
});

test('handleAuthToken', async (t) => {
  await t.test('appends the token line to .npmrc', async () => {
    await withTempDir(async (dir) => {
      await outputFile(join(dir, '.npmrc'), 'save-exact=true');
      await handleAuthToken(dir, 'test-secret');

      assert.equal(
        await readFile(join(dir, '.npmrc'), 'utf8'),
        'save-exact=true\n//registry.npmjs.org/:_authToken=test-secret\n',
      );
    });
  });
});

test('getPackageVersions', async (t) => {
  await t.test('is empty when versions match', async () => {
    await withTempDir(async (dir) => {
      await outputFile(join(dir, 'package.json'), JSON.stringify({ name: 'widgets', version: '1.0.1' }));
      assert.equal(await getPackageVersions(dir, '1.0.1'), '');
    });
  });

  await t.test('lists differing and workspace versions', async () => {
    await withTempDir(async (dir) => {
      await outputFile(
        join(dir, 'package.json'),
        JSON.stringify({ name: 'root', version: '0.3.0', workspaces: ['packages/*'] }),
      );
      await outputFile(join(dir, 'packages', 'a', 'package.json'), JSON.stringify({ name: 'a', version: '0.3.1' }));

      assert.equal(
        await getPackageVersions(dir, '1.0.1'),
        '\nPython version: 1.0.1\nnpm version: root: 0.3.0\nnpm workspace versions:\na: 0.3.1',
      );
    });
  });
});

test('tagWorkspacePackages', async (t) => {
  await t.test('tags packages that are not tagged yet', async () => {
    await withTempDir(async (dir) => {
      await outputFile(join(dir, 'package.json'), JSON.stringify({ name: 'root', workspaces: ['packages/*'] }));
      await outputFile(join(dir, 'packages', 'a', 'package.json'), JSON.stringify({ name: 'a', version: '1.0.0' }));
      await outputFile(join(dir, 'packages', 'b', 'package.json'), JSON.stringify({ name: 'b', version: '2.0.0' }));

      const tags = new Set(['a@1.0.0']);
      const git: Pick<GitClient, 'cwd' | 'tagExists' | 'createTag'> = {
        cwd: dir,
        tagExists: (tag) => Promise.resolve(tags.has(tag)),
        createTag: (name) => {
          tags.add(name);
          return Promise.resolve();
        },
      };

      assert.deepEqual(await tagWorkspacePackages(git), ['b@2.0.0']);
    });
  });
});
