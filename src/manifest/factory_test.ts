import assert from 'node:assert/strict';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { test } from 'node:test';
import { outputFile, remove } from 'fs-extra/esm';
import { detectWorkspace, getManifestInfo, getVersion } from './factory.ts';
import type { Runner } from '../clients/shell.ts';

const run: Runner = () => Promise.resolve('9.9.9');

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), 'release-helper-manifest-'));
  try {
    await fn(dir);
  } finally {
    await remove(dir);
  }
}

test('getVersion', async (t) => {
  await t.test('reads package.json', async () => {
    await withTempDir(async (dir) => {
      await outputFile(join(dir, 'package.json'), JSON.stringify({ name: 'widgets', version: '2.0.0' }));
      assert.equal(await getVersion(run, dir), '2.0.0');
    });
  });

  await t.test('prefers the Python package', async () => {
    await withTempDir(async (dir) => {
      await outputFile(join(dir, 'package.json'), JSON.stringify({ name: 'widgets', version: '2.0.0' }));
      await outputFile(join(dir, 'pyproject.toml'), '[project]\nname = "widgets"\nversion = "1.0.1"\n');

      assert.equal(await getVersion(run, dir), '1.0.1');
      assert.deepEqual(await getManifestInfo(run, dir), [
        { type: 'python', path: 'pyproject.toml', version: '1.0.1' },
        { type: 'node', path: 'package.json', version: '2.0.0' },
      ]);
    });
  });

  await t.test('throws without manifests', async () => {
    await withTempDir(async (dir) => {
      await assert.rejects(() => getVersion(run, dir), { code: 'NO_VERSION' });
    });
  });
});

test('detectWorkspace', async (t) => {
  await t.test('returns no members for a single package', async () => {
    await withTempDir(async (dir) => {
      await outputFile(join(dir, 'package.json'), JSON.stringify({ name: 'widgets', version: '1.0.0' }));
      assert.deepEqual(await detectWorkspace(dir), []);
    });
  });

  await t.test('resolves glob patterns to packages', async () => {
    await withTempDir(async (dir) => {
      await outputFile(
        join(dir, 'package.json'),
        JSON.stringify({ name: 'root', private: true, workspaces: { packages: ['packages/*'] } }),
      );
      await outputFile(join(dir, 'packages/b/package.json'), JSON.stringify({ name: 'b', version: '1.0.0' }));
      await outputFile(join(dir, 'packages/a/package.json'), JSON.stringify({ name: 'a', version: '1.0.0' }));
      await outputFile(join(dir, 'packages/notes/README.md'), 'not a package\n');

      const members = await detectWorkspace(dir);
      assert.deepEqual(members.map((m) => m.path), [join('packages', 'a'), join('packages', 'b')]);
      assert.equal(await members[0].manifest.getVersion(), '1.0.0');
    });
  });
});
