import assert from 'node:assert/strict';
import { test } from 'node:test';
import { parsePackageJson } from './node.ts';

test('parsePackageJson', async (t) => {
  await t.test('reads name, version and private', () => {
    assert.deepEqual(
      parsePackageJson(JSON.stringify({ name: 'widgets', version: '1.0.1', private: true })),
      { name: 'widgets', version: '1.0.1', private: true, workspaces: [] },
    );
  });

  await t.test('reads workspaces as a list', () => {
    const data = parsePackageJson(JSON.stringify({ name: 'root', workspaces: ['packages/*'] }));
    assert.deepEqual(data.workspaces, ['packages/*']);
  });

  await t.test('reads workspaces.packages', () => {
    const data = parsePackageJson(
      JSON.stringify({ name: 'root', workspaces: { packages: ['packages/*', 'tools/cli'] } }),
    );
    assert.deepEqual(data.workspaces, ['packages/*', 'tools/cli']);
  });

  await t.test('treats a missing version as empty', () => {
    assert.equal(parsePackageJson('{"name": "widgets"}').version, '');
  });

  await t.test('throws for invalid JSON', () => {
    assert.throws(() => parsePackageJson('{'), {
      code: 'MANIFEST_PARSE_ERROR',
      message: 'Invalid package.json: not valid JSON',
    });
  });
});
