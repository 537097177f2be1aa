/**
 * Tests for the GitHub client against a fake fetch.
 */

import assert from 'node:assert/strict';
import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { test } from 'node:test';
import { remove } from 'fs-extra/esm';
import { type Fetch, GitHub } from './github.ts';

interface Call {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
}

function fakeFetch(responses: Array<{ status?: number; body?: unknown; raw?: string }>) {
  const calls: Call[] = [];
  const fetch: Fetch = (url, init) => {
    const headers = new Headers(init.headers);
    calls.push({
      url,
      method: init.method ?? 'GET',
      headers: Object.fromEntries(headers.entries()),
      body: typeof init.body === 'string' ? JSON.parse(init.body) : init.body,
    });

    const next = responses.shift() ?? { status: 404, body: { message: 'Not Found' } };
    const status = next.status ?? 200;
    const payload = next.raw ?? (next.body === undefined ? null : JSON.stringify(next.body));
    return Promise.resolve(new Response(status === 204 ? null : payload, { status }));
  };
  return { fetch, calls };
}

const RELEASE = {
  id: 7,
  tag_name: 'v1.0.1',
  target_commitish: 'main',
  name: 'Release v1.0.1',
  body: 'notes',
  draft: true,
  prerelease: false,
  url: 'https://api.github.com/repos/acme/widgets/releases/7',
  html_url: 'https://github.com/acme/widgets/releases/tag/untagged-1',
  upload_url: 'https://uploads.github.com/repos/acme/widgets/releases/7/assets{?name,label}',
  created_at: '2024-02-01T00:00:00Z',
  assets: [{ id: 70, name: 'widgets-1.0.1.tgz', url: 'https://api.github.com/repos/acme/widgets/releases/assets/70' }],
};

const ISSUE = (number: number, title: string) => ({
  number,
  title,
  body: null,
  html_url: `https://github.com/acme/widgets/pull/${number}`,
  user: { login: 'alice', html_url: 'https://github.com/alice' },
  labels: [{ name: 'bug' }],
  pull_request: { merged_at: '2024-01-20T00:00:00Z' },
});

test('GitHub requests', async (t) => {
  await t.test('sends auth and API headers', async () => {
    const { fetch, calls } = fakeFetch([{
      body: {
        full_name: 'acme/widgets',
        html_url: 'https://github.com/acme/widgets',
        clone_url: 'https://github.com/acme/widgets.git',
        default_branch: 'main',
      },
    }]);
    const github = new GitHub({ owner: 'acme', repo: 'widgets', token: 'test-secret', fetch });

    assert.deepEqual(await github.getRepository(), {
      fullName: 'acme/widgets',
      htmlUrl: 'https://github.com/acme/widgets',
      cloneUrl: 'https://github.com/acme/widgets.git',
      defaultBranch: 'main',
    });
    assert.equal(calls[0].url, 'https://api.github.com/repos/acme/widgets');
    assert.equal(calls[0].headers['authorization'], 'Bearer test-secret');
    assert.equal(calls[0].headers['accept'], 'application/vnd.github+json');
    assert.equal(calls[0].headers['x-github-api-version'], '2022-11-28');
  });

  await t.test('omits authorization without a token', async () => {
    const { fetch, calls } = fakeFetch([{ body: [] }]);
    const github = new GitHub({ owner: 'acme', repo: 'widgets', fetch });

    await github.listTags();
    assert.equal(calls[0].headers['authorization'], undefined);
  });

  await t.test('throws GITHUB_API_ERROR with status on failure', async () => {
    const { fetch } = fakeFetch([{ status: 422, raw: 'Validation Failed' }]);
    const github = new GitHub({ owner: 'acme', repo: 'widgets', fetch });

    await assert.rejects(() => github.getPR(1), {
      code: 'GITHUB_API_ERROR',
      details: { status: 422, body: 'Validation Failed' },
    });
  });

  await t.test('throws on unexpected payloads', async () => {
    const { fetch } = fakeFetch([{ body: { number: 'one' } }]);
    const github = new GitHub({ owner: 'acme', repo: 'widgets', fetch });

    await assert.rejects(() => github.getPR(1), {
      code: 'GITHUB_API_ERROR',
      message: 'Unexpected GitHub API response: number is not a number',
    });
  });
});

test('GitHub pull requests', async (t) => {
  await t.test('searchMergedPRs builds the query and paginates', async () => {
    const firstPage = Array.from({ length: 100 }, (_, i) => ISSUE(i + 1, `PR ${i + 1}`));
    const { fetch, calls } = fakeFetch([
      { body: { items: firstPage } },
      { body: { items: [ISSUE(101, 'PR 101')] } },
    ]);
    const github = new GitHub({ owner: 'acme', repo: 'widgets', fetch });

    const pulls = await github.searchMergedPRs({ branch: 'main', since: '2024-01-01T10:00:00Z' });

    assert.equal(pulls.length, 101);
    assert.deepEqual(pulls[100], {
      number: 101,
      title: 'PR 101',
      body: '',
      url: 'https://github.com/acme/widgets/pull/101',
      author: { login: 'alice', url: 'https://github.com/alice' },
      labels: ['bug'],
      mergedAt: '2024-01-20T00:00:00Z',
    });
    assert.equal(
      calls[0].url,
      'https://api.github.com/search/issues?q=' +
        encodeURIComponent('repo:acme/widgets is:pr is:merged base:main merged:>=2024-01-01T10:00:00Z') +
        '&per_page=100&page=1',
    );
    assert.equal(calls[1].url.endsWith('&per_page=100&page=2'), true);
  });

  await t.test('createPR posts the payload', async () => {
    const { fetch, calls } = fakeFetch([{
      body: { ...ISSUE(5, 'Automated Changelog Entry for 1.0.1 on main'), merged_at: null, pull_request: undefined },
    }]);
    const github = new GitHub({ owner: 'acme', repo: 'widgets', fetch });

    const pull = await github.createPR({
      title: 'Automated Changelog Entry for 1.0.1 on main',
      body: 'body',
      head: 'changelog-abc',
      base: 'main',
    });

    assert.equal(pull.url, 'https://github.com/acme/widgets/pull/5');
    assert.equal(pull.mergedAt, null);
    assert.equal(calls[0].method, 'POST');
    assert.deepEqual(calls[0].body, {
      title: 'Automated Changelog Entry for 1.0.1 on main',
      body: 'body',
      head: 'changelog-abc',
      base: 'main',
      maintainer_can_modify: true,
    });
  });
});

test('GitHub releases', async (t) => {
  await t.test('listReleases maps releases and assets', async () => {
    const { fetch } = fakeFetch([{ body: [RELEASE] }]);
    const github = new GitHub({ owner: 'acme', repo: 'widgets', fetch });

    assert.deepEqual(await github.listReleases(), [{
      id: 7,
      tagName: 'v1.0.1',
      targetCommitish: 'main',
      name: 'Release v1.0.1',
      body: 'notes',
      draft: true,
      prerelease: false,
      url: 'https://api.github.com/repos/acme/widgets/releases/7',
      htmlUrl: 'https://github.com/acme/widgets/releases/tag/untagged-1',
      uploadUrl: 'https://uploads.github.com/repos/acme/widgets/releases/7/assets{?name,label}',
      createdAt: '2024-02-01T00:00:00Z',
      assets: [{
        id: 70,
        name: 'widgets-1.0.1.tgz',
        url: 'https://api.github.com/repos/acme/widgets/releases/assets/70',
      }],
    }]);
  });

  await t.test('updateRelease patches the release', async () => {
    const { fetch, calls } = fakeFetch([{ body: { ...RELEASE, draft: false } }]);
    const github = new GitHub({ owner: 'acme', repo: 'widgets', fetch });

    const release = await github.updateRelease(7, { draft: false });

    assert.equal(release.draft, false);
    assert.equal(calls[0].method, 'PATCH');
    assert.equal(calls[0].url, 'https://api.github.com/repos/acme/widgets/releases/7');
    assert.deepEqual(calls[0].body, { draft: false });
  });

  await t.test('deleteRelease accepts 204', async () => {
    const { fetch, calls } = fakeFetch([{ status: 204 }]);
    const github = new GitHub({ owner: 'acme', repo: 'widgets', fetch });

    await github.deleteRelease(7);
    assert.equal(calls[0].method, 'DELETE');
  });

  await t.test('uploads and downloads assets', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'release-helper-github-'));
    try {
      const source = join(dir, 'widgets-1.0.1.tgz');
      await writeFile(source, 'tarball');

      const { fetch, calls } = fakeFetch([
        { body: [RELEASE] },
        { body: RELEASE.assets[0] },
        { raw: 'downloaded' },
      ]);
      const github = new GitHub({ owner: 'acme', repo: 'widgets', fetch });
      const [release] = await github.listReleases();

      const asset = await github.uploadReleaseAsset(release, source);
      assert.equal(asset.id, 70);
      assert.equal(
        calls[1].url,
        'https://uploads.github.com/repos/acme/widgets/releases/7/assets?name=widgets-1.0.1.tgz',
      );
      assert.equal(calls[1].headers['content-type'], 'application/octet-stream');

      const dest = join(dir, 'copy.tgz');
      await github.downloadReleaseAsset(asset, dest);
      assert.equal(calls[2].headers['accept'], 'application/octet-stream');
      assert.equal(await readFile(dest, 'utf8'), 'downloaded');
    } finally {
      await remove(dir);
    }
  });
});

test('GitHub tags', async (t) => {
  await t.test('listTags maps matching refs', async () => {
    const { fetch, calls } = fakeFetch([{
      body: [{ ref: 'refs/tags/v1.0.1', object: { sha: 'abc123', type: 'tag' } }],
    }]);
    const github = new GitHub({ owner: 'acme', repo: 'widgets', fetch });

    assert.deepEqual(await github.listTags(), [{ ref: 'refs/tags/v1.0.1', sha: 'abc123' }]);
    assert.equal(calls[0].url, 'https://api.github.com/repos/acme/widgets/git/matching-refs/tags');
  });
});
