import assert from 'node:assert/strict';
import { test } from 'node:test';
import { withProject } from '../../tests/fakes.ts';
import { EMPTY_CONFIG, type ReleaseConfig } from '../domain/config.ts';
import { formatHelp, loadConfig, Options, type OptionSpec } from './options.ts';

const SPECS: OptionSpec[] = [
  { name: 'branch', kind: 'string', description: 'The target branch', env: ['RH_BRANCH'] },
  { name: 'remote', kind: 'string', description: 'The git remote name', default: 'upstream' },
  { name: 'dry-run', kind: 'boolean', description: 'Run as a dry run', env: ['RH_DRY_RUN'] },
  { name: 'ignore-glob', kind: 'list', description: 'Files to skip', env: ['RH_IGNORE_GLOB'], default: ['CHANGELOG.md'] },
  { name: 'links-expire', kind: 'number', description: 'Cache duration', env: ['RH_LINKS_EXPIRE'], default: 60 },
  { name: 'no-git-tag-workspace', kind: 'boolean', description: 'Skip workspace tags' },
];

const CONFIG: ReleaseConfig = {
  source: '.release-helper.toml',
  options: { 'branch': 'from-config', 'remote': 'origin', 'dry-run': true, 'ignore-glob': 'docs/*.md' },
};

test('Options', async (t) => {
  await t.test('prefers the flag, then the env, then the config, then the default', () => {
    const env = { RH_BRANCH: 'from-env' };

    assert.equal(new Options(['--branch', 'from-flag'], SPECS, env, CONFIG).string('branch'), 'from-flag');
    assert.equal(new Options([], SPECS, env, CONFIG).string('branch'), 'from-env');
    assert.equal(new Options([], SPECS, {}, CONFIG).string('branch'), 'from-config');
    assert.equal(new Options([], SPECS, {}, EMPTY_CONFIG).string('branch'), undefined);
    assert.equal(new Options([], SPECS, {}, EMPTY_CONFIG).string('remote'), 'upstream');
  });

  await t.test('reads booleans', () => {
    assert.equal(new Options(['--dry-run'], SPECS, {}, EMPTY_CONFIG).boolean('dry-run'), true);
    assert.equal(new Options([], SPECS, { RH_DRY_RUN: 'Yes' }, EMPTY_CONFIG).boolean('dry-run'), true);
    assert.equal(new Options([], SPECS, { RH_DRY_RUN: '1' }, EMPTY_CONFIG).boolean('dry-run'), true);
    assert.equal(new Options([], SPECS, { RH_DRY_RUN: 'off' }, CONFIG).boolean('dry-run'), false);
    assert.equal(new Options([], SPECS, {}, CONFIG).boolean('dry-run'), true);
    assert.equal(new Options([], SPECS, {}, EMPTY_CONFIG).boolean('dry-run'), false);
  });

  await t.test('reads negated flags', () => {
    const options = new Options(['--no-git-tag-workspace'], SPECS, {}, EMPTY_CONFIG);
    assert.equal(options.boolean('no-git-tag-workspace'), true);
  });

  await t.test('reads lists', () => {
    const repeated = new Options(['--ignore-glob', 'a.md', '--ignore-glob', 'b.md'], SPECS, {}, EMPTY_CONFIG);
    assert.deepEqual(repeated.list('ignore-glob'), ['a.md', 'b.md']);
    assert.deepEqual(
      new Options([], SPECS, { RH_IGNORE_GLOB: 'a.md, b.md c.md' }, EMPTY_CONFIG).list('ignore-glob'),
      ['a.md', 'b.md', 'c.md'],
    );
    assert.deepEqual(new Options([], SPECS, {}, CONFIG).list('ignore-glob'), ['docs/*.md']);
    assert.deepEqual(new Options([], SPECS, {}, EMPTY_CONFIG).list('ignore-glob'), ['CHANGELOG.md']);
  });

  await t.test('reads numbers', () => {
    assert.equal(new Options(['--links-expire', '30'], SPECS, {}, EMPTY_CONFIG).number('links-expire'), 30);
    assert.equal(new Options([], SPECS, {}, EMPTY_CONFIG).number('links-expire'), 60);
    assert.throws(
      () => new Options([], SPECS, { RH_LINKS_EXPIRE: 'soon' }, EMPTY_CONFIG),
      { code: 'INVALID_OPTION', message: 'Invalid number for RH_LINKS_EXPIRE: soon' },
    );
  });

  await t.test('rejects unknown options', () => {
    assert.throws(
      () => new Options(['--nope'], SPECS, {}, EMPTY_CONFIG),
      { code: 'INVALID_OPTION', message: 'Unknown option: --nope' },
    );
  });

  await t.test('rejects stray arguments', () => {
    assert.throws(
      () => new Options(['extra'], SPECS, {}, EMPTY_CONFIG),
      { code: 'INVALID_OPTION', message: 'Unexpected argument: extra' },
    );
  });

  await t.test('reads the positional argument from the command line or env', () => {
    const positional = { name: 'release-url', description: 'The release url', env: ['RH_RELEASE_URL'] };
    const env = { RH_RELEASE_URL: 'https://github.com/acme/widgets/releases/tag/v2' };

    assert.equal(
      new Options(['https://github.com/acme/widgets/releases/tag/v1'], SPECS, env, EMPTY_CONFIG, positional)
        .requiredPositional(positional),
      'https://github.com/acme/widgets/releases/tag/v1',
    );
    assert.equal(
      new Options([], SPECS, env, EMPTY_CONFIG, positional).requiredPositional(positional),
      'https://github.com/acme/widgets/releases/tag/v2',
    );
    assert.throws(
      () => new Options([], SPECS, {}, EMPTY_CONFIG, positional).requiredPositional(positional),
      { code: 'MISSING_OPTION', message: 'Missing required argument <release-url>' },
    );
  });

  await t.test('requires options', () => {
    assert.throws(
      () => new Options([], SPECS, {}, EMPTY_CONFIG).required('branch'),
      { code: 'MISSING_OPTION', message: 'Missing required option --branch' },
    );
  });
});

test('loadConfig', async (t) => {
  await t.test('skips files without a release-helper section', async () => {
    const files = {
      'pyproject.toml': '[project]\nname = "widgets"\n',
      'package.json': '{"name": "widgets", "release-helper": {"options": {"dist_dir": "out"}}}',
    };
    await withProject(files, async (dir) => {
      assert.deepEqual(await loadConfig(dir), { source: 'package.json', options: { 'dist-dir': 'out' } });
    });
  });

  await t.test('prefers .release-helper.toml', async () => {
    const files = {
      '.release-helper.toml': '[options]\nremote = "origin"\n',
      'package.json': '{"release-helper": {"options": {"remote": "upstream"}}}',
    };
    await withProject(files, async (dir) => {
      assert.deepEqual(await loadConfig(dir), { source: '.release-helper.toml', options: { remote: 'origin' } });
    });
  });

  await t.test('is empty without configuration', async () => {
    await withProject({}, async (dir) => {
      assert.deepEqual(await loadConfig(dir), EMPTY_CONFIG);
    });
  });
});

test('formatHelp', () => {
  const help = formatHelp('release-helper check-links', 'Check links', SPECS.slice(3, 5), (s) => s);

  assert.equal(
    help,
    '\nrelease-helper check-links - Check links\n\nOPTIONS:\n' +
      '  --ignore-glob <value>  Files to skip (env: RH_IGNORE_GLOB; default: CHANGELOG.md)\n' +
      '  --links-expire <n>     Cache duration (env: RH_LINKS_EXPIRE; default: 60)\n' +
      '  --help                 Show this help\n',
  );
});
