/**
 * npm packaging: build tarballs into the dist dir, install-check them,
 * and helpers for workspaces.
 */

import { mkdtemp, readdir, readFile, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join, resolve } from 'node:path';
import { ensureDir, move, outputFile, pathExists, remove } from 'fs-extra/esm';
import { x } from 'tar';
import type { Runner } from '../clients/shell.ts';
import type { GitClient } from '../clients/types.ts';
import { detectWorkspace } from '../manifest/factory.ts';
import { type PackageJson, parsePackageJson } from '../manifest/node.ts';
import * as output from '../cli/output.ts';

export const DEFAULT_NPM_TEST_COMMAND = 'node index.js';

async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'release-helper-npm-'));
  try {
    return await fn(dir);
  } finally {
    await remove(dir);
  }
}

/**
 * package.json from an npm tarball (`package/package.json`).
 */
export async function readTarballPackage(tarball: string): Promise<PackageJson> {
  return await withTempDir(async (dir) => {
    await x({ file: tarball, cwd: dir, filter: (path) => path === 'package/package.json' });
    const path = join(dir, 'package', 'package.json');
    return parsePackageJson(await readFile(path, 'utf8'), `${basename(tarball)}:package.json`);
  });
}

/**
 * Tarballs currently in a directory, sorted.
 */
export async function listTarballs(dir: string): Promise<string[]> {
  if (!(await pathExists(dir))) return [];
  const names = await readdir(dir);
  return names.filter((name) => name.endsWith('.tgz')).sort().map((name) => join(dir, name));
}

/**
 * `npm pack` a package directory, returning the tarball path.
 */
async function pack(run: Runner, dir: string): Promise<string> {
  const stdout = await run('npm pack', { cwd: dir });
  const name = stdout.split('\n').pop()?.trim() ?? '';
  return join(dir, name);
}

/**
 * Move a public tarball into the dist dir, delete a private one.
 * Returns the new path of a moved tarball.
 */
async function collect(tarball: string, distDir: string, owned: boolean): Promise<string | null> {
  const data = await readTarballPackage(tarball);

  if (!data.private) {
    const dest = join(distDir, basename(tarball));
    await move(tarball, dest, { overwrite: true });
    return dest;
  }

  output.skip(`Skipping private package ${data.name}`);
  if (owned) {
    await remove(tarball);
  }
  return null;
}

export interface BuildNpmOptions {
  /** Package directory or an existing tarball */
  package: string;
  distDir: string;
  cwd: string;
}

/**
 * Build npm dist file(s) from a package and its workspace packages.
 * Returns the tarballs placed in the dist dir.
 */
export async function buildDist(run: Runner, options: BuildNpmOptions): Promise<string[]> {
  const distDir = resolve(options.cwd, options.distDir);
  const source = resolve(options.cwd, options.package);

  // Clean the dist dir of existing npm tarballs
  await ensureDir(distDir);
  for (const tarball of await listTarballs(distDir)) {
    await remove(tarball);
  }

  const isDir = (await stat(source)).isDirectory();
  const built: string[] = [];

  const tarball = isDir ? await pack(run, source) : source;
  const moved = await collect(tarball, distDir, isDir);
  if (moved) built.push(moved);

  if (isDir) {
    for (const member of await detectWorkspace(source)) {
      const memberTarball = await pack(run, join(source, member.path));
      const movedMember = await collect(memberTarball, distDir, true);
      if (movedMember) built.push(movedMember);
    }
  }

  return built;
}

export interface CheckNpmOptions {
  distDir: string;
  /** Run in the scratch project, default `node index.js` */
  testCommand?: string;
  cwd: string;
}

/**
 * Install every public tarball of the dist dir into a scratch project
 * and run the test command there. Returns the checked package names.
 */
export async function checkDist(run: Runner, options: CheckNpmOptions): Promise<string[]> {
  const tarballs = await listTarballs(resolve(options.cwd, options.distDir));
  const testCommand = options.testCommand || DEFAULT_NPM_TEST_COMMAND;

  return await withTempDir(async (dir) => {
    await run('npm init -y', { cwd: dir, quiet: true });

    const staging = join(dir, 'staging');
    const names: string[] = [];

    for (const tarball of tarballs) {
      const data = await readTarballPackage(tarball);
      if (data.private) {
        output.skip(`Skipping private package ${data.name}`);
        continue;
      }

      // Scoped names nest: staging/@scope/name
      const target = join(staging, data.name);
      await ensureDir(dirname(target));
      await withTempDir(async (unpack) => {
        await x({ file: tarball, cwd: unpack });
        await move(join(unpack, 'package'), target, { overwrite: true });
      });
      names.push(data.name);
    }

    if (names.length === 0) {
      output.skip('No npm packages to check');
      return names;
    }

    await run(`npm install ${names.map((name) => `./staging/${name}`).join(' ')}`, { cwd: dir });
    await outputFile(join(dir, 'index.js'), names.map((name) => `require("${name}")`).join('\n'));
    await run(testCommand, { cwd: dir });

    return names;
  });
}

/**
 * Add a registry auth token to the project's .npmrc.
 */
export async function handleAuthToken(cwd: string, token: string): Promise<void> {
  const npmrc = join(cwd, '.npmrc');
  const line = `//registry.npmjs.org/:_authToken=${token}\n`;
  const existing = (await pathExists(npmrc)) ? await readFile(npmrc, 'utf8') : '';
  const prefix = existing && !existing.endsWith('\n') ? `${existing}\n` : existing;
  await outputFile(npmrc, prefix + line);
}

/**
 * npm versions for a changelog PR body, when they differ from the
 * release version or the package is a workspace.
 */
export async function getPackageVersions(cwd: string, version: string): Promise<string> {
  const path = join(cwd, 'package.json');
  if (!(await pathExists(path))) return '';

  const data = parsePackageJson(await readFile(path, 'utf8'));
  let message = '';

  if (data.version !== version) {
    message += `\nPython version: ${version}`;
    message += `\nnpm version: ${data.name}: ${data.version}`;
  }

  const members = await detectWorkspace(cwd);
  if (members.length > 0) {
    message += '\nnpm workspace versions:';
    for (const member of members) {
      const memberData = await member.manifest.read();
      if (memberData) {
        message += `\n${memberData.name}: ${memberData.version}`;
      }
    }
  }

  return message;
}

/**
 * Tag every workspace package as `<name>@<version>`, skipping tags that
 * already exist. Returns the created tags.
 */
export async function tagWorkspacePackages(
  git: Pick<GitClient, 'cwd' | 'tagExists' | 'createTag'>,
): Promise<string[]> {
  const created: string[] = [];

  for (const member of await detectWorkspace(git.cwd)) {
    const data = await member.manifest.read();
    if (!data) continue;

    const tag = `${data.name}@${data.version}`;
    if (await git.tagExists(tag)) {
      output.skip(`Skipping existing tag ${tag}`);
      continue;
    }
    await git.createTag(tag);
    created.push(tag);
  }

  return created;
}
