/**
 * Python packaging: build sdist and wheel, check a dist file in a fresh
 * virtual environment.
 */

import { mkdtemp, readdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join, resolve } from 'node:path';
import { ensureDir, pathExists, remove } from 'fs-extra/esm';
import type { Runner } from '../clients/shell.ts';
import { ReleaseError } from '../lib/error.ts';

/** Python dist file suffixes */
export const PYTHON_DIST_SUFFIXES = ['.gz', '.whl'];

export function isPythonDist(name: string): boolean {
  return PYTHON_DIST_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

/**
 * Python dist files currently in a directory, sorted.
 */
export async function listDists(dir: string): Promise<string[]> {
  if (!(await pathExists(dir))) return [];
  return (await readdir(dir)).filter(isPythonDist).sort().map((name) => join(dir, name));
}

export interface BuildPythonOptions {
  distDir: string;
  cwd: string;
}

/**
 * Build the sdist and wheel into the dist dir. Returns false when the
 * project has no Python package files.
 */
export async function buildDist(run: Runner, options: BuildPythonOptions): Promise<boolean> {
  const distDir = resolve(options.cwd, options.distDir);

  await ensureDir(distDir);
  for (const dist of await listDists(distDir)) {
    await remove(dist);
  }

  if (await pathExists(join(options.cwd, 'pyproject.toml'))) {
    await run(`python -m build --outdir ${distDir} .`, { cwd: options.cwd });
    return true;
  }

  if (await pathExists(join(options.cwd, 'setup.py'))) {
    await run(`python setup.py sdist --dist-dir ${distDir}`, { cwd: options.cwd });
    await run(`python setup.py bdist_wheel --dist-dir ${distDir}`, { cwd: options.cwd });
    return true;
  }

  return false;
}

/**
 * Import name guessed from a dist file name:
 * `my-pkg-1.0.0.tar.gz` and `my_pkg-1.0.0-py3-none-any.whl` give `my_pkg`.
 */
export function importName(distFile: string): string {
  const match = /^(\S+?)-\d/.exec(basename(distFile));
  if (!match) {
    throw new ReleaseError(
      `Cannot determine the package name of ${basename(distFile)}`,
      'INVALID_ASSET',
      { file: distFile },
    );
  }
  return match[1].replace(/-/g, '_');
}

export interface CheckPythonOptions {
  /** Run inside the venv's bin dir, default imports the package */
  testCommand?: string;
}

/**
 * `twine check` a dist file, install it into a fresh venv and run the
 * test command there.
 */
export async function checkDist(
  run: Runner,
  distFile: string,
  options: CheckPythonOptions = {},
): Promise<void> {
  const file = distFile.replace(/\\/g, '/');
  await run(`twine check ${file}`);

  const testCommand = options.testCommand || `python -c "import ${importName(file)}"`;

  const env = (await mkdtemp(join(tmpdir(), 'release-helper-venv-'))).replace(/\\/g, '/');
  try {
    const bin = process.platform === 'win32' ? `${env}/Scripts` : `${env}/bin`;
    await run(`python -m venv ${env}`);
    await run(`${bin}/python -m pip install -U pip`);
    await run(`${bin}/pip install -q ${file}`);
    await run(`${bin}/${testCommand}`);
  } finally {
    await remove(env);
  }
}
