import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { pathExists } from 'fs-extra/esm';
import { parse } from 'smol-toml';
import type { Manifest } from './interface.ts';
import type { Runner } from '../clients/shell.ts';

/**
 * Static `[project] version` from pyproject.toml content, null when the
 * version is dynamic or missing.
 */
export function pyprojectVersion(content: string): string | null {
  const project = parse(content).project;
  if (typeof project !== 'object' || project === null || Array.isArray(project)) {
    return null;
  }
  const version = Reflect.get(project, 'version');
  return typeof version === 'string' ? version : null;
}

/**
 * Manifest handler for Python projects.
 *
 * Prefers a static version in pyproject.toml and falls back to asking
 * setup.py, which may compute the version at build time.
 */
export class PythonManifest implements Manifest {
  readonly type = 'python';
  private readonly root: string;
  private readonly run: Runner;

  constructor(run: Runner, root: string = process.cwd()) {
    this.run = run;
    this.root = root;
  }

  readonly path = 'pyproject.toml';

  /**
   * A setup.py, or a pyproject.toml that describes a package rather than
   * only configuring tools.
   */
  async exists(): Promise<boolean> {
    if (await pathExists(join(this.root, 'setup.py'))) return true;

    const pyproject = join(this.root, 'pyproject.toml');
    if (!(await pathExists(pyproject))) return false;

    const document = parse(await readFile(pyproject, 'utf8'));
    return 'project' in document || 'build-system' in document;
  }

  async getVersion(): Promise<string | null> {
    const pyproject = join(this.root, 'pyproject.toml');
    if (await pathExists(pyproject)) {
      const version = pyprojectVersion(await readFile(pyproject, 'utf8'));
      if (version) return version;
    }

    if (await pathExists(join(this.root, 'setup.py'))) {
      const version = await this.run('python setup.py --version', { cwd: this.root, quiet: true });
      // setup.py may print warnings before the version
      return version.split('\n').pop()?.trim() || null;
    }

    return null;
  }
}

/**
 * Create a PythonManifest if setup.py or pyproject.toml exists
 */
export async function createPythonManifest(
  run: Runner,
  root: string = process.cwd(),
): Promise<PythonManifest | null> {
  const manifest = new PythonManifest(run, root);
  if (await manifest.exists()) {
    return manifest;
  }
  return null;
}
