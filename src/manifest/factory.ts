import { relative } from 'node:path';
import fg from 'fast-glob';
import type { Manifest, ManifestInfo } from './interface.ts';
import { createNodeManifest, NodeManifest } from './node.ts';
import { createPythonManifest } from './python.ts';
import type { Runner } from '../clients/shell.ts';
import { ReleaseError } from '../lib/error.ts';

/**
 * Detect all manifests in a directory (for projects with both a Python
 * package and package.json)
 */
export async function detectManifests(run: Runner, root: string = process.cwd()): Promise<Manifest[]> {
  const manifests: Manifest[] = [];

  const python = await createPythonManifest(run, root);
  if (python) manifests.push(python);

  const node = await createNodeManifest(root);
  if (node) manifests.push(node);

  return manifests;
}

/**
 * Get info about all detected manifests
 */
export async function getManifestInfo(run: Runner, root: string = process.cwd()): Promise<ManifestInfo[]> {
  const info: ManifestInfo[] = [];

  for (const m of await detectManifests(run, root)) {
    info.push({
      type: m.type,
      path: m.path,
      version: await m.getVersion(),
    });
  }

  return info;
}

/**
 * Current package version. The Python package wins when a project has
 * both, since the npm packages of such projects are versioned separately.
 */
export async function getVersion(run: Runner, root: string = process.cwd()): Promise<string> {
  for (const manifest of await detectManifests(run, root)) {
    const version = await manifest.getVersion();
    if (version) return version;
  }

  throw new ReleaseError(
    'No version identifier could be found',
    'NO_VERSION',
    { root },
  );
}

/**
 * Workspace member with its manifest
 */
export interface WorkspaceMember {
  /** Path relative to the workspace root */
  path: string;
  manifest: NodeManifest;
}

/**
 * Resolve npm workspace members from the root package.json patterns
 */
export async function detectWorkspace(root: string = process.cwd()): Promise<WorkspaceMember[]> {
  const rootManifest = await createNodeManifest(root);
  if (!rootManifest) return [];

  const patterns = await rootManifest.getWorkspaceMembers();
  if (patterns.length === 0) return [];

  const dirs = await fg(patterns, {
    cwd: root,
    onlyDirectories: true,
    absolute: true,
    ignore: ['**/node_modules/**'],
  });

  const members: WorkspaceMember[] = [];
  for (const dir of [...dirs].sort()) {
    const manifest = await createNodeManifest(dir);
    if (manifest) {
      members.push({ path: relative(root, dir) || '.', manifest });
    }
  }
  return members;
}
