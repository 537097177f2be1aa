import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { pathExists } from 'fs-extra/esm';
import type { Manifest } from './interface.ts';
import { ReleaseError } from '../lib/error.ts';

/**
 * The package.json fields release-helper cares about.
 */
export interface PackageJson {
  name: string;
  version: string;
  private: boolean;
  /** Workspace glob patterns, from either `workspaces` or `workspaces.packages` */
  workspaces: string[];
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/**
 * Pick the known fields out of parsed package.json content.
 */
export function parsePackageJson(content: string, source = 'package.json'): PackageJson {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new ReleaseError(`Invalid ${source}: not valid JSON`, 'MANIFEST_PARSE_ERROR', { source });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ReleaseError(`Invalid ${source}: expected an object`, 'MANIFEST_PARSE_ERROR', {
      source,
    });
  }

  const data = new Map(Object.entries(parsed));
  const name = data.get('name');
  const version = data.get('version');
  const workspaces = data.get('workspaces');

  return {
    name: typeof name === 'string' ? name : '',
    version: typeof version === 'string' ? version : '',
    private: data.get('private') === true,
    workspaces: Array.isArray(workspaces)
      ? stringList(workspaces)
      : typeof workspaces === 'object' && workspaces !== null
      ? stringList(Reflect.get(workspaces, 'packages'))
      : [],
  };
}

/**
 * Manifest handler for package.json files.
 */
export class NodeManifest implements Manifest {
  readonly type = 'node';
  readonly path = 'package.json';
  private readonly root: string;

  constructor(root: string = process.cwd()) {
    this.root = root;
  }

  private get fullPath(): string {
    return join(this.root, this.path);
  }

  async exists(): Promise<boolean> {
    return await pathExists(this.fullPath);
  }

  /**
   * Read and parse package.json, null if it does not exist.
   */
  async read(): Promise<PackageJson | null> {
    if (!(await this.exists())) return null;
    return parsePackageJson(await readFile(this.fullPath, 'utf8'), this.fullPath);
  }

  async getVersion(): Promise<string | null> {
    const data = await this.read();
    return data?.version || null;
  }

  /**
   * Get workspace member patterns if this is a workspace root
   */
  async getWorkspaceMembers(): Promise<string[]> {
    return (await this.read())?.workspaces ?? [];
  }
}

/**
 * Create a NodeManifest if package.json exists
 */
export async function createNodeManifest(root: string = process.cwd()): Promise<NodeManifest | null> {
  const manifest = new NodeManifest(root);
  if (await manifest.exists()) {
    return manifest;
  }
  return null;
}
