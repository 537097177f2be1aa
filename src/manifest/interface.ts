/**
 * Manifest interface for reading package versions from project files.
 *
 * Implementations handle specific project types:
 * - package.json (npm)
 * - pyproject.toml / setup.py (Python)
 *
 * Versions are only read here; writing them is the job of the project's
 * own version tool (tbump, bump2version, npm version).
 */
export interface Manifest {
  /** Unique identifier for this manifest type */
  readonly type: 'node' | 'python';

  /** File path relative to project root */
  readonly path: string;

  /** Check if this manifest file exists */
  exists(): Promise<boolean>;

  /** Read current version from manifest, null if not set */
  getVersion(): Promise<string | null>;
}

/**
 * Result of manifest detection
 */
export interface ManifestInfo {
  type: Manifest['type'];
  path: string;
  version: string | null;
}
