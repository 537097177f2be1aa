export type { Manifest, ManifestInfo } from './interface.ts';
export { createNodeManifest, NodeManifest, parsePackageJson } from './node.ts';
export type { PackageJson } from './node.ts';
export { createPythonManifest, PythonManifest, pyprojectVersion } from './python.ts';
export { detectManifests, detectWorkspace, getManifestInfo, getVersion } from './factory.ts';
export type { WorkspaceMember } from './factory.ts';
