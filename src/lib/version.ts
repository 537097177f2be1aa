/**
 * Version string helpers.
 *
 * Versions come from whatever tool the project bumps with, so these
 * accept both npm (semver) and Python (PEP 440) spellings.
 */

import { ReleaseError } from './error.ts';

const FINAL_REGEX = /^(\d+\.\d+\.\d+)/;
// Final and post releases, any number of release segments
const RELEASE_REGEX = /^\d+(\.\d+)*(\.post\d+)?$/;

// Canonical public version, PEP 440 appendix B
const PEP440_CANONICAL_REGEX =
  /^([1-9][0-9]*!)?(0|[1-9][0-9]*)(\.(0|[1-9][0-9]*))*((a|b|rc)(0|[1-9][0-9]*))?(\.post(0|[1-9][0-9]*))?(\.dev(0|[1-9][0-9]*))?$/;

/**
 * Get the final release part of a version.
 * 1.0.3a4 → 1.0.3, 2.0.0-beta.1 → 2.0.0
 */
export function getBase(version: string): string {
  const match = version.match(FINAL_REGEX);
  if (!match) {
    throw new ReleaseError(
      `Invalid version: ${version}`,
      'INVALID_VERSION',
      { version },
    );
  }
  return match[1];
}

/**
 * Whether a version is a pre-release (alpha, beta, rc, dev, or an npm
 * `-` suffix). `2.0` and `1.0.post1` are final.
 */
export function isPrerelease(version: string): boolean {
  if (!/^\d/.test(version)) {
    throw new ReleaseError(
      `Invalid version: ${version}`,
      'INVALID_VERSION',
      { version },
    );
  }
  return !RELEASE_REGEX.test(version);
}

/**
 * Whether a version is in canonical PEP 440 form.
 */
export function isCanonical(version: string): boolean {
  return PEP440_CANONICAL_REGEX.test(version);
}

/**
 * Tag name for a release version.
 */
export function tagName(version: string): string {
  return `v${version}`;
}
