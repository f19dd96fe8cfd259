/**
 * Package version validation
 *
 * Versions are opaque and only ever compared for equality, but a requested
 * version ends up in a file name and a URL, so it is restricted to the
 * characters a Debian version may contain.
 */

import { z } from 'zod';
import { ARCHIVE_ARCH } from '../constants.js';
import { InvalidVersionError } from '../errors.js';

export const PACKAGE_VERSION_PATTERN = /^[A-Za-z0-9][A-Za-z0-9.+~:-]*$/;

export const PackageVersionSchema = z
  .string()
  .min(1)
  .max(128)
  .regex(PACKAGE_VERSION_PATTERN, 'Version may only contain letters, digits and the characters . + ~ : -');

/** Debian archive file names never carry the epoch */
export function stripEpoch(version: string): string {
  return version.replace(/^\d+:/, '');
}

/**
 * Archive file name for one version of a package, e.g. `jenkins_2.440.1_all.deb`
 */
export function archiveFileName(packageName: string, version: string, arch: string = ARCHIVE_ARCH): string {
  return `${packageName}_${stripEpoch(version)}_${arch}.deb`;
}

/**
 * Validate a requested version, throwing InvalidVersionError when it is not
 * an acceptable token
 */
export function parsePackageVersion(version: string): string {
  const parsed = PackageVersionSchema.safeParse(version);
  if (!parsed.success) {
    throw new InvalidVersionError(version, parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}
