import type { ReleaseType } from '@/types';
import { RELEASE_TYPE, VERSION_TAG_PREFIX, VERSION_TAG_REGEX } from '@/utils/constants';

/**
 * Parses a `#.#.#` or `v#.#.#` version string into its numeric components.
 *
 * @param {string} version - The version to parse
 * @param {RegExp} pattern - Pattern capturing major, minor and patch; pass `VERSION_REGEX` to refuse the `v` prefix
 * @returns {[number, number, number]} Major, minor and patch
 * @throws {TypeError} If the string is not a plain semantic version or a component is not a safe integer
 */
export function parseVersion(version: string, pattern: RegExp = VERSION_TAG_REGEX): [number, number, number] {
  const match = pattern.exec(version.trim());
  if (!match) {
    throw new TypeError(`Invalid version '${version}'. Expected format #.#.# (e.g. 1.2.3)`);
  }

  const semver: [number, number, number] = [Number(match[1]), Number(match[2]), Number(match[3])];
  if (!semver.every((part) => Number.isSafeInteger(part))) {
    throw new TypeError(`Invalid version '${version}'. Components must not exceed ${Number.MAX_SAFE_INTEGER}`);
  }

  return semver;
}

/**
 * Computes the next version based on the current version and the specified release type.
 *
 * This function increments the version based on semantic versioning rules:
 * - If the release type is 'major', it increments the major version and resets the minor and patch versions.
 * - If the release type is 'minor', it increments the minor version and resets the patch version.
 * - If the release type is 'patch', it increments the patch version.
 *
 * Note: A leading 'v' on the input is accepted, but the result never carries one.
 * Use {@link formatVersionTag} to form the tag.
 *
 * @param {string} currentVersion - The current version, e.g. `1.2.3`
 * @param {ReleaseType} releaseType - The type of release to be performed ('major', 'minor', or 'patch').
 * @returns {string} The next version in the format 'X.Y.Z'.
 */
export function getNextVersion(currentVersion: string, releaseType: ReleaseType): string {
  const semver = parseVersion(currentVersion);
  if (releaseType === RELEASE_TYPE.MAJOR) {
    semver[0]++;
    semver[1] = 0;
    semver[2] = 0;
  } else if (releaseType === RELEASE_TYPE.MINOR) {
    semver[1]++;
    semver[2] = 0;
  } else {
    semver[2]++;
  }
  return semver.join('.');
}

/**
 * Forms the git tag for a version (e.g. `1.2.3` → `v1.2.3`).
 */
export function formatVersionTag(version: string): string {
  return `${VERSION_TAG_PREFIX}${version.replace(/^v/, '')}`;
}
