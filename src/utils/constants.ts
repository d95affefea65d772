/**
 * Regular expression that matches version strings in the format of semantic versioning.
 * This regex validates version strings like "1.2.3" or "v1.2.3" and includes capture groups.
 * Group 1: Major version number
 * Group 2: Minor version number
 * Group 3: Patch version number
 */
export const VERSION_TAG_REGEX = /^v?(\d+)\.(\d+)\.(\d+)$/;

/**
 * Same as {@link VERSION_TAG_REGEX} without the optional `v` prefix, as stored in the version file.
 */
export const VERSION_REGEX = /^(\d+)\.(\d+)\.(\d+)$/;

/**
 * Prefix prepended to every version to form its git tag (e.g. `1.2.3` → `v1.2.3`).
 */
export const VERSION_TAG_PREFIX = 'v';

/**
 * Release type constants for semantic versioning
 */
export const RELEASE_TYPE = {
  MAJOR: 'major',
  MINOR: 'minor',
  PATCH: 'patch',
} as const;

/**
 * Numeric bump severities produced by the commit parser. Higher is more impactful.
 */
export const BUMP_SEVERITY = {
  NONE: 0,
  PATCH: 1,
  MINOR: 2,
  MAJOR: 3,
} as const;

/**
 * Maps a bump severity to the semver component it increments. Severities missing from this
 * table (including `BUMP_SEVERITY.NONE`) never produce a release.
 */
export const BUMP_LEVELS: Readonly<Record<number, (typeof RELEASE_TYPE)[keyof typeof RELEASE_TYPE]>> = {
  [BUMP_SEVERITY.PATCH]: RELEASE_TYPE.PATCH,
  [BUMP_SEVERITY.MINOR]: RELEASE_TYPE.MINOR,
  [BUMP_SEVERITY.MAJOR]: RELEASE_TYPE.MAJOR,
};

/**
 * Changelog section that collects breaking-change notes. Always present in a changelog index.
 */
export const BREAKING_SECTION = 'breaking';

/**
 * Commit types recognized by the Angular commit convention.
 */
export const DEFAULT_ALLOWED_TYPES = ['feat', 'fix', 'test', 'docs', 'style', 'refactor', 'build', 'ci', 'perf', 'chore'];
export const DEFAULT_MINOR_TYPES = ['feat'];
export const DEFAULT_PATCH_TYPES = ['fix', 'perf'];

export const GITHUB_ACTIONS_BOT_NAME = 'GitHub Actions';
export const GITHUB_ACTIONS_BOT_EMAIL = '41898282+github-actions[bot]@users.noreply.github.com';

export const DEFAULT_SERVER_URL = 'https://github.com';
export const DEFAULT_API_URL = 'https://api.github.com';
