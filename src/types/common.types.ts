import type { RELEASE_TYPE } from '@/utils/constants';

/**
 * Common types used across the application
 */

/**
 * Represents the semantic release type associated with a release.
 *
 * This type is derived from the `RELEASE_TYPE` constant object,
 * ensuring that only valid predefined release types can be used.
 *
 * @see {@link RELEASE_TYPE} for the available release type values
 */
export type ReleaseType = (typeof RELEASE_TYPE)[keyof typeof RELEASE_TYPE];

/**
 * Numeric severity of a version bump. The built-in parser only yields the values of
 * `BUMP_SEVERITY`; a custom parser may yield any integer.
 */
export type BumpSeverity = number;
