/**
 * Configuration related types
 */

/**
 * Configuration interface used for defining key action input configuration.
 */
export interface Config {
  /**
   * The GitHub token used for API authentication. When the `github_token` input is empty the
   * `GH_TOKEN` and then `GITHUB_TOKEN` environment variables are used instead.
   */
  githubToken: string;

  /**
   * Path (relative to the workspace directory) of the plain-text file holding the current
   * version, e.g. `version_number` containing `1.2.3`.
   */
  versionFile: string;

  /**
   * Upper bound on the number of commits between the current tag and HEAD. A run that finds
   * more commits than this fails before changing anything, since it usually means the tag
   * pointer is wrong.
   */
  maxCommits: number;

  /**
   * How many times the tag list is queried while waiting for a freshly pushed tag to show up
   * in the API before the release is created.
   */
  tagPollAttempts: number;

  /**
   * Fixed delay in milliseconds between tag visibility queries.
   */
  tagPollDelayMs: number;

  /**
   * Commit types that the parser accepts. Commits with any other type are ignored for both the
   * version bump and the changelog.
   */
  allowedTypes: string[];

  /**
   * Commit types that trigger at least a minor release.
   */
  minorTypes: string[];

  /**
   * Commit types that trigger at least a patch release.
   */
  patchTypes: string[];

  /**
   * When true the release plan is computed and logged but nothing is written, tagged, pushed
   * or published.
   */
  dryRun: boolean;
}
