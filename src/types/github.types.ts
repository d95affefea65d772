import type { PaginateInterface } from '@octokit/plugin-paginate-rest';
import type { Api } from '@octokit/plugin-rest-endpoint-methods';

/**
 * GitHub API and repository related types
 */

/**
 * Custom type that extends Octokit with pagination support
 */
export type OctokitRestApi = Api & { paginate: PaginateInterface };

/**
 * GitHub release information
 */
export interface GitHubRelease {
  /**
   * The release ID
   */
  id: number;

  /**
   * The title of the release.
   */
  title: string;

  /**
   * The body content of the release.
   */
  body: string;

  /**
   * The tag name associated with this release. E.g. `v1.2.0`
   */
  tagName: string;
}

/**
 * Interface representing the repository structure of a GitHub repo in the form of the owner and name.
 */
export interface Repo {
  /**
   * The owner of the repository, typically a GitHub user or an organization.
   */
  owner: string;

  /**
   * The name of the repository.
   */
  repo: string;
}
