import type { OctokitRestApi, Repo } from '@/types/github.types';

/**
 * Context and runtime related types
 */

/**
 * Interface representing the context required by the release run.
 * It contains the necessary GitHub API client and repository details.
 */
export interface Context {
  /**
   * The repository details (owner and name).
   */
  repo: Repo;

  /**
   * The URL of the repository. (e.g. https://github.com/octo-org/octo-repo)
   */
  repoUrl: string;

  /**
   * An instance of the Octokit class with REST API and pagination plugins enabled.
   * This instance is authenticated using a GitHub token and is used to interact with GitHub's API.
   */
  octokit: OctokitRestApi;

  /**
   * The directory where the repository is checked out. Git commands run here and the
   * version file path is resolved against it.
   */
  workspaceDir: string;
}
