import { config } from '@/config';
import { getOriginUrl } from '@/git';
import type { Context, Repo } from '@/types';
import { DEFAULT_API_URL, DEFAULT_SERVER_URL } from '@/utils/constants';
import { endGroup, info, startGroup } from '@actions/core';
import { Octokit } from '@octokit/core';
import { paginateRest } from '@octokit/plugin-paginate-rest';
import { restEndpointMethods } from '@octokit/plugin-rest-endpoint-methods';
import { name, version } from '../package.json';

// The context object will be initialized lazily
let contextInstance: Context | null = null;

/**
 * Extracts the owner and repository name from a git remote URL.
 *
 * Handles both scp-like SSH remotes and URL remotes:
 * - `git@github.com:octo-org/octo-repo.git`
 * - `https://github.com/octo-org/octo-repo.git`
 * - `ssh://git@github.com/octo-org/octo-repo`
 *
 * @param {string} remoteUrl - The remote URL
 * @returns {Repo | null} The repository, or `null` if the URL has no `owner/repo` path
 */
export function parseRepositoryFromRemoteUrl(remoteUrl: string): Repo | null {
  const match = /[:/]([^/:]+)\/([^/]+?)(?:\.git)?\/?$/.exec(remoteUrl.trim());
  if (!match) {
    return null;
  }

  return { owner: match[1], repo: match[2] };
}

/**
 * Determines the repository from `GITHUB_REPOSITORY`, falling back to the `origin` remote of the
 * checkout when running outside of a workflow.
 */
function resolveRepository(workspaceDir: string): Repo {
  const repository = process.env.GITHUB_REPOSITORY;
  if (repository) {
    const [owner, repo] = repository.split('/');
    if (!owner || !repo) {
      throw new Error(`GITHUB_REPOSITORY must be in the form owner/repo. Got: '${repository}'`);
    }
    return { owner, repo };
  }

  const originUrl = getOriginUrl(workspaceDir);
  const parsed = parseRepositoryFromRemoteUrl(originUrl);
  if (!parsed) {
    throw new Error(
      `Unable to determine the repository: GITHUB_REPOSITORY is not set and the origin remote '${originUrl}' is not a recognizable repository URL`,
    );
  }

  return parsed;
}

/**
 * Clears the cached context instance during testing.
 *
 * Resets the singleton so the next access rebuilds it from the environment. Only has an effect
 * when NODE_ENV is 'test'.
 */
export function clearContextForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    contextInstance = null;
  }
}

/**
 * Lazily initializes the context object that contains the repository details and API client.
 * The context is only created once and reused for subsequent calls.
 *
 * @returns {Context} The context object containing the GitHub client and repository information.
 * @throws {Error} If the repository cannot be determined.
 */
function initializeContext(): Context {
  if (contextInstance) {
    return contextInstance;
  }

  try {
    startGroup('Initializing Context');

    const workspaceDir = process.env.GITHUB_WORKSPACE || process.cwd();
    const serverUrl = process.env.GITHUB_SERVER_URL || DEFAULT_SERVER_URL;
    const apiUrl = process.env.GITHUB_API_URL || DEFAULT_API_URL;
    const { owner, repo } = resolveRepository(workspaceDir);

    // Extend Octokit with REST API methods and pagination support using the plugins
    const OctokitRestApi = Octokit.plugin(restEndpointMethods, paginateRest);

    contextInstance = {
      repo: { owner, repo },
      repoUrl: `${serverUrl}/${owner}/${repo}`,
      octokit: new OctokitRestApi({
        auth: `token ${config.githubToken}`,
        baseUrl: apiUrl,
        userAgent: `[octokit] ${name}/${version}`,
      }),
      workspaceDir,
    };

    info(`Repository: ${contextInstance.repo.owner}/${contextInstance.repo.repo}`);
    info(`Repository URL: ${contextInstance.repoUrl}`);
    info(`API URL: ${apiUrl}`);
    info(`Workspace Directory: ${contextInstance.workspaceDir}`);

    return contextInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the context that initializes on first use
export const getContext = (): Context => {
  return initializeContext();
};

export const context: Context = new Proxy({} as Context, {
  get(_target, prop) {
    return getContext()[prop as keyof Context];
  },
});
