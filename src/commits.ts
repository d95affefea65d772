import { Commit } from '@/commit';
import { context } from '@/context';
import { debug, endGroup, info, startGroup } from '@actions/core';
import type { RestEndpointMethodTypes } from '@octokit/plugin-rest-endpoint-methods';
import { RequestError } from '@octokit/request-error';

type ListCommitsParams = Omit<RestEndpointMethodTypes['repos']['listCommits']['parameters'], 'owner' | 'repo' | 'sha'>;

/**
 * Options for {@link getCommitsSinceTag}.
 */
export interface GetCommitsSinceTagOptions {
  /**
   * Stop collecting once this many commits have been gathered. Callers that enforce a cap of `n`
   * pass `n + 1` so that exceeding the cap is detectable without walking the whole history.
   */
  limit?: number;

  /**
   * Additional request parameters such as `per_page`.
   */
  request?: ListCommitsParams;
}

/**
 * Lists the commits reachable from `headSha`, newest first, up to (and excluding) `tagSha`.
 *
 * History is paged through `GET /repos/{owner}/{repo}/commits?sha=<headSha>` and iteration stops
 * as soon as the tag commit or the limit is reached, so no further pages are requested.
 *
 * @param {string} headSha - The commit to walk back from
 * @param {string} tagSha - The commit of the current release tag
 * @param {GetCommitsSinceTagOptions} options - Optional limit and request parameters
 * @returns {Promise<Commit[]>} The commits since the tag
 * @throws {Error} If the API request fails
 */
export async function getCommitsSinceTag(
  headSha: string,
  tagSha: string,
  options: GetCommitsSinceTagOptions = {},
): Promise<Commit[]> {
  const { limit = Number.POSITIVE_INFINITY, request = { per_page: 100 } } = options;

  console.time('Elapsed time fetching commits');
  startGroup('Fetching commits since the last release');

  try {
    const {
      octokit,
      repo: { owner, repo },
    } = context;

    const commits: Commit[] = [];
    let totalRequests = 0;
    let reachedTag = false;

    const iterator = octokit.paginate.iterator(octokit.rest.repos.listCommits, {
      ...request,
      owner,
      repo,
      sha: headSha,
    });

    pages: for await (const { data } of iterator) {
      totalRequests++;

      for (const item of data) {
        if (item.sha === tagSha) {
          reachedTag = true;
          break pages;
        }

        const commit = new Commit(item.sha, item.commit.message);
        commits.push(commit);
        info(`- ${commit}`);

        if (commits.length >= limit) {
          break pages;
        }
      }
    }

    debug(`Total page requests: ${totalRequests}`);
    if (!reachedTag && commits.length < limit) {
      info(`Tag commit ${tagSha} was not found in the history of ${headSha}.`);
    }
    info(`Found ${commits.length} commit${commits.length !== 1 ? 's' : ''} since the last release.`);

    return commits;
  } catch (error) {
    let errorMessage: string;
    if (error instanceof RequestError) {
      errorMessage = `Failed to fetch commits: ${error.message.trim()} (status: ${error.status})`;
    } else if (error instanceof Error) {
      errorMessage = `Failed to fetch commits: ${error.message.trim()}`;
    } else {
      errorMessage = String(error).trim();
    }

    throw new Error(errorMessage, { cause: error });
  } finally {
    console.timeEnd('Elapsed time fetching commits');
    endGroup();
  }
}
