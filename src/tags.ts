import { setTimeout as sleep } from 'node:timers/promises';
import { context } from '@/context';
import { debug, endGroup, info, startGroup, warning } from '@actions/core';
import type { RestEndpointMethodTypes } from '@octokit/plugin-rest-endpoint-methods';
import { RequestError } from '@octokit/request-error';

type ListTagsParams = Omit<RestEndpointMethodTypes['repos']['listTags']['parameters'], 'owner' | 'repo'>;

/**
 * Fetches all tags from the repository.
 *
 * This function utilizes pagination to retrieve all tags, returning them as an array of strings.
 *
 * @param {ListTagsParams} options - Optional request parameters such as `per_page`
 * @returns {Promise<string[]>} A promise that resolves to an array of tag names.
 * @throws {Error} Throws an error if the request to fetch tags fails.
 */
export async function getAllTags(options: ListTagsParams = { per_page: 100 }): Promise<string[]> {
  try {
    const {
      octokit,
      repo: { owner, repo },
    } = context;

    const tags: string[] = [];
    let totalRequests = 0;

    for await (const response of octokit.paginate.iterator(octokit.rest.repos.listTags, {
      ...options,
      owner,
      repo,
    })) {
      totalRequests++;
      for (const tag of response.data) {
        tags.push(tag.name);
      }
    }

    debug(`Total page requests: ${totalRequests}`);
    debug(`Found ${tags.length} tag${tags.length !== 1 ? 's' : ''}: ${JSON.stringify(tags)}`);

    return tags;
  } catch (error) {
    let errorMessage: string;
    if (error instanceof RequestError) {
      errorMessage = `Failed to fetch tags: ${error.message.trim()} (status: ${error.status})`;
    } else if (error instanceof Error) {
      errorMessage = `Failed to fetch tags: ${error.message.trim()}`;
    } else {
      errorMessage = String(error).trim();
    }

    throw new Error(errorMessage, { cause: error });
  }
}

/**
 * Waits until a freshly pushed tag is listed by the API.
 *
 * The tag list is queried up to `attempts` times with a fixed `delayMs` pause between queries.
 * Running out of attempts is not an error: the caller publishes the release regardless.
 *
 * @param {string} tag - The tag to look for, e.g. `v1.3.0`
 * @param {number} attempts - Maximum number of queries
 * @param {number} delayMs - Pause between queries in milliseconds
 * @returns {Promise<boolean>} Whether the tag was seen
 */
export async function waitForTag(tag: string, attempts: number, delayMs: number): Promise<boolean> {
  console.time('Elapsed time waiting for tag');
  startGroup(`Waiting for tag ${tag}`);

  try {
    for (let attempt = 1; attempt <= attempts; attempt++) {
      const tags = await getAllTags();
      if (tags.includes(tag)) {
        info(`Tag ${tag} is visible (attempt ${attempt} of ${attempts}).`);
        return true;
      }

      info(`Tag ${tag} not visible yet (attempt ${attempt} of ${attempts}).`);
      if (attempt < attempts) {
        await sleep(delayMs);
      }
    }

    warning(`Tag ${tag} was not visible after ${attempts} attempt${attempts !== 1 ? 's' : ''}. Continuing.`);
    return false;
  } finally {
    console.timeEnd('Elapsed time waiting for tag');
    endGroup();
  }
}
