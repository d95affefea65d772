import { context } from '@/context';
import type { GitHubRelease } from '@/types';
import { endGroup, info, startGroup } from '@actions/core';
import { RequestError } from '@octokit/request-error';

/**
 * Publishes a GitHub release for an existing tag.
 *
 * Note: Requires GitHub action permissions > contents: write
 *
 * @param {string} tag - The tag to release, e.g. `v1.3.0`. Also used as the release title.
 * @param {string} body - The release notes (Markdown)
 * @returns {Promise<GitHubRelease>} The created release
 * @throws {Error} If the release could not be created
 */
export async function createRelease(tag: string, body: string): Promise<GitHubRelease> {
  console.time('Elapsed time creating release');
  startGroup(`Creating release ${tag}`);

  const {
    octokit,
    repo: { owner, repo },
  } = context;

  try {
    const response = await octokit.rest.repos.createRelease({
      owner,
      repo,
      tag_name: tag,
      name: tag,
      body,
      draft: false,
      prerelease: false,
    });

    info(`Created release ${tag}: ${response.data.html_url}`);

    return {
      id: response.data.id,
      title: tag,
      body,
      tagName: tag,
    };
  } catch (error) {
    if (error instanceof RequestError && error.status === 403) {
      throw new Error(
        [
          `Failed to create release ${tag}: ${error.message}.\nEnsure that the`,
          'GitHub Actions workflow has the correct permissions to create releases by ensuring that',
          'your workflow YAML file has the following block under "permissions":\n\npermissions:\n',
          ' contents: write',
        ].join(' '),
        { cause: error },
      );
    }

    const status = error instanceof RequestError ? ` [Status = ${error.status}]` : '';
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to create release ${tag}:${status} ${message}`, { cause: error });
  } finally {
    console.timeEnd('Elapsed time creating release');
    endGroup();
  }
}
