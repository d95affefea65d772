import { generateChangelog, renderMarkdownChangelog } from '@/changelog';
import { createCommitParser, evaluateVersionBump } from '@/commit-analyzer';
import { getCommitsSinceTag } from '@/commits';
import { getConfig } from '@/config';
import { getContext } from '@/context';
import {
  commitAndTagVersion,
  describeNearestVersion,
  ensureGitIdentity,
  getHeadCommitHash,
  getTagCommitHash,
  pushWithTags,
} from '@/git';
import { createRelease } from '@/releases';
import { formatVersionTag, getNextVersion } from '@/semver';
import { waitForTag } from '@/tags';
import type { Config, Context, ReleaseType } from '@/types';
import { shortSha } from '@/utils/string';
import { readVersionFile, writeVersionFile } from '@/version-file';
import { endGroup, info, setFailed, setOutput, startGroup, warning } from '@actions/core';

/**
 * Summary of a release run, exposed as action outputs.
 */
interface ReleaseOutputs {
  released: boolean;
  currentVersion: string;
  version: string;
  tag: string;
  releaseType: ReleaseType | null;
  changelog: string;
}

/**
 * Initializes and returns the configuration and context objects.
 * Config must be initialized before context due to dependency constraints.
 *
 * @returns {{ config: Config; context: Context }} Initialized config and context objects.
 */
function initialize(): { config: Config; context: Context } {
  const configInstance = getConfig();
  const contextInstance = getContext();

  return { config: configInstance, context: contextInstance };
}

/**
 * Sets action outputs describing the outcome of the run so that later workflow steps can use the
 * new version and its release notes.
 *
 * - `released`: whether a tag and release were created
 * - `current-version`: the version read from the version file
 * - `version` / `tag`: the released version and tag, or the current ones when nothing was released
 * - `release-type`: major, minor or patch; empty when nothing was released
 * - `changelog`: the rendered Markdown release notes; empty when nothing was released
 */
function setActionOutputs(outputs: ReleaseOutputs): void {
  startGroup('Action Outputs');
  info(JSON.stringify(outputs, null, 2));
  endGroup();

  setOutput('released', outputs.released);
  setOutput('current-version', outputs.currentVersion);
  setOutput('version', outputs.version);
  setOutput('tag', outputs.tag);
  setOutput('release-type', outputs.releaseType ?? '');
  setOutput('changelog', outputs.changelog);
}

/**
 * Warns when the nearest version tag in the checkout disagrees with the version file. The version
 * file stays authoritative; a mismatch usually means the checkout is shallow or a release was
 * tagged by hand.
 */
function checkNearestTag(currentVersion: string): void {
  let nearestVersion: string | null;
  try {
    nearestVersion = describeNearestVersion();
  } catch (error) {
    warning(`Unable to describe the nearest tag: ${error instanceof Error ? error.message : String(error)}`);
    return;
  }

  if (nearestVersion !== currentVersion) {
    warning(
      `Nearest version tag (${nearestVersion === null ? 'none' : formatVersionTag(nearestVersion)}) does not match the version file (${currentVersion}).`,
    );
  }
}

/**
 * Executes the release process.
 *
 * 1. Reads the current version and resolves its tag and HEAD to commits
 * 2. Collects the commits in between, failing if there are more than `max-commits`
 * 3. Derives the release type from the conventional commit messages; stops if there is none
 * 4. Computes the next version and renders the changelog
 * 5. Writes the version file, commits, tags and pushes
 * 6. Waits for the tag to show up in the API and publishes the release
 *
 * Nothing is written before step 5, and nothing is rolled back if a later step fails.
 *
 * @returns {Promise<void>} A promise that resolves when the process completes
 * @throws Will capture and report any errors through setFailed
 */
export async function run(): Promise<void> {
  try {
    const { config } = initialize();

    const currentVersion = readVersionFile();
    const currentTag = formatVersionTag(currentVersion);

    const tagSha = getTagCommitHash(currentTag);
    info(`Current version: ${currentVersion} [${shortSha(tagSha)}]`);
    checkNearestTag(currentVersion);

    const headSha = getHeadCommitHash();
    info(`HEAD: ${headSha}`);

    const commits = await getCommitsSinceTag(headSha, tagSha, { limit: config.maxCommits + 1 });
    if (commits.length > config.maxCommits) {
      setFailed(
        `More than ${config.maxCommits} commits since ${currentTag}. Aborting! Check that ${currentTag} points to the last release.`,
      );
      return;
    }

    const parser = createCommitParser(config);
    const releaseType = evaluateVersionBump(commits, parser);
    info(`Release type: ${releaseType ?? 'none'}`);

    if (releaseType === null) {
      info('No release-worthy commits since the last release. Nothing to do.');
      setActionOutputs({
        released: false,
        currentVersion,
        version: currentVersion,
        tag: currentTag,
        releaseType: null,
        changelog: '',
      });
      return;
    }

    const nextVersion = getNextVersion(currentVersion, releaseType);
    const nextTag = formatVersionTag(nextVersion);
    info(`Next version: ${nextVersion}`);

    const changelog = renderMarkdownChangelog(nextVersion, generateChangelog(commits, parser), { header: true });
    startGroup('Changelog');
    info(changelog);
    endGroup();

    if (config.dryRun) {
      info(`Dry run: skipping version file update, tag ${nextTag} and release.`);
      setActionOutputs({ released: false, currentVersion, version: nextVersion, tag: nextTag, releaseType, changelog });
      return;
    }

    const versionFilePath = writeVersionFile(nextVersion);
    ensureGitIdentity();
    commitAndTagVersion(versionFilePath, nextTag);
    pushWithTags();

    await waitForTag(nextTag, config.tagPollAttempts, config.tagPollDelayMs);
    await createRelease(nextTag, changelog);

    setActionOutputs({ released: true, currentVersion, version: nextVersion, tag: nextTag, releaseType, changelog });
  } catch (error) {
    if (error instanceof Error) {
      setFailed(error.message);
    } else {
      setFailed(String(error));
    }
  }
}
