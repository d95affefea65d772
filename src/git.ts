import { execFileSync } from 'node:child_process';
import { context } from '@/context';
import type { ExecSyncError } from '@/types';
import { GITHUB_ACTIONS_BOT_EMAIL, GITHUB_ACTIONS_BOT_NAME } from '@/utils/constants';
import { debug, info } from '@actions/core';
import which from 'which';

/**
 * Narrows an unknown thrown value to the error `execFileSync` raises for a failed command.
 */
function isExecSyncError(error: unknown): error is ExecSyncError {
  return error instanceof Error && 'status' in error && 'stderr' in error;
}

/**
 * Runs a git command in the workspace directory and returns its trimmed standard output.
 *
 * @param {string[]} args - Arguments passed to git
 * @param {string} cwd - Working directory, defaults to the workspace directory
 * @returns {string} The trimmed stdout
 * @throws {Error} When git exits non-zero; the message includes the command and its stderr
 */
function git(args: string[], cwd: string = context.workspaceDir): string {
  const gitPath = which.sync('git');
  debug(`git ${args.join(' ')}`);

  try {
    const output = execFileSync(gitPath, args, { cwd, encoding: 'utf8' });
    return output.trim();
  } catch (error) {
    const stderr = isExecSyncError(error) ? error.stderr.toString().trim() : '';
    const reason = stderr || (error instanceof Error ? error.message : String(error));
    throw new Error(`Command failed: git ${args.join(' ')}\n${reason}`, { cause: error });
  }
}

/**
 * Finds the version of the nearest reachable `v#.#.#` tag using `git describe`.
 *
 * @returns {string | null} The version without prefix, or `null` if the nearest tag is not a version tag
 */
export function describeNearestVersion(): string | null {
  const [raw] = git(['describe', '--tags']).split('-');
  const match = /^v(\d+\.\d+\.\d+)/.exec(raw);

  return match ? match[1] : null;
}

/**
 * Resolves a tag to the SHA of the commit it points to.
 */
export function getTagCommitHash(tag: string): string {
  return git(['rev-list', '-n', '1', tag]);
}

/**
 * Resolves HEAD to a commit SHA.
 */
export function getHeadCommitHash(): string {
  return git(['rev-parse', 'HEAD']);
}

/**
 * Returns the fetch URL of the `origin` remote.
 *
 * Takes an explicit directory because it is also used while the context is being initialized.
 */
export function getOriginUrl(cwd: string): string {
  return git(['remote', 'get-url', 'origin'], cwd);
}

/**
 * Sets a local committer identity when the checkout has none, so the version bump commit can be
 * created on a fresh CI runner.
 */
export function ensureGitIdentity(): void {
  try {
    git(['config', 'user.email']);
    return;
  } catch (error) {
    // `git config <key>` exits with status 1 when the key is unset; anything else is a real failure.
    if (!(error instanceof Error && isExecSyncError(error.cause) && error.cause.status === 1)) {
      throw error;
    }
  }

  info(`Using committer identity ${GITHUB_ACTIONS_BOT_NAME} <${GITHUB_ACTIONS_BOT_EMAIL}>`);
  git(['config', '--local', 'user.name', GITHUB_ACTIONS_BOT_NAME]);
  git(['config', '--local', 'user.email', GITHUB_ACTIONS_BOT_EMAIL]);
}

/**
 * Commits the version file and tags the commit.
 *
 * The tag is annotated so that `git push --follow-tags` publishes it together with the commit.
 *
 * @param {string} versionFilePath - Path of the version file to stage
 * @param {string} tag - The new tag, e.g. `v1.3.0`
 */
export function commitAndTagVersion(versionFilePath: string, tag: string): void {
  for (const args of [
    ['add', versionFilePath],
    ['commit', '-m', `Bump to version ${tag}`],
    ['tag', '-a', tag, '-m', tag],
  ]) {
    git(args);
  }
  info(`Committed and tagged ${tag}`);
}

/**
 * Pushes the current branch along with its annotated tags.
 */
export function pushWithTags(): void {
  git(['push', '--follow-tags']);
  info('Pushed commit and tags');
}
