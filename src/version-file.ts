import * as fs from 'node:fs';
import * as path from 'node:path';
import { config } from '@/config';
import { context } from '@/context';
import { parseVersion } from '@/semver';
import { VERSION_REGEX } from '@/utils/constants';
import { info } from '@actions/core';

/**
 * Absolute path of the configured version file, resolved against the workspace directory.
 */
export function getVersionFilePath(): string {
  return path.resolve(context.workspaceDir, config.versionFile);
}

/**
 * Reads the current version from the version file.
 *
 * @returns {string} The trimmed version string, e.g. `1.2.3`
 * @throws {Error} If the file is missing or does not hold a `#.#.#` version
 */
export function readVersionFile(): string {
  const versionFilePath = getVersionFilePath();

  if (!fs.existsSync(versionFilePath)) {
    throw new Error(`Version file ${versionFilePath} does not exist`);
  }

  const version = fs.readFileSync(versionFilePath, { encoding: 'utf8' }).trim();
  try {
    parseVersion(version, VERSION_REGEX);
  } catch (error) {
    throw new Error(`Version file ${versionFilePath} does not contain a valid version: '${version}'`, {
      cause: error,
    });
  }

  info(`Current version: ${version} (${config.versionFile})`);
  return version;
}

/**
 * Overwrites the version file with the given version.
 *
 * @param {string} version - The new version, e.g. `1.3.0`
 * @returns {string} The absolute path that was written
 */
export function writeVersionFile(version: string): string {
  const versionFilePath = getVersionFilePath();
  fs.writeFileSync(versionFilePath, version, { encoding: 'utf8' });
  info(`Wrote version ${version} to ${config.versionFile}`);

  return versionFilePath;
}
