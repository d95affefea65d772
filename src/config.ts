import type { Config } from '@/types';
import { createConfigFromInputs } from '@/utils/metadata';
import { endGroup, info, setSecret, startGroup } from '@actions/core';

// Keep configInstance private to this module
let configInstance: Config | null = null;

/**
 * Clears the cached config instance during testing.
 *
 * Resets the singleton so the next access re-reads the inputs. Only has an effect when
 * NODE_ENV is 'test'.
 */
export function clearConfigForTesting(): void {
  if (process.env.NODE_ENV === 'test') {
    configInstance = null;
  }
}

/**
 * Ensures every entry of `subset` appears in `allowed`.
 */
function assertSubsetOfAllowedTypes(name: string, subset: string[], allowed: string[]): void {
  const unknown = subset.filter((type) => !allowed.includes(type));
  if (unknown.length > 0) {
    throw new TypeError(`${name} must be a subset of allowed-types. Unknown: ${unknown.join(', ')}`);
  }
}

/**
 * Lazy-initialized configuration object. This is kept separate from the exported
 * config to allow testing utilities to be imported without triggering initialization.
 */
function initializeConfig(): Config {
  if (configInstance) {
    return configInstance;
  }

  try {
    startGroup('Initializing Config');

    const instance = createConfigFromInputs();

    if (!instance.githubToken) {
      throw new Error('A GitHub token is required. Set the github_token input or the GH_TOKEN environment variable.');
    }
    setSecret(instance.githubToken);

    if (!instance.versionFile.trim()) {
      throw new TypeError('Version file must not be empty');
    }

    if (Number.isNaN(instance.maxCommits) || instance.maxCommits < 1) {
      throw new TypeError('Max commits must be an integer greater than or equal to one');
    }
    if (Number.isNaN(instance.tagPollAttempts) || instance.tagPollAttempts < 1) {
      throw new TypeError('Tag poll attempts must be an integer greater than or equal to one');
    }
    if (Number.isNaN(instance.tagPollDelayMs) || instance.tagPollDelayMs < 0) {
      throw new TypeError('Tag poll delay must be an integer greater than or equal to zero');
    }

    if (instance.allowedTypes.length === 0) {
      throw new TypeError('Allowed types must contain at least one commit type');
    }
    assertSubsetOfAllowedTypes('minor-types', instance.minorTypes, instance.allowedTypes);
    assertSubsetOfAllowedTypes('patch-types', instance.patchTypes, instance.allowedTypes);

    info(`Version File: ${instance.versionFile}`);
    info(`Max Commits: ${instance.maxCommits}`);
    info(`Tag Poll Attempts: ${instance.tagPollAttempts}`);
    info(`Tag Poll Delay (ms): ${instance.tagPollDelayMs}`);
    info(`Allowed Types: ${instance.allowedTypes.join(', ')}`);
    info(`Minor Types: ${instance.minorTypes.join(', ')}`);
    info(`Patch Types: ${instance.patchTypes.join(', ')}`);
    info(`Dry Run: ${instance.dryRun}`);

    configInstance = instance;
    return configInstance;
  } finally {
    endGroup();
  }
}

// Create a getter for the config that initializes on first use
export function getConfig(): Config {
  return initializeConfig();
}

export const config: Config = new Proxy({} as Config, {
  get(_target, prop) {
    return getConfig()[prop as keyof Config];
  },
});
