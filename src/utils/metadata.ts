import type { ActionInputMetadata, Config } from '@/types';
import { getBooleanInput, getInput } from '@actions/core';

/**
 * Factory functions to reduce duplication in ACTION_INPUTS metadata definitions.
 */
const requiredString = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'string',
});

const requiredBoolean = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'boolean',
});

const requiredArray = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'array',
});

const requiredNumber = (configKey: keyof Config): ActionInputMetadata => ({
  configKey,
  required: true,
  type: 'number',
});

const stringWithEnvFallback = (configKey: keyof Config, fallbackEnv: string[]): ActionInputMetadata => ({
  configKey,
  required: false,
  type: 'string',
  fallbackEnv,
});

/**
 * Complete mapping of all action inputs to their metadata.
 * Note: defaults live in action.yml and are supplied by the runner as INPUT_* variables.
 */
export const ACTION_INPUTS: Record<string, ActionInputMetadata> = {
  github_token: stringWithEnvFallback('githubToken', ['GH_TOKEN', 'GITHUB_TOKEN']),
  'version-file': requiredString('versionFile'),
  'max-commits': requiredNumber('maxCommits'),
  'tag-poll-attempts': requiredNumber('tagPollAttempts'),
  'tag-poll-delay-ms': requiredNumber('tagPollDelayMs'),
  'allowed-types': requiredArray('allowedTypes'),
  'minor-types': requiredArray('minorTypes'),
  'patch-types': requiredArray('patchTypes'),
  'dry-run': requiredBoolean('dryRun'),
} as const;

/**
 * Creates a config object by reading inputs using the @actions/core API and converting them
 * according to the metadata definitions.
 */
export function createConfigFromInputs(): Config {
  const config: Partial<Record<keyof Config, unknown>> = {};

  for (const [inputName, metadata] of Object.entries(ACTION_INPUTS)) {
    const { configKey, required, type, fallbackEnv = [] } = metadata;

    try {
      let value: unknown;

      if (type === 'boolean') {
        value = getBooleanInput(inputName, { required });
      } else if (type === 'array') {
        const input = getInput(inputName, { required });

        if (!input || input.trim() === '') {
          value = [];
        } else {
          value = Array.from(
            new Set(
              input
                .split(',')
                .map((item: string) => item.trim())
                .filter(Boolean),
            ),
          );
        }
      } else if (type === 'number') {
        const input = getInput(inputName, { required });
        value = Number.parseInt(input, 10);
      } else {
        let input = getInput(inputName, { required });
        for (const envName of fallbackEnv) {
          if (input) {
            break;
          }
          input = process.env[envName]?.trim() ?? '';
        }
        value = input;
      }

      config[configKey] = value;
    } catch (error) {
      throw new Error(
        `Failed to process input '${inputName}': ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  return config as Config;
}
