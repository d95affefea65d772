import { stubInputEnv } from '@/tests/helpers/inputs';
import type { ActionInputMetadata } from '@/types';
import { ACTION_INPUTS, createConfigFromInputs } from '@/utils/metadata';
import { getBooleanInput, getInput } from '@actions/core';
import { beforeEach, describe, expect, it, vi } from 'vitest';

describe('utils/metadata', () => {
  describe('ACTION_INPUTS', () => {
    it('should contain all expected input configurations', () => {
      expect(Object.keys(ACTION_INPUTS)).toEqual([
        'github_token',
        'version-file',
        'max-commits',
        'tag-poll-attempts',
        'tag-poll-delay-ms',
        'allowed-types',
        'minor-types',
        'patch-types',
        'dry-run',
      ]);
    });

    it('should read the token as an optional string with environment fallbacks', () => {
      expect(ACTION_INPUTS.github_token).toEqual({
        configKey: 'githubToken',
        required: false,
        type: 'string',
        fallbackEnv: ['GH_TOKEN', 'GITHUB_TOKEN'],
      });
    });

    it('should have proper configKey mappings and types', () => {
      const expected: Record<string, Pick<ActionInputMetadata, 'configKey' | 'type'>> = {
        'version-file': { configKey: 'versionFile', type: 'string' },
        'max-commits': { configKey: 'maxCommits', type: 'number' },
        'tag-poll-attempts': { configKey: 'tagPollAttempts', type: 'number' },
        'tag-poll-delay-ms': { configKey: 'tagPollDelayMs', type: 'number' },
        'allowed-types': { configKey: 'allowedTypes', type: 'array' },
        'minor-types': { configKey: 'minorTypes', type: 'array' },
        'patch-types': { configKey: 'patchTypes', type: 'array' },
        'dry-run': { configKey: 'dryRun', type: 'boolean' },
      };

      for (const [inputName, { configKey, type }] of Object.entries(expected)) {
        expect(ACTION_INPUTS[inputName]).toEqual({ configKey, required: true, type });
      }
    });
  });

  describe('createConfigFromInputs', () => {
    beforeEach(() => {
      vi.stubEnv('GH_TOKEN', undefined);
      vi.stubEnv('GITHUB_TOKEN', undefined);
    });

    it('should throw a custom error if getInput fails', () => {
      vi.mocked(getInput).mockImplementationOnce(() => {
        throw new Error('Input retrieval failed');
      });

      expect(() => createConfigFromInputs()).toThrow("Failed to process input 'github_token': Input retrieval failed");
    });

    it('should handle non-Error objects thrown during input processing', () => {
      vi.mocked(getInput).mockImplementationOnce(() => {
        throw 'A plain string error';
      });

      expect(() => createConfigFromInputs()).toThrow("Failed to process input 'github_token': A plain string error");
    });

    it('should process all input types correctly', () => {
      stubInputEnv({
        github_token: 'test-secret',
        'version-file': 'VERSION',
        'max-commits': '50',
        'tag-poll-attempts': '3',
        'tag-poll-delay-ms': '250',
        'allowed-types': 'feat, fix ,docs,feat',
        'minor-types': 'feat',
        'patch-types': '',
        'dry-run': 'true',
      });

      expect(() => createConfigFromInputs()).toThrow(
        "Failed to process input 'patch-types': Input required and not supplied: patch-types",
      );

      stubInputEnv({ 'allowed-types': 'feat, fix ,docs,feat', 'patch-types': 'fix', 'dry-run': 'true' });
      expect(createConfigFromInputs()).toEqual({
        githubToken: 'test-secret',
        versionFile: 'version_number',
        maxCommits: 100,
        tagPollAttempts: 5,
        tagPollDelayMs: 500,
        allowedTypes: ['feat', 'fix', 'docs'],
        minorTypes: ['feat'],
        patchTypes: ['fix'],
        dryRun: true,
      });
      expect(getBooleanInput).toHaveBeenCalledWith('dry-run', { required: true });
    });

    it('should take the first non-empty fallback environment variable for the token', () => {
      stubInputEnv({ github_token: null });
      vi.stubEnv('GITHUB_TOKEN', '  test-github-token  ');

      expect(createConfigFromInputs().githubToken).toBe('test-github-token');
    });

    it('should leave the token empty when no source provides one', () => {
      stubInputEnv({ github_token: null });

      expect(createConfigFromInputs().githubToken).toBe('');
    });
  });
});
