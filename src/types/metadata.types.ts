import type { Config } from '@/types/config.types';

/**
 * Describes how one action input is read and where it lands in {@link Config}.
 *
 * The `ACTION_INPUTS` table in `utils/metadata.ts` holds one of these per input declared in
 * action.yml; `createConfigFromInputs()` walks that table to build the config.
 */
export interface ActionInputMetadata {
  /**
   * The config property this input populates.
   */
  configKey: keyof Config;

  /**
   * Fail when the input is missing or empty.
   */
  required: boolean;

  /**
   * How the raw input string is converted:
   * - 'string': used as-is
   * - 'boolean': YAML 1.2 core schema booleans via getBooleanInput
   * - 'number': base-10 integer
   * - 'array': comma-separated, trimmed and de-duplicated
   */
  type: 'string' | 'boolean' | 'number' | 'array';

  /**
   * Environment variables consulted, in order, when the input itself is empty.
   * Only applies to 'string' inputs.
   */
  fallbackEnv?: ReadonlyArray<string>;
}
