import type { Config } from '@/types';
import { DEFAULT_ALLOWED_TYPES, DEFAULT_MINOR_TYPES, DEFAULT_PATCH_TYPES } from '@/utils/constants';

/**
 * Configuration interface with added utility methods
 */
interface ConfigWithMethods extends Config {
  set: (overrides: Partial<Config>) => void;
  resetDefaults: () => void;
}

/**
 * Default configuration object.
 */
const defaultConfig: Config = {
  githubToken: 'test-secret',
  versionFile: 'version_number',
  maxCommits: 100,
  tagPollAttempts: 5,
  tagPollDelayMs: 0,
  allowedTypes: [...DEFAULT_ALLOWED_TYPES],
  minorTypes: [...DEFAULT_MINOR_TYPES],
  patchTypes: [...DEFAULT_PATCH_TYPES],
  dryRun: false,
};

function isConfigKey(key: string): key is keyof Config {
  return Object.hasOwn(defaultConfig, key);
}

// Store the actual configuration data
let currentConfig: Config = { ...defaultConfig };

/**
 * Config proxy handler.
 */
const configProxyHandler: ProxyHandler<ConfigWithMethods> = {
  set(_target: ConfigWithMethods, key: string | symbol, value: unknown): boolean {
    if (typeof key !== 'string' || !isConfigKey(key)) {
      throw new Error(`Invalid config key: ${String(key)}`);
    }

    const expectedValue = defaultConfig[key];
    if ((Array.isArray(expectedValue) && Array.isArray(value)) || typeof expectedValue === typeof value) {
      currentConfig = Object.assign({}, currentConfig, { [key]: value });
      return true;
    }

    throw new TypeError(`Invalid value type for config key: ${key}`);
  },

  get(_target: ConfigWithMethods, prop: string | symbol): unknown {
    if (typeof prop === 'string') {
      if (prop === 'set') {
        return (overrides: Partial<Config> = {}) => {
          // Note: No need for deep merge
          currentConfig = { ...currentConfig, ...overrides };
        };
      }
      if (prop === 'resetDefaults') {
        return () => {
          currentConfig = { ...defaultConfig };
        };
      }

      if (isConfigKey(prop)) {
        return currentConfig[prop];
      }
    }
    return undefined;
  },
};

/**
 * Returns the current configuration.
 */
export function getConfig(): Config {
  return currentConfig;
}

/**
 * Create and export the config object directly with the proxy
 */
export const config: ConfigWithMethods = new Proxy({} as ConfigWithMethods, configProxyHandler);
