import { createDefaultOctokitMock } from '@/tests/helpers/octokit';
import type { Context, OctokitRestApi, Repo } from '@/types';

/**
 * Default repository configuration
 */
const defaultRepo: Repo = {
  owner: 'octo-org',
  repo: 'octo-repo',
};

/**
 * Context interface with added utility methods
 */
export interface ContextWithMethods extends Context {
  set: (overrides?: Partial<Context>) => void;
  reset: () => void;
  useMockOctokit: () => OctokitRestApi;
}

/**
 * Default context values
 */
const defaultContext: Context = {
  repo: defaultRepo,
  repoUrl: 'https://github.com/octo-org/octo-repo',
  octokit: createDefaultOctokitMock(),
  workspaceDir: '/workspace',
};

function isContextKey(key: string): key is keyof Context {
  return Object.hasOwn(defaultContext, key);
}

// Store the current context configuration
let currentContext: Context = { ...defaultContext };

/**
 * Context proxy handler
 */
const contextProxyHandler: ProxyHandler<ContextWithMethods> = {
  set(_target: ContextWithMethods, key: string | symbol, value: unknown): boolean {
    if (typeof key !== 'string' || !isContextKey(key)) {
      throw new Error(`Invalid context key: ${String(key)}`);
    }

    if (typeof defaultContext[key] === typeof value) {
      currentContext = Object.assign({}, currentContext, { [key]: value });
      return true;
    }

    throw new TypeError(`Invalid value type for context key: ${key}`);
  },

  get(_target: ContextWithMethods, prop: string | symbol): unknown {
    if (typeof prop === 'string') {
      if (prop === 'set') {
        return (overrides: Partial<Context> = {}) => {
          // Note: No need for deep merge
          currentContext = { ...currentContext, ...overrides };
        };
      }
      if (prop === 'reset') {
        return () => {
          currentContext = {
            ...defaultContext,
            octokit: createDefaultOctokitMock(),
          };
        };
      }
      if (prop === 'useMockOctokit') {
        return () => {
          currentContext.octokit = createDefaultOctokitMock();
          return currentContext.octokit;
        };
      }
      if (isContextKey(prop)) {
        return currentContext[prop];
      }
    }
    return undefined;
  },
};

/**
 * Create and export the context mock directly with the proxy
 */
export const context = new Proxy({} as ContextWithMethods, contextProxyHandler);

/**
 * Returns the current context configuration
 */
export function getContext(): Context {
  return currentContext;
}
