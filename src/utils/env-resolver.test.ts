import { describe, expect, it } from 'vitest';
import { resolveEnv, resolveEnvRecursive } from './env-resolver.js';

describe('Env Resolver', () => {
  const env = { MEDIA_ROOT: '/srv/media', EMPTY: '', COOKIES: 'cookies.txt' };

  describe('resolveEnv', () => {
    it('should resolve existing environment variable', () => {
      expect(resolveEnv('${MEDIA_ROOT}/Show', env)).toBe('/srv/media/Show');
    });

    it('should return string as is if no variables', () => {
      expect(resolveEnv('No variables here', env)).toBe('No variables here');
    });

    it('should throw error for missing environment variable', () => {
      expect(() => resolveEnv('Value is ${MISSING_VAR}', env)).toThrow('Environment variable "MISSING_VAR" is not set');
    });

    it('should use the fallback when the variable is unset or empty', () => {
      expect(resolveEnv('${MISSING_VAR:-./logs}', env)).toBe('./logs');
      expect(resolveEnv('${EMPTY:-x}', env)).toBe('x');
    });

    it('should prefer the variable over the fallback', () => {
      expect(resolveEnv('${MEDIA_ROOT:-/tmp}', env)).toBe('/srv/media');
    });

    it('should read process.env by default', () => {
      process.env.RS_TEST_VAR = 'from-process';
      try {
        expect(resolveEnv('${RS_TEST_VAR}')).toBe('from-process');
      } finally {
        delete process.env.RS_TEST_VAR;
      }
    });
  });

  describe('resolveEnvRecursive', () => {
    it('should resolve variables in nested objects and arrays', () => {
      const resolved = resolveEnvRecursive(
        {
          globalConfig: { fetch: { cookieFile: '${COOKIES}' } },
          collections: [{ directory: '${MEDIA_ROOT}/A' }, { directory: 'static' }],
          concurrency: 2,
          enabled: true,
          nothing: null,
        },
        env,
      );

      expect(resolved).toEqual({
        globalConfig: { fetch: { cookieFile: 'cookies.txt' } },
        collections: [{ directory: '/srv/media/A' }, { directory: 'static' }],
        concurrency: 2,
        enabled: true,
        nothing: null,
      });
    });
  });
});
