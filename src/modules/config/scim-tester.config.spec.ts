import { ConfigService } from '@nestjs/config';

import { ConfigurationError } from '../scim/common/scim-errors';
import { buildScimTesterConfig, parseResourceTypeList } from './scim-tester.config';

describe('scim-tester.config', () => {
  const env = (values: Record<string, string>): ConfigService => new ConfigService(values);

  // ─── parseResourceTypeList ────────────────────────────────────────

  describe('parseResourceTypeList', () => {
    it('should split and trim a comma separated list', () => {
      expect(parseResourceTypeList(' User, Group ,')).toEqual(['User', 'Group']);
    });

    it('should return undefined for blank input', () => {
      expect(parseResourceTypeList(undefined)).toBeUndefined();
      expect(parseResourceTypeList('')).toBeUndefined();
      expect(parseResourceTypeList(' , ')).toBeUndefined();
    });
  });

  // ─── buildScimTesterConfig ────────────────────────────────────────

  describe('buildScimTesterConfig', () => {
    it('should read the environment', () => {
      const config = buildScimTesterConfig(
        env({
          SCIM_BASE_URL: 'https://env.test/scim/v2',
          SCIM_TOKEN: 'test-secret',
          SCIM_TIMEOUT_MS: '2500',
          SCIM_RESOURCE_TYPES: 'User, Group',
        }),
      );

      expect(config).toEqual({
        baseUrl: 'https://env.test/scim/v2',
        token: 'test-secret',
        timeoutMs: 2500,
        resourceTypes: ['User', 'Group'],
      });
    });

    it('should prefer overrides over the environment', () => {
      const config = buildScimTesterConfig(
        env({ SCIM_BASE_URL: 'https://env.test/scim/v2', SCIM_TIMEOUT_MS: '2500', SCIM_RESOURCE_TYPES: 'User' }),
        { baseUrl: 'http://localhost:8080/scim', timeoutMs: 500, resourceTypes: ['Group'] },
      );

      expect(config.baseUrl).toBe('http://localhost:8080/scim');
      expect(config.timeoutMs).toBe(500);
      expect(config.resourceTypes).toEqual(['Group']);
    });

    it('should default the timeout and leave optional values unset', () => {
      const config = buildScimTesterConfig(env({}), { baseUrl: 'https://scim.test' });
      expect(config).toEqual({ baseUrl: 'https://scim.test', timeoutMs: 10000 });
    });

    it('should treat an empty token as absent', () => {
      const config = buildScimTesterConfig(env({ SCIM_TOKEN: '' }), { baseUrl: 'https://scim.test' });
      expect(config.token).toBeUndefined();
    });

    it('should require a base URL', () => {
      expect(() => buildScimTesterConfig(env({}))).toThrow(
        new ConfigurationError(
          'Invalid configuration: baseUrl: A SCIM base URL is required (argument <host> or SCIM_BASE_URL)',
        ),
      );
    });

    it('should reject a non-http URL', () => {
      expect(() => buildScimTesterConfig(env({}), { baseUrl: 'ftp://scim.test' })).toThrow(
        'Invalid configuration: baseUrl: The SCIM base URL must use http or https',
      );
    });

    it('should reject a relative URL', () => {
      expect(() => buildScimTesterConfig(env({}), { baseUrl: 'scim/v2' })).toThrow(
        'The SCIM base URL must be an absolute URL',
      );
    });

    it('should reject a non-numeric timeout', () => {
      expect(() =>
        buildScimTesterConfig(env({ SCIM_TIMEOUT_MS: 'soon' }), { baseUrl: 'https://scim.test' }),
      ).toThrow(ConfigurationError);
    });
  });
});
