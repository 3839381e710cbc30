import { validateEnv } from '../../src/infrastructure/config/env.validation';
import { ConfigError } from '../../src/core/domain/readiness/errors/config.error';

const consulEnv = {
  CONSUL_PREFIX: 'app',
  CONSUL_MANDATORY_KEYS: 'redis',
  CONSUL_CONNECTION_CHECK_KEY: 'ping',
};

function issuesOf(env: Record<string, unknown>): readonly string[] {
  try {
    validateEnv(env);
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  return [];
}

describe('validateEnv', () => {
  describe('defaults', () => {
    it('should apply the wait loop and Consul defaults', () => {
      const result = validateEnv({});

      expect(result).toMatchObject({
        NODE_ENV: 'production',
        LOG_LEVEL: 'info',
        WAIT_INTERVAL_MS: 2_000,
        WAIT_TIMEOUT_MS: 300_000,
        PROBE_TIMEOUT_MS: 5_000,
        CONSUL_HOST: 'localhost',
        CONSUL_PORT: 8500,
        CONSUL_SCHEME: 'http',
        REDIS_PORT: 6379,
        REDIS_DB: 0,
        RABBITMQ_PORT: 5672,
        RABBITMQ_VHOST: '/',
      });
    });

    it('should treat blank values as unset', () => {
      const result = validateEnv({ WAIT_INTERVAL_MS: '', REDIS_HOST: '  ', LOG_LEVEL: '' });

      expect(result.WAIT_INTERVAL_MS).toBe(2_000);
      expect(result.REDIS_HOST).toBeUndefined();
      expect(result.LOG_LEVEL).toBe('info');
    });
  });

  describe('coercion', () => {
    it('should coerce numeric strings', () => {
      const result = validateEnv({ WAIT_TIMEOUT_MS: '60000', CONSUL_PORT: '8501' });

      expect(result.WAIT_TIMEOUT_MS).toBe(60_000);
      expect(result.CONSUL_PORT).toBe(8501);
    });
  });

  describe('validation errors', () => {
    it('should reject a non-numeric interval', () => {
      expect(issuesOf({ WAIT_INTERVAL_MS: 'soon' })).toEqual([
        'WAIT_INTERVAL_MS: Expected number, received nan',
      ]);
    });

    it('should reject an unknown log level', () => {
      expect(issuesOf({ LOG_LEVEL: 'trace' })).toHaveLength(1);
      expect(issuesOf({ LOG_LEVEL: 'trace' })[0]).toMatch(/^LOG_LEVEL: /);
    });

    it('should reject a database URL with another scheme', () => {
      expect(issuesOf({ DATABASE_URL: 'mysql://db:3306/app' })).toEqual([
        'DATABASE_URL: Must use the postgres:// or postgresql:// scheme',
      ]);
    });

    it('should require the key list and sentinel once a prefix is set', () => {
      expect(issuesOf({ CONSUL_PREFIX: 'app' })).toEqual([
        'CONSUL_MANDATORY_KEYS: Required when CONSUL_PREFIX is set',
        'CONSUL_CONNECTION_CHECK_KEY: Required when CONSUL_PREFIX is set',
      ]);
    });

    it('should flag key lists given without a prefix', () => {
      expect(issuesOf({ CONSUL_OPTIONAL_KEYS: 'flags' })).toEqual([
        'CONSUL_OPTIONAL_KEYS: Has no effect without CONSUL_PREFIX',
      ]);
    });

    it('should accept a complete Consul configuration', () => {
      expect(issuesOf(consulEnv)).toEqual([]);
    });

    it('should throw ConfigError with one line per issue', () => {
      expect(() => validateEnv({ CONSUL_PORT: '0', PROBE_TIMEOUT_MS: '-1' })).toThrow(
        /^Environment validation failed:\n {2}PROBE_TIMEOUT_MS: .+\n {2}CONSUL_PORT: .+$/,
      );
    });
  });
});
