import { parseSize } from '../common/logger/logger';
import { buildConfig, validateEnv } from './configuration';

describe('configuration', () => {
  describe('buildConfig', () => {
    it('applies defaults', () => {
      expect(buildConfig({})).toEqual({
        port: 4000,
        corsOrigin: 'http://localhost:3000',
        scoring: { strategy: 'standard' },
        logging: { level: 'info', directory: 'logs', maxFileSize: '10MB', maxFiles: 5 },
        redis: { enabled: false, host: 'localhost', port: 6379, password: undefined },
      });
    });

    it('reads environment values', () => {
      const config = buildConfig({
        PORT: '8080',
        SCORING_STRATEGY: 'DLS',
        LOG_LEVEL: 'debug',
        REDIS_ENABLED: 'true',
        REDIS_HOST: 'cache',
        REDIS_PORT: '6380',
        REDIS_PASSWORD: 'test-secret',
      });

      expect(config.port).toBe(8080);
      expect(config.scoring.strategy).toBe('dls');
      expect(config.logging.level).toBe('debug');
      expect(config.redis).toEqual({ enabled: true, host: 'cache', port: 6380, password: 'test-secret' });
    });

    it('enables redis only for "true"', () => {
      expect(buildConfig({ REDIS_ENABLED: '1' }).redis.enabled).toBe(false);
    });
  });

  describe('validateEnv', () => {
    it('accepts a valid environment', () => {
      const env = { SCORING_STRATEGY: 'dls', PORT: '4000', LOG_MAX_FILE_SIZE: '512kb' };
      expect(validateEnv(env)).toBe(env);
    });

    it('rejects an unknown scoring strategy', () => {
      expect(() => validateEnv({ SCORING_STRATEGY: 'vjd' })).toThrow(
        'Configuration error: SCORING_STRATEGY must be one of standard, dls (got "vjd")',
      );
    });

    it('rejects an unknown log level', () => {
      expect(() => validateEnv({ LOG_LEVEL: 'trace' })).toThrow('Configuration error: LOG_LEVEL');
    });

    it('rejects non-numeric ports', () => {
      expect(() => validateEnv({ REDIS_PORT: 'abc' })).toThrow(
        'Configuration error: REDIS_PORT must be a positive integer',
      );
    });

    it('rejects a malformed log file size', () => {
      expect(() => validateEnv({ LOG_MAX_FILE_SIZE: '10 megs' })).toThrow(
        'Configuration error: invalid LOG_MAX_FILE_SIZE "10 megs"',
      );
    });
  });

  describe('parseSize', () => {
    it('converts units to bytes', () => {
      expect(parseSize('10MB')).toBe(10485760);
      expect(parseSize('512KB')).toBe(524288);
      expect(parseSize('1gb')).toBe(1073741824);
    });

    it('throws on an invalid size', () => {
      expect(() => parseSize('ten')).toThrow('Invalid size format: ten');
    });
  });
});
