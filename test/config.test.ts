import { describe, it, expect, afterEach } from 'vitest';
import { configure, detectLogLevel, resolveConfig } from '../src/config.js';
import { ConfigurationError } from '../src/core/errors.js';
import { getDefaultLogger, setDefaultLogger } from '../src/types/logger.js';
import { DEFAULT_TEXT_EXTENSIONS } from '../src/utils/file-type.js';
import { createMockLogger } from './helpers/mock-logger.js';

describe('Configuration', () => {
  describe('detectLogLevel', () => {
    it('should default to warn', () => {
      expect(detectLogLevel({})).toBe('warn');
    });

    it('should prefer FTPWIRE_LOG_LEVEL', () => {
      expect(detectLogLevel({ FTPWIRE_LOG_LEVEL: 'ERROR', DEBUG: 'ftpwire' })).toBe('error');
    });

    it('should ignore an unknown FTPWIRE_LOG_LEVEL', () => {
      expect(detectLogLevel({ FTPWIRE_LOG_LEVEL: 'verbose' })).toBe('warn');
    });

    it('should enable debug from DEBUG scopes', () => {
      expect(detectLogLevel({ DEBUG: 'ftpwire' })).toBe('debug');
      expect(detectLogLevel({ DEBUG: 'express, ftpwire:*' })).toBe('debug');
      expect(detectLogLevel({ DEBUG: '*' })).toBe('debug');
    });

    it('should not match other DEBUG scopes', () => {
      expect(detectLogLevel({ DEBUG: 'ftpwire-extra' })).toBe('warn');
    });
  });

  describe('resolveConfig', () => {
    it('should fill in defaults', () => {
      expect(resolveConfig({}, {})).toEqual({
        logLevel: 'warn',
        connectionMode: 'PASV',
        transferMode: 'auto',
        textExtensions: [...DEFAULT_TEXT_EXTENSIONS],
      });
    });

    it('should read the environment', () => {
      const config = resolveConfig({}, {
        FTPWIRE_CONNECTION_MODE: 'port',
        FTPWIRE_TRANSFER_MODE: 'i',
        FTPWIRE_LOG_LEVEL: 'debug',
      });

      expect(config.connectionMode).toBe('PORT');
      expect(config.transferMode).toBe('I');
      expect(config.logLevel).toBe('debug');
    });

    it('should keep auto transfer mode from the environment', () => {
      expect(resolveConfig({}, { FTPWIRE_TRANSFER_MODE: 'AUTO' }).transferMode).toBe('auto');
    });

    it('should let options win over the environment', () => {
      const config = resolveConfig({ connectionMode: 'PASV' }, { FTPWIRE_CONNECTION_MODE: 'PORT' });
      expect(config.connectionMode).toBe('PASV');
    });

    it('should lower-case text extensions', () => {
      expect(resolveConfig({ textExtensions: ['.SQL', '.Log'] }, {}).textExtensions).toEqual(['.sql', '.log']);
    });

    it('should reject an unknown connection mode', () => {
      expect(() => resolveConfig({}, { FTPWIRE_CONNECTION_MODE: 'EPSV' })).toThrow(ConfigurationError);

      try {
        resolveConfig({}, { FTPWIRE_CONNECTION_MODE: 'EPSV' });
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.configKey).toBe('connectionMode');
        }
      }
    });

    it('should reject extensions without a dot', () => {
      expect(() => resolveConfig({ textExtensions: ['sql'] }, {})).toThrow(
        'Invalid configuration for "textExtensions.0": extensions start with a dot'
      );
    });
  });

  describe('configure', () => {
    const original = getDefaultLogger();

    afterEach(() => {
      setDefaultLogger(original);
    });

    it('should install a level-filtered default logger', () => {
      const base = createMockLogger();
      const config = configure({}, { logger: base, env: { FTPWIRE_LOG_LEVEL: 'info' } });

      getDefaultLogger().debug('hidden');
      getDefaultLogger().info('shown');

      expect(config.logLevel).toBe('info');
      expect(base.debug).not.toHaveBeenCalled();
      expect(base.info).toHaveBeenCalledWith('shown');
    });
  });
});
