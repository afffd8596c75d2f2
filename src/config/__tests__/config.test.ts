/**
 * Tests for parser configuration
 */

import { describe, it, expect } from 'vitest';
import { createDefaultConfig, loadConfigFromEnv, validateConfig } from '../index.js';
import { ResponseParserError } from '../../error/index.js';

describe('Configuration', () => {
  it('should create the default configuration', () => {
    expect(createDefaultConfig()).toEqual({ protocol: 'query', logLevel: 'warn', logging: false });
  });

  it('should accept a valid configuration', () => {
    expect(() => validateConfig({ protocol: 'rest-json', logLevel: 'info', logging: true })).not.toThrow();
  });

  describe('loadConfigFromEnv', () => {
    it('should use defaults for missing variables', () => {
      expect(loadConfigFromEnv({})).toEqual(createDefaultConfig());
    });

    it('should read every variable', () => {
      const config = loadConfigFromEnv({
        RESPONSE_PARSER_PROTOCOL: 'ec2',
        RESPONSE_PARSER_LOG_LEVEL: 'debug',
        RESPONSE_PARSER_LOGGING: 'true',
      });

      expect(config).toEqual({ protocol: 'ec2', logLevel: 'debug', logging: true });
    });

    it('should only enable logging for the literal true', () => {
      expect(loadConfigFromEnv({ RESPONSE_PARSER_LOGGING: 'yes' }).logging).toBe(false);
    });

    it('should reject an unknown protocol', () => {
      expect(() => loadConfigFromEnv({ RESPONSE_PARSER_PROTOCOL: 'soap' })).toThrow(
        /^Invalid environment configuration: protocol: /
      );
      expect(() => loadConfigFromEnv({ RESPONSE_PARSER_PROTOCOL: 'soap' })).toThrow(ResponseParserError);
    });

    it('should reject an unknown log level', () => {
      expect(() => loadConfigFromEnv({ RESPONSE_PARSER_LOG_LEVEL: 'loud' })).toThrow(
        /^Invalid environment configuration: logLevel: /
      );
    });
  });
});
