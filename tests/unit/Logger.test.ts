// tests/unit/Logger.test.ts

import { describe, it, expect } from 'vitest';
import winston from 'winston';
import { Logger } from '../../src/observability/Logger';

describe('Logger', () => {
  const logger = new Logger({
    level: 'debug',
    format: 'json',
    transports: [new winston.transports.Console({ silent: true })],
  });

  it('should redact clientSecret and apiKey in metadata', () => {
    const redacted = logger['redactSensitive']({
      username: 'alice',
      clientSecret: 'test-secret',
      apiKey: 'test-key',
    });

    expect(redacted).toEqual({
      username: 'alice',
      clientSecret: '[REDACTED]',
      apiKey: '[REDACTED]',
    });
  });

  it('should redact accessToken and authorization headers', () => {
    const redacted = logger['redactSensitive']({
      accessToken: 'test-token',
      headers: { Authorization: 'Bearer test-token', 'User-Agent': 'test-agent/1.0' },
    });

    expect(redacted).toEqual({
      accessToken: '[REDACTED]',
      headers: { Authorization: '[REDACTED]', 'User-Agent': 'test-agent/1.0' },
    });
  });

  it('should redact nested config sections', () => {
    const redacted = logger['redactSensitive']({
      reddit: { clientId: 'test-client', clientSecret: 'test-secret', userAgent: 'test-agent/1.0' },
      gemini: { apiKey: 'test-key', model: 'test-model' },
    });

    expect(redacted).toEqual({
      reddit: { clientId: 'test-client', clientSecret: '[REDACTED]', userAgent: 'test-agent/1.0' },
      gemini: { apiKey: '[REDACTED]', model: 'test-model' },
    });
  });

  it('should not mutate the caller metadata', () => {
    const meta = { gemini: { apiKey: 'test-key' } };
    logger['redactSensitive'](meta);
    expect(meta.gemini.apiKey).toBe('test-key');
  });

  it('should preserve non-sensitive data', () => {
    const data = { username: 'alice', itemCount: 10, durationMs: 245 };
    expect(logger['redactSensitive'](data)).toEqual(data);
  });

  it('should pass through null, undefined and primitives', () => {
    expect(logger['redactSensitive'](null)).toBe(null);
    expect(logger['redactSensitive'](undefined)).toBe(undefined);
    expect(logger['redactSensitive']('string')).toBe('string');
  });

  it('should not throw when logging', () => {
    expect(() => {
      logger.debug('Debug message', { key: 'value' });
      logger.info('Info message', { key: 'value' });
      logger.warn('Warn message');
      logger.error('Error message', { key: 'value' });
    }).not.toThrow();
  });

  it('should create child loggers', () => {
    const child = logger.child({ runId: 'run-1' });
    expect(child).toBeInstanceOf(Logger);
    expect(() => child.info('Child message', { apiKey: 'test-key' })).not.toThrow();
  });
});
