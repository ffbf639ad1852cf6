/**
 * Error Classes Unit Tests
 *
 * Codes, inheritance, and the exit code each error maps to.
 */

import { describe, it, expect } from 'vitest';
import {
  PersonaError,
  ConfigError,
  InputError,
  AuthError,
  NotFoundError,
  ApiError,
  ApiClientError,
  ApiServerError,
  NetworkError,
  NetworkTimeoutError,
  NormalizationError,
  EmptyInputError,
  UpstreamError,
  OutputError,
  exitCodeFor,
  errorMessage,
} from '../../src/utils/errors';

describe('Error Classes', () => {
  describe('PersonaError', () => {
    it('should create error with message and code', () => {
      const error = new PersonaError('Test error', 'TEST_CODE');
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_CODE');
      expect(error.details).toBeUndefined();
      expect(error.name).toBe('PersonaError');
    });

    it('should create error with details', () => {
      const details = { username: 'alice' };
      const error = new PersonaError('Test error', 'TEST_CODE', details);
      expect(error.details).toEqual(details);
    });
  });

  it('should assign codes to each class', () => {
    expect(new ConfigError('x').code).toBe('CONFIG_ERROR');
    expect(new InputError('x').code).toBe('INPUT_ERROR');
    expect(new AuthError().code).toBe('AUTH_ERROR');
    expect(new NotFoundError('x').code).toBe('NOT_FOUND');
    expect(new NormalizationError('x').code).toBe('NORMALIZATION_ERROR');
    expect(new EmptyInputError().code).toBe('EMPTY_INPUT');
    expect(new UpstreamError('x').code).toBe('UPSTREAM_ERROR');
    expect(new OutputError('x').code).toBe('OUTPUT_ERROR');
  });

  it('should use default messages', () => {
    expect(new AuthError().message).toBe('Reddit rejected the client credentials');
    expect(new EmptyInputError().message).toBe('No posts or comments to analyze');
    expect(new NetworkTimeoutError().message).toBe('Request timeout');
  });

  describe('ApiError', () => {
    it('should carry status in property and details', () => {
      const error = new ApiError('Boom', 418, { host: 'oauth.reddit.com' });
      expect(error.status).toBe(418);
      expect(error.details).toEqual({ host: 'oauth.reddit.com', status: 418 });
      expect(error.code).toBe('API_ERROR');
    });

    it('should default client and server statuses', () => {
      const client = new ApiClientError('Client error');
      const server = new ApiServerError('Server error');
      expect(client.status).toBe(400);
      expect(client.code).toBe('API_CLIENT_ERROR');
      expect(server.status).toBe(500);
      expect(server.code).toBe('API_SERVER_ERROR');
      expect(client).toBeInstanceOf(ApiError);
      expect(server).toBeInstanceOf(PersonaError);
    });
  });

  it('should keep the subclass name and chain for network errors', () => {
    const error = new NetworkTimeoutError();
    expect(error.name).toBe('NetworkTimeoutError');
    expect(error.code).toBe('NETWORK_TIMEOUT');
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toBeInstanceOf(Error);
  });

  describe('exitCodeFor', () => {
    it('should map each error class to its exit code', () => {
      expect(exitCodeFor(new ConfigError('x'))).toBe(2);
      expect(exitCodeFor(new InputError('x'))).toBe(2);
      expect(exitCodeFor(new AuthError())).toBe(3);
      expect(exitCodeFor(new NotFoundError('x'))).toBe(4);
      expect(exitCodeFor(new ApiClientError('x', 429))).toBe(5);
      expect(exitCodeFor(new ApiServerError('x', 503))).toBe(5);
      expect(exitCodeFor(new NetworkTimeoutError())).toBe(5);
      expect(exitCodeFor(new NormalizationError('x'))).toBe(5);
      expect(exitCodeFor(new EmptyInputError())).toBe(6);
      expect(exitCodeFor(new UpstreamError('x'))).toBe(7);
      expect(exitCodeFor(new OutputError('x'))).toBe(8);
    });

    it('should return 1 for unknown errors and codes', () => {
      expect(exitCodeFor(new Error('plain'))).toBe(1);
      expect(exitCodeFor('string')).toBe(1);
      expect(exitCodeFor(new PersonaError('x', 'SOMETHING_ELSE'))).toBe(1);
    });
  });

  it('errorMessage should read Error messages and stringify the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});
