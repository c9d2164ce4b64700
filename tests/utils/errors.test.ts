import { describe, it, expect } from 'vitest';
import {
  ListError,
  httpError,
  invalidArgument,
  isListError,
  transportError,
} from '../../src/utils/errors.js';

describe('ListError', () => {
  it('should carry the HTTP status and URL', () => {
    const error = httpError(503, 'https://sp.example.test/items');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ListError');
    expect(error.code).toBe('HTTP_ERROR');
    expect(error.status).toBe(503);
    expect(error.url).toBe('https://sp.example.test/items');
    expect(error.message).toBe('HTTP Error 503 for https://sp.example.test/items');
  });

  it('should keep the underlying cause of transport failures', () => {
    const cause = new Error('socket hang up');
    const error = transportError('https://sp.example.test/items', cause);

    expect(error.code).toBe('TRANSPORT_ERROR');
    expect(error.cause).toBe(cause);
    expect(error.status).toBeUndefined();
  });

  it('should be distinguishable by code', () => {
    const codes = [invalidArgument('bad'), httpError(404, 'u')].map((e) => e.code);

    expect(codes).toEqual(['INVALID_ARGUMENT', 'HTTP_ERROR']);
  });
});

describe('isListError', () => {
  it('should only accept ListError instances', () => {
    expect(isListError(new ListError('CONFIG_ERROR', 'x'))).toBe(true);
    expect(isListError(new Error('x'))).toBe(false);
    expect(isListError({ code: 'HTTP_ERROR' })).toBe(false);
  });
});
