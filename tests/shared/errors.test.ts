/**
 * Service Error Unit Tests
 */

import {
  GeminiError,
  NewsApiError,
  ServiceError,
  isTransientHttpError,
  safeErrorMessage,
} from '../../src/shared/errors';
import { httpError, networkError } from '../helpers/axios';

describe('safeErrorMessage', () => {
  it('summarizes axios errors', () => {
    const error = httpError(429, { error: { message: 'Quota exceeded' } }, 'ERR_BAD_REQUEST');
    expect(safeErrorMessage(error)).toBe(
      'HTTP 429 code=ERR_BAD_REQUEST api=Quota exceeded msg=Request failed with status code 429'
    );
  });

  it('reads flat API messages', () => {
    expect(safeErrorMessage(httpError(401, { message: 'Bad key' }))).toBe(
      'HTTP 401 api=Bad key msg=Request failed with status code 401'
    );
  });

  it('formats service errors with their code', () => {
    expect(safeErrorMessage(new GeminiError('boom', 'EMPTY_RESPONSE'))).toBe('GeminiError[EMPTY_RESPONSE]: boom');
  });

  it('handles plain errors and other values', () => {
    expect(safeErrorMessage(new Error('plain'))).toBe('plain');
    expect(safeErrorMessage('text')).toBe('text');
  });
});

describe('isTransientHttpError', () => {
  it('retries timeouts, throttling, server errors and network failures', () => {
    expect(isTransientHttpError(httpError(408))).toBe(true);
    expect(isTransientHttpError(httpError(429))).toBe(true);
    expect(isTransientHttpError(httpError(503))).toBe(true);
    expect(isTransientHttpError(networkError())).toBe(true);
  });

  it('does not retry client errors or non-HTTP failures', () => {
    expect(isTransientHttpError(httpError(400))).toBe(false);
    expect(isTransientHttpError(new Error('x'))).toBe(false);
  });
});

describe('ServiceError', () => {
  it('keeps the code and the subclass name', () => {
    const error = new NewsApiError('limited', 'rateLimited');
    expect(error).toBeInstanceOf(ServiceError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('NewsApiError');
    expect(error.code).toBe('rateLimited');
  });
});
