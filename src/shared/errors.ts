// Service errors
// Typed failures raised by the external API clients

import axios from 'axios';

export class ServiceError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'ServiceError';
  }
}

export class NewsApiError extends ServiceError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
    this.name = 'NewsApiError';
  }
}

export class GeminiError extends ServiceError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
    this.name = 'GeminiError';
  }
}

export class ImageGenerationError extends ServiceError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
    this.name = 'ImageGenerationError';
  }
}

export class BloggerError extends ServiceError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
    this.name = 'BloggerError';
  }
}

function readApiMessage(data: unknown): string | undefined {
  if (!data || typeof data !== 'object') return undefined;
  if ('error' in data) {
    const nested = data.error;
    if (typeof nested === 'string') return nested;
    if (nested && typeof nested === 'object' && 'message' in nested && typeof nested.message === 'string') {
      return nested.message;
    }
  }
  if ('message' in data && typeof data.message === 'string') return data.message;
  return undefined;
}

/**
 * One-line description of an error that never leaks request headers (API keys).
 */
export function safeErrorMessage(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const apiMessage = readApiMessage(error.response?.data);
    return [
      status ? `HTTP ${status}` : null,
      error.code ? `code=${error.code}` : null,
      apiMessage ? `api=${apiMessage}` : null,
      error.message ? `msg=${error.message}` : null,
    ].filter(Boolean).join(' ');
  }
  if (error instanceof ServiceError) {
    return `${error.name}[${error.code}]: ${error.message}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Network failures, timeouts, 429 and 5xx are worth retrying; other client errors are not.
 */
export function isTransientHttpError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;
  const status = error.response?.status;
  if (status === undefined) return true;
  return status === 408 || status === 429 || status >= 500;
}
