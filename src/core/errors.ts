// src/core/errors.ts
export enum ErrorCode {
  NETWORK_ERROR = 'network_error',
  TIMEOUT = 'timeout',
  HTTP_ERROR = 'http_error',
  INVALID_URL = 'invalid_url',
  CONFIG_INVALID = 'config_invalid',
  MANIFEST_INVALID = 'manifest_invalid',
  RENDER_FAILED = 'render_failed',
  BROWSER_NOT_FOUND = 'browser_not_found',
  WRITE_FAILED = 'write_failed',
}

export class SitewatchError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SitewatchError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
    Object.setPrototypeOf(this, SitewatchError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

