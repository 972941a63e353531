/**
 * Error taxonomy for the CLI and its collaborators.
 *
 * InputError means the user gave us something unusable. UpstreamError and its
 * subclasses mean setlist.fm or YouTube refused or failed a request. Songs
 * without a match are not errors at all.
 */

export type UpstreamService = 'setlistfm' | 'youtube';

export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

export interface UpstreamErrorOptions {
  status?: number;
  cause?: unknown;
}

export class UpstreamError extends Error {
  readonly service: UpstreamService;
  readonly status?: number;

  constructor(service: UpstreamService, message: string, options: UpstreamErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'UpstreamError';
    this.service = service;
    this.status = options.status;
  }
}

export class NotFoundError extends UpstreamError {
  constructor(service: UpstreamService, message: string, options: UpstreamErrorOptions = {}) {
    super(service, message, { status: 404, ...options });
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends UpstreamError {
  constructor(service: UpstreamService, message: string, options: UpstreamErrorOptions = {}) {
    super(service, message, { status: 429, ...options });
    this.name = 'RateLimitError';
  }
}

export class AuthError extends UpstreamError {
  constructor(service: UpstreamService, message: string, options: UpstreamErrorOptions = {}) {
    super(service, message, options);
    this.name = 'AuthError';
  }
}

export class QuotaExceededError extends UpstreamError {
  constructor(service: UpstreamService, message: string, options: UpstreamErrorOptions = {}) {
    super(service, message, options);
    this.name = 'QuotaExceededError';
  }
}

export class NetworkError extends UpstreamError {
  constructor(service: UpstreamService, message: string, options: UpstreamErrorOptions = {}) {
    super(service, message, options);
    this.name = 'NetworkError';
  }
}

export const isUpstreamError = (error: unknown): error is UpstreamError =>
  error instanceof UpstreamError;
