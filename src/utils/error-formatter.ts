/**
 * Error formatting utilities for user-friendly error messages
 */

import {
  AuthError,
  InputError,
  NetworkError,
  NotFoundError,
  QuotaExceededError,
  RateLimitError,
  UpstreamError,
  type UpstreamService
} from '../errors.js';

interface FormattedError {
  message: string;
  suggestion?: string;
  technical?: string;
}

const SERVICE_NAMES: Record<UpstreamService, string> = {
  setlistfm: 'setlist.fm',
  youtube: 'YouTube'
};

/**
 * Format error for user display with context and suggestions
 */
export function formatUserError(error: unknown, context: string): string {
  const formatted = parseError(error, context);

  let message = formatted.message;

  if (formatted.suggestion) {
    message += ` | Suggestion: ${formatted.suggestion}`;
  }

  if (formatted.technical) {
    message += ` | Technical: ${formatted.technical}`;
  }

  return message;
}

function parseUpstreamError(error: UpstreamError, context: string): FormattedError {
  const service = SERVICE_NAMES[error.service];
  const technical = extractTechnicalDetails(error.message);

  if (error instanceof NotFoundError) {
    return {
      message: `${service} could not find the requested resource while ${context}`,
      suggestion: 'Check the setlist URL. The setlist may have been removed or merged.',
      technical
    };
  }

  if (error instanceof RateLimitError) {
    return {
      message: `Rate limited by ${service} while ${context}`,
      suggestion: 'Wait a few minutes before retrying.',
      technical
    };
  }

  if (error instanceof QuotaExceededError) {
    return {
      message: `YouTube API quota exhausted while ${context}`,
      suggestion: 'Daily quota resets at midnight Pacific time. Cached matches make the next run cheaper.',
      technical
    };
  }

  if (error instanceof AuthError) {
    return {
      message: `Authentication with ${service} failed while ${context}`,
      suggestion: error.service === 'youtube'
        ? 'Check GOOGLE_CLIENT_SECRET_FILE, or delete the stored token file to authorize again.'
        : 'Check SETLISTFM_API_KEY is set and valid.',
      technical
    };
  }

  if (error instanceof NetworkError) {
    return {
      message: `Could not reach ${service} while ${context}`,
      suggestion: 'Check your internet connection and try again.',
      technical
    };
  }

  return {
    message: `${service} request failed while ${context}`,
    suggestion: error.status && error.status >= 500
      ? `${service} is having trouble. Try again later.`
      : 'Check logs for details (LOG_LEVEL=debug).',
    technical
  };
}

/**
 * Parse error and provide user-friendly message with context
 */
function parseError(error: unknown, context: string): FormattedError {
  if (error instanceof InputError) {
    return {
      message: `Invalid input while ${context}: ${error.message}`,
      suggestion: 'Pass a setlist page URL like https://www.setlist.fm/setlist/<artist>/<year>/<venue>-<id>.html',
      technical: undefined
    };
  }

  if (error instanceof UpstreamError) {
    return parseUpstreamError(error, context);
  }

  const errorStr = error instanceof Error ? error.message : String(error);

  // Timeout errors
  if (errorStr.includes('timeout') || errorStr.includes('TimeoutError') || errorStr.includes('ETIMEDOUT')) {
    return {
      message: `Request timed out while ${context}`,
      suggestion: 'The service may be slow right now. Try again in a few minutes.',
      technical: extractTechnicalDetails(errorStr)
    };
  }

  // Network errors
  if (errorStr.includes('ENOTFOUND') || errorStr.includes('getaddrinfo') || errorStr.includes('ECONNREFUSED')) {
    return {
      message: `Network error while ${context}`,
      suggestion: 'Check your internet connection and DNS resolution.',
      technical: extractUrl(errorStr) ?? extractTechnicalDetails(errorStr)
    };
  }

  // File system errors (token, cache and client secret files)
  if (errorStr.includes('EACCES') || errorStr.includes('EPERM')) {
    return {
      message: `Permission denied while ${context}`,
      suggestion: 'Check permissions of the token, cache and quota files.',
      technical: extractTechnicalDetails(errorStr)
    };
  }

  // Generic error
  return {
    message: `Error ${context}: ${shortenMessage(errorStr)}`,
    suggestion: 'Check logs for details (LOG_LEVEL=debug). If persistent, report the issue with error details.',
    technical: undefined
  };
}

/**
 * Extract a URL from an error message
 */
function extractUrl(errorStr: string): string | undefined {
  const urlMatch = errorStr.match(/https?:\/\/[^\s"]+/);
  if (urlMatch) {
    // Truncate query params for readability
    const url = urlMatch[0];
    const baseUrl = url.split('?')[0];
    return url.length > 80 ? baseUrl : url;
  }
  return undefined;
}

/**
 * Extract technical details without full stack trace
 */
function extractTechnicalDetails(errorStr: string): string | undefined {
  // Remove stack traces
  const cleaned = errorStr.split('\n')[0];

  // Extract error type and first part of message
  const match = cleaned.match(/\[(\w+Error)\]:\s*(.+?)(?:\s*at\s|$)/);
  if (match) {
    return `${match[1]}: ${shortenMessage(match[2])}`;
  }

  return shortenMessage(cleaned);
}

/**
 * Shorten long error messages
 */
function shortenMessage(msg: string): string {
  const maxLength = 150;
  if (msg.length <= maxLength) {
    return msg;
  }
  return msg.substring(0, maxLength) + '...';
}
