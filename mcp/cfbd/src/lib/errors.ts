/**
 * Centralized error types.
 *
 * Tool-facing errors carry LLM-readable text; OAuth errors carry the
 * RFC 6749 error code and a short detail for the HTTP 400 body.
 */

import { logger } from './logger.js';

/**
 * Error class for MCP tool errors.
 *
 * Provides both user-facing messages (for LLM consumption) and internal
 * details (for debugging/logging).
 */
export class McpToolError extends Error {
  /** LLM-friendly error message (returned to the user) */
  public readonly userMessage: string;

  /** Internal details for debugging (logged, not returned) */
  public readonly internalDetails?: string;

  /** Whether the LLM should retry the operation */
  public readonly isRetryable: boolean;

  /** Suggested action the LLM can take */
  public readonly suggestedAction?: string;

  /** Machine-readable error code */
  public readonly errorCode?: string;

  constructor(options: {
    userMessage: string;
    internalDetails?: string;
    isRetryable?: boolean;
    suggestedAction?: string;
    errorCode?: string;
  }) {
    super(options.userMessage);
    this.name = 'McpToolError';
    this.userMessage = options.userMessage;
    this.internalDetails = options.internalDetails;
    this.isRetryable = options.isRetryable ?? false;
    this.suggestedAction = options.suggestedAction;
    this.errorCode = options.errorCode;
  }
}

/** Longest slice of an upstream error body echoed back to the caller */
const MAX_ERROR_BODY_LENGTH = 500;

/**
 * Non-2xx response from the College Football Data API.
 */
export class CfbdApiError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly body: string;

  constructor(options: { status: number; statusText: string; url: string; body: string }) {
    super(`CFBD API responded ${options.status} ${options.statusText}`);
    this.name = 'CfbdApiError';
    this.status = options.status;
    this.statusText = options.statusText;
    this.url = options.url;
    this.body = options.body;
  }
}

/**
 * DNS, connection or timeout failure before any HTTP response arrived.
 */
export class CfbdNetworkError extends Error {
  public readonly url: string;

  constructor(message: string, url: string) {
    super(message);
    this.name = 'CfbdNetworkError';
    this.url = url;
  }
}

/**
 * Maps an upstream HTTP status to the text handed back to the LLM.
 *
 * Clients pattern-match on these strings; keep them stable.
 */
export function describeUpstreamStatus(
  status: number,
  details: { statusText?: string; url?: string; body?: string } = {}
): string {
  switch (status) {
    case 401:
      return '401: API authentication failed. Please check your API key.';
    case 403:
      return '403: API access forbidden. Please check your permission.';
    case 429:
      return '429: Rate limit exceeded. Please try again later.';
    default: {
      const reason = details.statusText ? `${status} ${details.statusText}` : String(status);
      const where = details.url ? ` for url '${details.url}'` : '';
      const body = details.body ? `: ${details.body.slice(0, MAX_ERROR_BODY_LENGTH)}` : '';
      return `API Error: ${reason}${where}${body}`;
    }
  }
}

/**
 * Converts an upstream failure into a tool error with the stable message.
 */
export function createUpstreamError(error: CfbdApiError | CfbdNetworkError): McpToolError {
  if (error instanceof CfbdNetworkError) {
    return new McpToolError({
      userMessage: `Network error: ${error.message}`,
      internalDetails: error.url,
      isRetryable: true,
      errorCode: 'NETWORK_ERROR',
    });
  }

  const errorCode =
    error.status === 401
      ? 'AUTH_ERROR'
      : error.status === 403
        ? 'FORBIDDEN'
        : error.status === 429
          ? 'RATE_LIMITED'
          : 'API_ERROR';

  return new McpToolError({
    userMessage: describeUpstreamStatus(error.status, error),
    internalDetails: error.url,
    isRetryable: error.status === 429 || error.status >= 500,
    errorCode,
  });
}

/**
 * Creates an input validation error for tool arguments.
 */
export function createValidationError(issue: string): McpToolError {
  return new McpToolError({
    userMessage: `Validation error: ${issue}`,
    isRetryable: false,
    suggestedAction: 'Correct the arguments and try again.',
    errorCode: 'VALIDATION_ERROR',
  });
}

/**
 * Creates an error for unexpected/unknown errors.
 *
 * Logs internal details but returns a generic user message.
 */
export function createUnexpectedError(error: unknown): McpToolError {
  const internalDetails = error instanceof Error ? error.message : String(error);

  logger.error('Unexpected error occurred', { internalDetails });

  return new McpToolError({
    userMessage: 'An unexpected error occurred. Please try again.',
    internalDetails,
    isRetryable: false,
    suggestedAction: 'If the problem persists, contact support.',
    errorCode: 'UNEXPECTED_ERROR',
  });
}

/**
 * Formats an McpToolError into an MCP-compatible error response.
 */
export function formatErrorForMcp(
  error: McpToolError
): { content: { type: 'text'; text: string }[]; isError: true } {
  let text = error.userMessage;

  if (error.suggestedAction) {
    text += `\n\nSuggestion: ${error.suggestedAction}`;
  }

  return {
    content: [{ type: 'text' as const, text }],
    isError: true,
  };
}

// --- OAuth errors ---

type OAuthErrorCode =
  | 'invalid_request'
  | 'invalid_grant'
  | 'unsupported_grant_type'
  | 'unsupported_response_type';

/**
 * Base class for authorization endpoint failures. Always an HTTP 400.
 */
export class OAuthError extends Error {
  public readonly errorCode: OAuthErrorCode;
  public readonly status = 400;

  constructor(errorCode: OAuthErrorCode, detail: string) {
    super(detail);
    this.name = 'OAuthError';
    this.errorCode = errorCode;
  }

  toResponseObject(): { error: OAuthErrorCode; detail: string } {
    return { error: this.errorCode, detail: this.message };
  }
}

export class InvalidRequestError extends OAuthError {
  constructor(detail: string) {
    super('invalid_request', detail);
    this.name = 'InvalidRequestError';
  }
}

export class UnsupportedGrantTypeError extends OAuthError {
  constructor(grantType: string) {
    super('unsupported_grant_type', `Unsupported grant_type: ${grantType}`);
    this.name = 'UnsupportedGrantTypeError';
  }
}

export class UnsupportedResponseTypeError extends OAuthError {
  constructor(responseType: string) {
    super('unsupported_response_type', `Unsupported response_type: ${responseType}`);
    this.name = 'UnsupportedResponseTypeError';
  }
}

/** Unknown, expired or already consumed authorization code */
export class InvalidGrantError extends OAuthError {
  constructor() {
    super('invalid_grant', 'Invalid code');
    this.name = 'InvalidGrantError';
  }
}

export class ClientMismatchError extends OAuthError {
  constructor() {
    super('invalid_grant', 'Client ID or redirect URI mismatch');
    this.name = 'ClientMismatchError';
  }
}

export class PkceFailureError extends OAuthError {
  constructor() {
    super('invalid_grant', 'PKCE verification failed');
    this.name = 'PkceFailureError';
  }
}
