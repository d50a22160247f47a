/**
 * Shared error handler for MCP tools.
 * Converts errors raised while serving a tool call into LLM-readable results.
 */

import {
  CfbdApiError,
  CfbdNetworkError,
  McpToolError,
  createUpstreamError,
  createUnexpectedError,
  formatErrorForMcp,
} from '../../lib/errors.js';
import { logger, errorMessage } from '../../lib/logger.js';

function toToolError(error: unknown): McpToolError {
  if (error instanceof CfbdApiError || error instanceof CfbdNetworkError) {
    return createUpstreamError(error);
  }
  if (error instanceof McpToolError) {
    return error;
  }
  return createUnexpectedError(error);
}

/**
 * Handles errors from tool execution and returns an MCP-compatible error
 * response. Only the user message reaches the caller; the code, retry hint
 * and internal details go to the log.
 *
 * @param error - The caught error
 * @param toolName - Name of the tool for logging
 */
export function handleToolError(
  error: unknown,
  toolName: string
): { content: { type: 'text'; text: string }[]; isError: true } {
  const toolError = toToolError(error);

  logger.error(`${toolName} error`, {
    error: errorMessage(error),
    errorCode: toolError.errorCode,
    retryable: toolError.isRetryable,
    internalDetails: toolError.internalDetails,
  });

  return formatErrorForMcp(toolError);
}
