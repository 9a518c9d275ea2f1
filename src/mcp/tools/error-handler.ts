/**
 * Shared error handler for MCP tools.
 *
 * Failures are first classified (HTTP-layer vs. anything else), then
 * rendered as text. No exception leaves a tool handler.
 */

import { HomeboxApiError } from '../../services/homebox/index.js';
import {
  createConfigurationError,
  createRequestError,
  createUnexpectedError,
  formatErrorForMcp,
  type McpToolError,
} from '../../lib/errors.js';
import { logger } from '../../lib/logger.js';

/**
 * A tool failure, classified.
 *
 * - api: non-2xx response, network failure or timeout
 * - unexpected: malformed payloads and everything else
 */
export type ToolFailure =
  | { kind: 'api'; error: HomeboxApiError }
  | { kind: 'unexpected'; message: string };

export function classifyFailure(error: unknown): ToolFailure {
  if (error instanceof HomeboxApiError) {
    return { kind: 'api', error };
  }
  return {
    kind: 'unexpected',
    message: error instanceof Error ? error.message : String(error),
  };
}

function toToolError(failure: ToolFailure, action: string): McpToolError {
  switch (failure.kind) {
    case 'api':
      return createRequestError(action, failure.error.message, failure.error.status);
    case 'unexpected':
      return createUnexpectedError(failure.message);
  }
}

/**
 * Renders a classified failure.
 *
 * @param failure - The classified failure
 * @param action - What the tool was doing, e.g. "searching items"
 */
export function describeFailure(
  failure: ToolFailure,
  action: string
): { content: { type: 'text'; text: string }[]; isError: true } {
  return formatErrorForMcp(toToolError(failure, action));
}

/**
 * Handles errors from tool execution and returns an MCP-compatible error
 * response.
 *
 * @param error - The caught error
 * @param toolName - Name of the tool for logging
 * @param action - Phrase used in the returned text, e.g. "listing locations"
 */
export function handleToolError(
  error: unknown,
  toolName: string,
  action: string
): { content: { type: 'text'; text: string }[]; isError: true } {
  const failure = classifyFailure(error);
  const toolError = toToolError(failure, action);

  logger.error(`${toolName} error`, {
    errorCode: toolError.errorCode,
    status: failure.kind === 'api' ? failure.error.status : undefined,
    error: failure.kind === 'api' ? failure.error.message : failure.message,
  });

  return formatErrorForMcp(toolError);
}

/**
 * Response for a call made before HOMEBOX_URL is set.
 */
export function handleMissingConfiguration(
  toolName: string
): { content: { type: 'text'; text: string }[]; isError: true } {
  const toolError = createConfigurationError();
  logger.warn(`${toolName} called without HOMEBOX_URL configured`, {
    errorCode: toolError.errorCode,
  });
  return formatErrorForMcp(toolError);
}
