/**
 * Centralized error utilities for MCP tools.
 *
 * Every tool failure ends up as plain text for the assistant host. The
 * text always carries the underlying error description; a suggestion is
 * appended where there is an obvious next step.
 */

/**
 * Error class for MCP tool errors.
 *
 * Carries the text returned to the host plus a code that is only logged.
 */
export class McpToolError extends Error {
  /** Text returned to the host */
  public readonly userMessage: string;

  /** Suggested action the assistant can take */
  public readonly suggestedAction?: string;

  /** Machine-readable error code, logged with every failure */
  public readonly errorCode: string;

  constructor(options: {
    userMessage: string;
    errorCode: string;
    suggestedAction?: string;
  }) {
    super(options.userMessage);
    this.name = 'McpToolError';
    this.userMessage = options.userMessage;
    this.errorCode = options.errorCode;
    this.suggestedAction = options.suggestedAction;
  }
}

export const CONFIGURATION_ERROR_MESSAGE =
  'Error: Homebox API URL is required. Please set HOMEBOX_URL in the server configuration.';

/**
 * Creates the fixed error returned when no Homebox URL is configured.
 */
export function createConfigurationError(): McpToolError {
  return new McpToolError({
    userMessage: CONFIGURATION_ERROR_MESSAGE,
    errorCode: 'NOT_CONFIGURED',
  });
}

/**
 * Suggestion for an HTTP-layer failure, keyed on status (0 = no response).
 */
function suggestionForStatus(status: number): string | undefined {
  if (status === 0) {
    return 'Check that HOMEBOX_URL points at a reachable Homebox instance.';
  }
  if (status === 401 || status === 403) {
    return 'Check CF_ACCESS_CLIENT_ID and CF_ACCESS_CLIENT_SECRET, or the access policy in front of Homebox.';
  }
  if (status === 404) {
    return 'Verify the ID is correct. Use search_items or list_locations to find valid IDs.';
  }
  return undefined;
}

/**
 * Creates an error for a failed request to the Homebox API.
 *
 * @param action - What the tool was doing, e.g. "searching items"
 * @param message - The underlying error description
 * @param status - HTTP status, or 0 when no response arrived
 */
export function createRequestError(
  action: string,
  message: string,
  status: number
): McpToolError {
  return new McpToolError({
    userMessage: `Error ${action}: ${message}`,
    errorCode: status === 0 ? 'REQUEST_FAILED' : `HTTP_${status}`,
    suggestedAction: suggestionForStatus(status),
  });
}

/**
 * Creates an error for anything that is not an HTTP-layer failure
 * (malformed JSON, unexpected payload shape, programming errors).
 */
export function createUnexpectedError(message: string): McpToolError {
  return new McpToolError({
    userMessage: `Unexpected error: ${message}`,
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
