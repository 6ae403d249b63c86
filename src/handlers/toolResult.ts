import type pino from 'pino';
import { toErrorPayload, type ErrorPayload } from '../mcp/errors';
import { formatError } from '../utils/errorFormatter';

export interface ToolResult {
  [key: string]: unknown;
  content: { type: 'text'; text: string }[];
  isError?: boolean;
}

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

export function payloadResult(payload: ErrorPayload): ToolResult {
  return { content: [{ type: 'text', text: formatError(payload.message) }], isError: true };
}

/**
 * Domain failures are reported to the caller as an error result rather than
 * thrown through the protocol.
 */
export function errorResult(error: unknown, logger: pino.Logger, context: string): ToolResult {
  const payload = toErrorPayload(error);
  logger.error({ error: payload }, `${context} failed`);
  return payloadResult(payload);
}
