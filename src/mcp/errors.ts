import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

export type ErrorKind =
  | 'fetch'
  | 'parse'
  | 'upstream'
  | 'validation'
  | 'configuration'
  | 'internal';

export interface ErrorPayload {
  kind: ErrorKind;
  message: string;
}

export interface FetchErrorDetails {
  url?: string;
  statusCode?: number;
  timeoutMs?: number;
}

/**
 * Network failure, timeout or non-2xx status while fetching a target page.
 */
export class FetchError extends McpError {
  readonly url?: string;
  readonly statusCode?: number;
  readonly timedOut: boolean;

  constructor(message: string, details: FetchErrorDetails = {}) {
    const statusInfo = details.statusCode ? ` (status: ${details.statusCode})` : '';
    const timeoutInfo = details.timeoutMs ? ` (timeout: ${details.timeoutMs}ms)` : '';
    const urlInfo = details.url ? ` for URL: ${details.url}` : '';
    super(ErrorCode.InternalError, `Fetch failed: ${message}${statusInfo}${timeoutInfo}${urlInfo}`);
    this.name = 'FetchError';
    this.url = details.url;
    this.statusCode = details.statusCode;
    this.timedOut = details.timeoutMs !== undefined;
  }
}

export class ParseError extends McpError {
  constructor(message: string) {
    super(ErrorCode.InternalError, `Parse error: ${message}`);
    this.name = 'ParseError';
  }
}

export type UpstreamService = 'searxng' | 'llm';

/**
 * The search backend or the completion API answered with a non-2xx status or
 * a body that could not be understood.
 */
export class UpstreamAPIError extends McpError {
  readonly service: UpstreamService;
  readonly statusCode?: number;

  constructor(message: string, service: UpstreamService, statusCode?: number) {
    const statusInfo = statusCode ? ` (status: ${statusCode})` : '';
    super(ErrorCode.InternalError, `Upstream ${service} error: ${message}${statusInfo}`);
    this.name = 'UpstreamAPIError';
    this.service = service;
    this.statusCode = statusCode;
  }
}

export class ValidationError extends McpError {
  constructor(message: string) {
    super(ErrorCode.InvalidParams, `Validation error: ${message}`);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends McpError {
  constructor(message: string) {
    super(ErrorCode.InternalError, `Configuration error: ${message}`);
    this.name = 'ConfigurationError';
  }
}

export function handleMcpError(error: unknown, context?: string): McpError {
  if (error instanceof McpError) {
    return error;
  }

  const prefix = context ? `${context}: ` : '';

  if (error instanceof Error) {
    return new McpError(ErrorCode.InternalError, `${prefix}${error.message}`);
  }

  return new McpError(ErrorCode.InternalError, `${prefix}Unknown error occurred`);
}

// McpError prefixes its message with "MCP error <code>: "
function stripMcpPrefix(message: string): string {
  return message.replace(/^MCP error -?\d+: /, '');
}

export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof z.ZodError) {
    const issues = error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return { kind: 'validation', message: `Invalid input: ${issues.join('; ')}` };
  }

  const kind: ErrorKind =
    error instanceof FetchError
      ? 'fetch'
      : error instanceof ParseError
        ? 'parse'
        : error instanceof UpstreamAPIError
          ? 'upstream'
          : error instanceof ValidationError
            ? 'validation'
            : error instanceof ConfigurationError
              ? 'configuration'
              : 'internal';

  if (error instanceof Error) {
    return { kind, message: stripMcpPrefix(error.message) };
  }

  return { kind, message: `Unexpected error: ${String(error)}` };
}
