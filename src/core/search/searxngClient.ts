import { Agent, interceptors, request, type Dispatcher } from 'undici';
import { z } from 'zod';
import type pino from 'pino';
import { getEnvironment } from '../../config/environment';
import { SAFESEARCH_LEVELS, type SafeSearchLevel } from '../../config/constants';
import { UpstreamAPIError } from '../../mcp/errors';
import { normalizeInstanceUrl } from '../../utils/urlValidator';
import { createChildLogger, generateCorrelationId, logger, withTiming } from '../../utils/logger';

export const INSTANCE_PROBE_TIMEOUT_MS = 5000;
const MAX_REDIRECTIONS = 5;

export const SearxngResultSchema = z
  .object({
    title: z.string().optional(),
    url: z.string().optional(),
    content: z.string().optional(),
  })
  .passthrough();

export const SearxngResponseSchema = z
  .object({
    results: z.array(SearxngResultSchema),
  })
  .passthrough();

export type SearxngResult = z.infer<typeof SearxngResultSchema>;
export type SearxngResponse = z.infer<typeof SearxngResponseSchema>;

export interface SearxngSearchParams {
  query: string;
  engine: string;
  language: string;
  safesearch: SafeSearchLevel;
  timeRange?: string;
}

export interface HttpReply {
  statusCode: number;
  contentType?: string;
  bodyText: string;
}

export type InstanceValidation = { valid: true; url: string } | { valid: false; reason: string };

export function buildSearchForm(params: SearxngSearchParams): Record<string, string> {
  const form: Record<string, string> = {
    q: params.query,
    engines: params.engine,
    format: 'json',
    safesearch: String(SAFESEARCH_LEVELS[params.safesearch]),
    language: params.language,
  };
  if (params.timeRange) {
    form.time_range = params.timeRange;
  }
  return form;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Single HTTP exchange with a timeout, following up to five redirects; the
 * body is always drained.
 */
export async function sendRequest(
  url: string,
  options: { method: 'GET' | 'POST'; form?: Record<string, string>; timeoutMs: number }
): Promise<HttpReply> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
  const dispatcher: Dispatcher = new Agent().compose(
    interceptors.redirect({ maxRedirections: MAX_REDIRECTIONS })
  );

  try {
    const res = await request(url, {
      method: options.method,
      headers: options.form
        ? { 'content-type': 'application/x-www-form-urlencoded', accept: 'application/json' }
        : { accept: 'application/json' },
      body: options.form ? new URLSearchParams(options.form).toString() : undefined,
      signal: controller.signal,
      dispatcher,
    });
    const bodyText = await res.body.text();
    return {
      statusCode: res.statusCode,
      contentType: headerValue(res.headers['content-type']),
      bodyText,
    };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new Error(`Request timed out after ${options.timeoutMs}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timeout);
    await dispatcher.close().catch((closeError: unknown) => {
      logger.warn({ error: closeError }, 'Failed to close HTTP dispatcher');
    });
  }
}

export function isSuccess(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SearxngClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: pino.Logger;

  constructor(baseUrl?: string, logger?: pino.Logger) {
    const env = getEnvironment();
    this.baseUrl = (baseUrl ?? env.SEARXNG_URL).replace(/\/+$/, '');
    this.timeoutMs = env.SEARCH_TIMEOUT_MS;
    this.logger = logger ?? createChildLogger(generateCorrelationId());
  }

  /**
   * POSTs the query form and falls back to a GET with the same fields when the
   * POST fails for any reason. Only the GET outcome is reported.
   */
  async search(params: SearxngSearchParams): Promise<SearxngResponse> {
    const form = buildSearchForm(params);
    const endpoint = `${this.baseUrl}/search`;

    this.logger.info(
      { query: params.query, engine: params.engine, timeRange: params.timeRange },
      'Querying SearXNG'
    );

    return withTiming(this.logger, 'searxng.search', async () => {
      let reply: HttpReply | null = null;
      try {
        reply = await sendRequest(endpoint, { method: 'POST', form, timeoutMs: this.timeoutMs });
        if (!isSuccess(reply.statusCode)) {
          this.logger.debug({ statusCode: reply.statusCode }, 'POST search failed, trying GET');
          reply = null;
        }
      } catch (error) {
        this.logger.debug({ error: describe(error) }, 'POST search threw, trying GET');
      }

      if (!reply) {
        const query = new URLSearchParams(form).toString();
        try {
          reply = await sendRequest(`${endpoint}?${query}`, {
            method: 'GET',
            timeoutMs: this.timeoutMs,
          });
        } catch (error) {
          throw new UpstreamAPIError(`Error performing search: ${describe(error)}`, 'searxng');
        }
      }

      if (!isSuccess(reply.statusCode)) {
        throw new UpstreamAPIError('Error performing search', 'searxng', reply.statusCode);
      }

      return this.parseResponse(reply.bodyText);
    });
  }

  private parseResponse(bodyText: string): SearxngResponse {
    let body: unknown;
    try {
      body = JSON.parse(bodyText);
    } catch {
      throw new UpstreamAPIError(
        'Error parsing search results. The SearXNG instance returned invalid data.',
        'searxng'
      );
    }

    const parsed = SearxngResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamAPIError(
        'Unexpected response structure from the SearXNG instance',
        'searxng'
      );
    }

    this.logger.info({ resultCount: parsed.data.results.length }, 'SearXNG search completed');
    return parsed.data;
  }
}

/**
 * Checks that a user-supplied URL answers like a SearXNG instance. On success
 * returns the normalized URL to use for the search.
 */
export async function validateInstance(
  input: string,
  logger?: pino.Logger
): Promise<InstanceValidation> {
  if (!input.trim()) {
    return { valid: false, reason: 'No URL provided' };
  }

  let url: string;
  try {
    url = normalizeInstanceUrl(input);
  } catch (error) {
    return { valid: false, reason: describe(error) };
  }

  const log = logger ?? createChildLogger(generateCorrelationId());

  try {
    const home = await sendRequest(`${url}/`, {
      method: 'GET',
      timeoutMs: INSTANCE_PROBE_TIMEOUT_MS,
    });
    if (!isSuccess(home.statusCode)) {
      throw new Error(`HTTP ${home.statusCode}`);
    }

    const probe = await sendRequest(`${url}/search?q=test&format=json`, {
      method: 'GET',
      timeoutMs: INSTANCE_PROBE_TIMEOUT_MS,
    });
    if (!isSuccess(probe.statusCode)) {
      throw new Error(`HTTP ${probe.statusCode}`);
    }

    const data: unknown = JSON.parse(probe.bodyText);
    if (typeof data === 'object' && data !== null && 'results' in data) {
      log.info({ url }, 'Validated SearXNG instance');
      return { valid: true, url };
    }

    log.warn({ url }, 'URL does not appear to be a SearXNG instance');
    return { valid: false, reason: "The provided URL doesn't appear to be a SearXNG instance" };
  } catch (error) {
    log.error({ url, error: describe(error) }, 'Failed to validate SearXNG instance');
    return { valid: false, reason: `Could not connect to SearXNG instance: ${describe(error)}` };
  }
}
