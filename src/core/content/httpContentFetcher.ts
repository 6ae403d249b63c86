import { Agent, interceptors, request, type Dispatcher } from 'undici';
import { brotliDecompressSync, gunzipSync, inflateSync } from 'zlib';
import { getEnvironment } from '../../config/environment';
import { BROWSER_USER_AGENT } from '../../config/constants';
import { withTiming, createChildLogger, generateCorrelationId } from '../../utils/logger';
import { normalizeTargetUrl } from '../../utils/urlValidator';
import { FetchError } from '../../mcp/errors';

const MAX_REDIRECTIONS = 5;

export interface FetchOptions {
  timeoutMs?: number;
  correlationId?: string;
}

export interface FetchResult {
  url: string;
  statusCode: number;
  bodyText: string;
  contentType?: string;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

function decodeBody(buf: Buffer, encoding: string): Buffer {
  if (encoding.includes('br')) return brotliDecompressSync(buf);
  if (encoding.includes('gzip')) return gunzipSync(buf);
  if (encoding.includes('deflate')) return inflateSync(buf);
  return buf;
}

/**
 * Single GET of a target page with a browser user agent. A missing scheme
 * defaults to https. Timeouts, transport failures and non-2xx statuses all
 * surface as FetchError; nothing is retried here.
 */
export async function fetchPage(url: string, options: FetchOptions = {}): Promise<FetchResult> {
  const targetUrl = normalizeTargetUrl(url);
  const timeoutMs = options.timeoutMs ?? getEnvironment().PAGE_FETCH_TIMEOUT_MS;
  const log = createChildLogger(options.correlationId ?? generateCorrelationId());

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const dispatcher: Dispatcher = new Agent().compose(
    interceptors.redirect({ maxRedirections: MAX_REDIRECTIONS })
  );

  try {
    const res = await withTiming(
      log,
      'http.fetch',
      async () =>
        request(targetUrl, {
          method: 'GET',
          signal: controller.signal,
          dispatcher,
          headers: {
            'user-agent': BROWSER_USER_AGENT,
            accept:
              'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
            'accept-language': 'en-US,en;q=0.9',
            'accept-encoding': 'gzip, br, deflate',
          },
        }),
      { url: targetUrl }
    );

    const statusCode = res.statusCode;
    const encoding = (headerValue(res.headers['content-encoding']) ?? '').toLowerCase();
    const contentType = headerValue(res.headers['content-type']);

    const raw = Buffer.from(await res.body.arrayBuffer());

    if (statusCode < 200 || statusCode >= 300) {
      throw new FetchError('HTTP error', { url: targetUrl, statusCode });
    }

    const bodyText = decodeBody(raw, encoding).toString('utf8');
    log.debug({ statusCode, encoding, contentType, textLength: bodyText.length }, 'Page fetched');

    return { url: targetUrl, statusCode, bodyText, contentType };
  } catch (err) {
    if (err instanceof FetchError) {
      throw err;
    }
    if (controller.signal.aborted || (err instanceof Error && err.name === 'AbortError')) {
      throw new FetchError('Request timed out', { url: targetUrl, timeoutMs });
    }
    throw new FetchError(err instanceof Error ? err.message : String(err), { url: targetUrl });
  } finally {
    clearTimeout(timeout);
    await dispatcher.close().catch((closeError: unknown) => {
      log.warn({ error: closeError }, 'Failed to close HTTP dispatcher');
    });
  }
}
