import { request } from 'undici';
import { z } from 'zod';
import type pino from 'pino';
import { getEnvironment } from '../../config/environment';
import { APP_NAME, SUMMARY_REQUEST } from '../../config/constants';
import { UpstreamAPIError } from '../../mcp/errors';
import { createChildLogger, generateCorrelationId, withTiming } from '../../utils/logger';

export interface SummarizerConfig {
  apiUrl: string;
  apiToken: string;
  model: string;
  timeoutMs: number;
  maxInputChars: number;
}

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
}

const ChatCompletionResponse = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
});

const ErrorResponse = z.object({
  error: z.object({ message: z.string() }),
});

export function buildSummaryPrompt(text: string, title: string, url: string, maxChars: number) {
  return `Please provide a comprehensive summary of the following web content:
Title: ${title}
URL: ${url}

The summary should:
1. Focus on the main ideas, findings, and important details
2. Be well-structured with appropriate headings
3. Retain key facts and statistics
4. Be about 30% of the original length (or shorter if the content is very long)
5. Present information in clear, concise language

Here's the content to summarize:

${text.slice(0, maxChars)}
`;
}

/**
 * Client for an OpenAI-compatible chat completion endpoint (OpenAI, OpenRouter,
 * or any local server speaking the same protocol).
 */
export class Summarizer {
  private readonly config: SummarizerConfig;
  private readonly logger?: pino.Logger;

  constructor(config: SummarizerConfig, logger?: pino.Logger) {
    if (!config.apiToken) {
      throw new UpstreamAPIError('API token is required for summarization', 'llm');
    }
    this.config = { ...config, apiUrl: config.apiUrl.replace(/\/+$/, '') };
    this.logger = logger;
  }

  get model(): string {
    return this.config.model;
  }

  private isOpenRouter(): boolean {
    return this.config.apiUrl.includes('openrouter.ai');
  }

  private buildHeaders(sourceUrl: string): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${this.config.apiToken}`,
    };
    if (this.isOpenRouter()) {
      // OpenRouter attributes usage through these two headers
      headers['HTTP-Referer'] = sourceUrl;
      headers['X-Title'] = APP_NAME;
    }
    return headers;
  }

  /**
   * Returns the first choice's message content verbatim.
   */
  async summarize(text: string, title: string, url: string): Promise<string> {
    const log = this.logger ?? createChildLogger(generateCorrelationId());
    const payload: ChatCompletionRequest = {
      model: this.config.model,
      messages: [
        { role: 'system', content: SUMMARY_REQUEST.SYSTEM_INSTRUCTION },
        {
          role: 'user',
          content: buildSummaryPrompt(text, title, url, this.config.maxInputChars),
        },
      ],
      temperature: SUMMARY_REQUEST.TEMPERATURE,
      max_tokens: SUMMARY_REQUEST.MAX_TOKENS,
    };

    log.info({ url, model: this.config.model }, 'Sending summarization request');

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await withTiming(log, 'llm.summarize', async () =>
        request(`${this.config.apiUrl}/chat/completions`, {
          method: 'POST',
          headers: this.buildHeaders(url),
          body: JSON.stringify(payload),
          signal: controller.signal,
        })
      );

      const bodyText = await response.body.text();

      if (response.statusCode < 200 || response.statusCode >= 300) {
        throw new UpstreamAPIError(
          this.describeFailure(bodyText, response.statusCode),
          'llm',
          response.statusCode
        );
      }

      let body: unknown;
      try {
        body = JSON.parse(bodyText);
      } catch {
        throw new UpstreamAPIError('Invalid JSON response from API', 'llm');
      }

      const parsed = ChatCompletionResponse.safeParse(body);
      if (!parsed.success) {
        throw new UpstreamAPIError('Invalid response structure from API', 'llm');
      }

      const summary = parsed.data.choices[0].message.content;
      log.info({ url, summaryLength: summary.length }, 'Summary generated');
      return summary;
    } catch (error) {
      if (error instanceof UpstreamAPIError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new UpstreamAPIError(
          `Request timed out after ${this.config.timeoutMs}ms`,
          'llm'
        );
      }
      const message = error instanceof Error ? error.message : 'Unknown network error';
      throw new UpstreamAPIError(`API request error: ${message}`, 'llm');
    } finally {
      clearTimeout(timeout);
    }
  }

  private describeFailure(bodyText: string, statusCode: number): string {
    let body: unknown;
    try {
      body = JSON.parse(bodyText);
    } catch {
      return `HTTP ${statusCode}`;
    }
    const parsed = ErrorResponse.safeParse(body);
    return parsed.success ? parsed.data.error.message : `HTTP ${statusCode}`;
  }
}

/**
 * Summarizer configured from the environment, or null when no API token is set.
 */
export function createSummarizer(logger?: pino.Logger): Summarizer | null {
  const env = getEnvironment();
  if (!env.OPENAI_API_TOKEN) {
    return null;
  }

  return new Summarizer(
    {
      apiUrl: env.OPENAI_API_URL,
      apiToken: env.OPENAI_API_TOKEN,
      model: env.OPENAI_MODEL,
      timeoutMs: env.SUMMARY_TIMEOUT_MS,
      maxInputChars: env.SUMMARY_MAX_INPUT_CHARS,
    },
    logger
  );
}
