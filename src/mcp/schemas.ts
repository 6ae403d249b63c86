import { z } from 'zod';
import {
  DEFAULT_RESULTS,
  MAX_RESULTS,
  RESULT_FORMATS,
  SEARCH_ENGINES,
  TIME_RANGES,
} from '../config/constants';

// web.search tool schemas
export const SearchInput = z.object({
  query: z.string().trim().min(1, 'Query must not be empty').describe('The search query'),
  engine: z
    .enum(SEARCH_ENGINES)
    .optional()
    .describe('Search engine SearXNG should query (defaults to the server setting)'),
  format: z
    .enum(RESULT_FORMATS)
    .default('summary')
    .describe(
      'Result format: "summary" (title, URL, snippet), "full" (extracted page content) or "full_with_ai_summary" (LLM summary of each page)'
    ),
  timeRange: z
    .enum(TIME_RANGES)
    .optional()
    .describe('Restrict results to the last day, week, month or year'),
  language: z
    .string()
    .min(1)
    .default('all')
    .describe('Language filter for results, e.g. "en" or "all" (default)'),
  safesearch: z
    .enum(['Off', 'Moderate', 'Strict'])
    .default('Off')
    .describe('Safe search level (default: Off)'),
  maxResults: z
    .number()
    .int()
    .min(1)
    .max(MAX_RESULTS)
    .default(DEFAULT_RESULTS)
    .describe(`Maximum number of results to return (1-${MAX_RESULTS}, default: ${DEFAULT_RESULTS})`),
  searxngUrl: z
    .string()
    .optional()
    .describe('Custom SearXNG instance URL; validated before use. Defaults to the server setting'),
});

// web.scrape tool schemas
export const ScrapeInput = z.object({
  url: z.string().describe('URL of the page to scrape; https:// is assumed when no scheme is given'),
  summarize: z
    .boolean()
    .default(false)
    .describe('Return an LLM-generated summary instead of the full content (default: false)'),
  includeImages: z
    .boolean()
    .default(false)
    .describe('Keep images as markdown image links (default: false)'),
});

// searxng.diagnostics tool schemas
export const DiagnosticsInput = z.object({
  searxngUrl: z
    .string()
    .optional()
    .describe('SearXNG instance to test; defaults to the configured instance'),
});

// Type exports
export type SearchInputType = z.infer<typeof SearchInput>;
export type ScrapeInputType = z.infer<typeof ScrapeInput>;
export type DiagnosticsInputType = z.infer<typeof DiagnosticsInput>;
