import { PACKAGE_VERSION } from '../utils/version';

export const APP_NAME = 'searxng-scraper-mcp';
export const APP_VERSION = PACKAGE_VERSION;

// Sent to target pages; several sites refuse non-browser agents
export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const SEARCH_ENGINES = [
  'google',
  'bing',
  'brave',
  'duckduckgo',
  'yahoo',
  'qwant',
  'startpage',
] as const;

export const RESULT_FORMATS = ['summary', 'full', 'full_with_ai_summary'] as const;

export const TIME_RANGES = ['day', 'week', 'month', 'year'] as const;

export const SAFESEARCH_LEVELS = {
  Off: 0,
  Moderate: 1,
  Strict: 2,
} as const;

export type SafeSearchLevel = keyof typeof SAFESEARCH_LEVELS;

export const MAX_RESULTS = 10;
export const DEFAULT_RESULTS = 5;

export const QUALITY_THRESHOLDS = {
  CANDIDATE_MIN_TEXT: 200,
  STRIPPED_MIN_MARKDOWN: 500,
  REPARSED_MIN_MARKDOWN: 100,
} as const;

export const SUMMARY_REQUEST = {
  SYSTEM_INSTRUCTION:
    'You are a helpful assistant that summarizes web content accurately and concisely.',
  TEMPERATURE: 0.3,
  MAX_TOKENS: 1500,
} as const;

export const MCP_TOOL_DESCRIPTIONS = {
  WEB_SEARCH:
    'Search the web through a SearXNG metasearch instance. Three result formats: "summary" returns title, URL and snippet for each hit; "full" fetches every result page and returns its main content as markdown; "full_with_ai_summary" replaces each page with an LLM-generated summary (requires an API token on the server). Supports engine selection, time range, language and safe search filters.',
  WEB_SCRAPE:
    'Fetch a single web page and return its main content as markdown, with navigation, ads and other boilerplate removed. Set summarize to true to receive an LLM-generated summary instead of the full text. A missing scheme defaults to https.',
  DIAGNOSTICS:
    'Check connectivity to a SearXNG instance: base URL reachability, GET and POST search endpoints and JSON response shape. Defaults to the configured instance.',
} as const;
