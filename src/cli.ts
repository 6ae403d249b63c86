#!/usr/bin/env node

import { parseArgs } from 'util';
import { SearxngScraperServer } from './server';
import { installShutdownHandlers } from './index';
import { APP_NAME, APP_VERSION } from './config/constants';
import { getEnvironment } from './config/environment';
import { logger, createChildLogger, generateCorrelationId } from './utils/logger';
import { SearchInput } from './mcp/schemas';
import { performSearch } from './core/search/searchService';
import { formatDiagnosticsReport, runDiagnostics } from './core/search/diagnostics';
import { formatScrapedPage, scrapeWebpage } from './core/content/pageScraper';
import {
  DEFAULT_RENDER_OPTIONS,
  DETAILED_RENDER_OPTIONS,
} from './core/content/extractors/markdownConverter';
import { toErrorPayload } from './mcp/errors';
import { formatError } from './utils/errorFormatter';

const HELP_TEXT = `
${APP_NAME} v${APP_VERSION}

A Model Context Protocol server for SearXNG metasearch and web page scraping.

Usage: ${APP_NAME} [command] [options]

Commands:
  server         Start the MCP server (default)
  health         Check configuration and SearXNG connectivity
  search <query> Run a search and print the formatted results
  scrape <url>   Scrape one page and print its content as markdown
  version        Show version information
  help           Show this help message

Search Options:
  --engine <name>         Search engine (default: DEFAULT_ENGINE)
  --format <format>       summary | full | full_with_ai_summary (default: summary)
  --max-results <n>       Number of results (default: 5)
  --time-range <range>    day | week | month | year
  --language <code>       Language filter (default: all)
  --safesearch <level>    Off | Moderate | Strict (default: Off)
  --url <instance>        Custom SearXNG instance URL

Scrape Options:
  --summarize            Summarize the page with the configured LLM
  --images               Keep images in the markdown output

Options:
  --help, -h     Show help
  --version      Show version
  --verbose, -v  Verbose output

Examples:
  ${APP_NAME} server
  ${APP_NAME} health --url http://localhost:8080
  ${APP_NAME} search "rust async runtimes" --format full --max-results 3
  ${APP_NAME} scrape en.wikipedia.org/wiki/Metasearch_engine --summarize
`;

interface CliValues {
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
  url?: string;
  engine?: string;
  format?: string;
  'max-results'?: string;
  'time-range'?: string;
  language?: string;
  safesearch?: string;
  summarize?: boolean;
  images?: boolean;
}

interface ParsedArgs {
  values: CliValues;
  positionals: string[];
}

function parseCliArgs(): ParsedArgs {
  try {
    const { values, positionals } = parseArgs({
      args: process.argv.slice(2),
      options: {
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean' },
        verbose: { type: 'boolean', short: 'v' },
        url: { type: 'string' },
        engine: { type: 'string' },
        format: { type: 'string' },
        'max-results': { type: 'string' },
        'time-range': { type: 'string' },
        language: { type: 'string' },
        safesearch: { type: 'string' },
        summarize: { type: 'boolean' },
        images: { type: 'boolean' },
      },
      allowPositionals: true,
    });
    return { values, positionals };
  } catch (error) {
    logger.error({ error }, 'Invalid command line arguments');
    console.error('Error parsing arguments. Use --help for usage information.');
    process.exit(1);
  }
}

function fail(error: unknown): never {
  console.error(formatError(toErrorPayload(error).message));
  process.exit(1);
}

async function runHealthCheck(values: CliValues): Promise<void> {
  console.log('🔍 Health Check:');
  try {
    const env = getEnvironment();
    console.log('  ✅ Environment variables validated');
    console.log(`  🔎 SearXNG instance: ${values.url ?? env.SEARXNG_URL}`);
    console.log(
      env.OPENAI_API_TOKEN
        ? `  🧠 Summaries enabled (${env.OPENAI_MODEL})`
        : '  ⚠️  Summaries disabled (OPENAI_API_TOKEN not set)'
    );
  } catch (error) {
    console.error(
      '❌ Health check failed:',
      error instanceof Error ? error.message : 'Unknown error'
    );
    process.exit(1);
  }

  const report = await runDiagnostics(values.url);
  if (values.verbose) {
    console.log(formatDiagnosticsReport(report));
  } else {
    for (const check of report.checks) {
      const icon = check.status === 'ok' ? '✅' : check.status === 'warn' ? '⚠️ ' : '❌';
      console.log(`  ${icon} ${check.name}: ${check.detail}`);
    }
  }

  if (report.checks.some(check => check.status === 'fail')) {
    process.exit(1);
  }
  console.log('🚀 System ready');
}

async function runSearch(query: string | undefined, values: CliValues): Promise<void> {
  const correlationId = generateCorrelationId();
  try {
    const input = SearchInput.parse({
      query: query ?? '',
      engine: values.engine,
      format: values.format,
      timeRange: values['time-range'],
      language: values.language,
      safesearch: values.safesearch,
      maxResults: values['max-results'] ? Number(values['max-results']) : undefined,
      searxngUrl: values.url,
    });
    console.log(await performSearch(input, createChildLogger(correlationId), { correlationId }));
  } catch (error) {
    fail(error);
  }
}

async function runScrape(url: string | undefined, values: CliValues): Promise<void> {
  const outcome = await scrapeWebpage(url ?? '', {
    summarize: Boolean(values.summarize),
    renderOptions: values.images ? DETAILED_RENDER_OPTIONS : DEFAULT_RENDER_OPTIONS,
  });
  if (!outcome.ok) {
    console.error(formatError(outcome.error.message));
    process.exit(1);
  }
  console.log(formatScrapedPage(outcome));
}

async function main(): Promise<void> {
  const { values, positionals } = parseCliArgs();

  if (values.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  if (values.version) {
    console.log(`${APP_NAME} v${APP_VERSION}`);
    process.exit(0);
  }

  const command = positionals[0] || 'server';

  switch (command) {
    case 'server': {
      const server = new SearxngScraperServer();
      installShutdownHandlers(server);
      await server.start();
      break;
    }

    case 'version': {
      console.log(`${APP_NAME} v${APP_VERSION}`);
      break;
    }

    case 'help': {
      console.log(HELP_TEXT);
      break;
    }

    case 'health': {
      await runHealthCheck(values);
      break;
    }

    case 'search': {
      await runSearch(positionals.slice(1).join(' ') || undefined, values);
      break;
    }

    case 'scrape': {
      await runScrape(positionals[1], values);
      break;
    }

    default: {
      console.error(`Unknown command: ${command}`);
      console.error('Use --help for usage information.');
      process.exit(1);
    }
  }
}

main().catch(error => {
  logger.error({ error }, 'CLI execution failed');
  console.error(`Fatal error: ${error instanceof Error ? error.message : 'unknown error'}`);
  process.exit(1);
});
