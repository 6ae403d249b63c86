import type { ErrorPayload } from '../../mcp/errors';
import { formatLongTimestamp } from '../../utils/timestamp';
import type { SearxngResult } from './searxngClient';

export const NO_RESULTS_MESSAGE = 'No results found for your query.';

const RESULT_SEPARATOR = `***\n\n${'='.repeat(80)}\n\n`;
const PREVIEW_LENGTH = 300;

/**
 * One search hit after its page has been fetched (and possibly summarized).
 * `error` is set when this result alone failed; the batch carries on.
 */
export interface FullContentEntry {
  index: number;
  title: string;
  url?: string;
  content: string;
  summarized: boolean;
  summaryUnavailable: boolean;
  error?: ErrorPayload;
}

export function formatSummary(results: SearxngResult[], maxResults: number): string {
  let text = `Found ${results.length} results:\n\n`;

  results.slice(0, maxResults).forEach((result, i) => {
    text += `## ${i + 1}. ${result.title ?? 'No title'}\n`;
    text += `URL: ${result.url ?? ''}\n`;
    text += `${result.content ?? 'No description available.'}\n\n`;
  });

  return text;
}

export function formatAiSummary(
  title: string,
  url: string,
  summary: string,
  summarizedAt: Date = new Date()
): string {
  return [
    `# AI-Generated Summary of ${title}`,
    '',
    `**Original URL:** ${url}`,
    '',
    `**Summarized on:** ${formatLongTimestamp(summarizedAt)}`,
    '',
    '---',
    '',
    summary,
    '',
    '---',
    '',
    '*Summary generated using AI. Information should be verified from original sources.*',
    '',
    '',
  ].join('\n');
}

function entryHeader(entry: FullContentEntry, url: string): string {
  return `## Result ${entry.index}: ${entry.title}\n\n**Source URL:** [${url}](${url})\n\n---\n\n`;
}

function entryError(error: ErrorPayload): string {
  if (error.kind === 'fetch') {
    return `**Error retrieving full content:** ${error.message}\n\nUnable to retrieve full content for this result.\n\n`;
  }
  return `**Error processing content:** ${error.message}\n\nUnable to process content for this result.\n\n`;
}

function preview(content: string): string {
  return content.length > PREVIEW_LENGTH ? `${content.slice(0, PREVIEW_LENGTH)}...` : content;
}

function renderEntries(
  heading: string,
  entries: FullContentEntry[],
  renderBody: (entry: FullContentEntry, url: string) => string
): string {
  let text = `# ${heading}\n\n`;

  for (const entry of entries) {
    if (!entry.url) {
      text += `## Result ${entry.index}: Error - No URL\n\n---\n\n`;
      continue;
    }

    text += entryHeader(entry, entry.url);
    text += entry.error ? entryError(entry.error) : renderBody(entry, entry.url);
    text += RESULT_SEPARATOR;
  }

  return text;
}

export function formatFullContent(entries: FullContentEntry[]): string {
  return renderEntries('Full Content Results', entries, entry => `${entry.content}\n\n`);
}

export function formatAiSummaryResults(
  entries: FullContentEntry[],
  summarizedAt: Date = new Date()
): string {
  return renderEntries('AI-Summarized Search Results', entries, (entry, url) => {
    if (entry.summarized) {
      return formatAiSummary(entry.title, url, entry.content, summarizedAt);
    }
    if (!entry.summaryUnavailable) {
      return `${entry.content}\n\n`;
    }
    return [
      '### AI Summary Not Available',
      '',
      '**Note:** OpenAI/OpenRouter API token not configured. Please set OPENAI_API_TOKEN in your environment to enable AI summaries.',
      '',
      `**Content preview:** ${preview(entry.content)}`,
      '',
      '',
    ].join('\n');
  });
}
