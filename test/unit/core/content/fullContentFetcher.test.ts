import { describe, test, expect, beforeEach, jest } from '@jest/globals';
import { fetchPage } from '../../../../src/core/content/httpContentFetcher';
import { createSummarizer, type Summarizer } from '../../../../src/core/llm/summarizer';
import { fetchFullContent } from '../../../../src/core/content/fullContentFetcher';
import { FetchError, UpstreamAPIError } from '../../../../src/mcp/errors';
import type { SearxngResult } from '../../../../src/core/search/searxngClient';

jest.mock('../../../../src/core/content/httpContentFetcher', () => ({
  fetchPage: jest.fn(),
}));
jest.mock('../../../../src/core/llm/summarizer', () => ({
  createSummarizer: jest.fn(),
}));

const mockedFetchPage = jest.mocked(fetchPage);
const mockedCreateSummarizer = jest.mocked(createSummarizer);

function results(count: number): SearxngResult[] {
  return Array.from({ length: count }, (_, i) => ({
    title: `Result ${i + 1}`,
    url: `https://site${i + 1}.example.test/page`,
    content: `Snippet ${i + 1}`,
  }));
}

function pageText(url: string): string {
  return `Body of ${url}`;
}

describe('fetchFullContent', () => {
  beforeEach(() => {
    mockedFetchPage.mockReset();
    mockedCreateSummarizer.mockReset();
    mockedFetchPage.mockImplementation(async url => {
      if (url === 'https://site3.example.test/page') {
        throw new FetchError('Request timed out', { url, timeoutMs: 10000 });
      }
      return {
        url,
        statusCode: 200,
        bodyText: `<html><body><p>${pageText(url)}</p></body></html>`,
      };
    });
  });

  test('keeps going when one page times out', async () => {
    const entries = await fetchFullContent(results(5), 5);

    expect(entries).toHaveLength(5);
    expect(entries.map(entry => entry.index)).toEqual([1, 2, 3, 4, 5]);

    for (const i of [0, 1, 3, 4]) {
      expect(entries[i].error).toBeUndefined();
      expect(entries[i].content).toBe(pageText(`https://site${i + 1}.example.test/page`));
    }

    expect(entries[2].content).toBe('');
    expect(entries[2].error).toEqual({
      kind: 'fetch',
      message:
        'Fetch failed: Request timed out (timeout: 10000ms) for URL: https://site3.example.test/page',
    });
  });

  test('fetches pages one at a time in result order with the batch timeout', async () => {
    await fetchFullContent(results(3), 3);

    expect(mockedFetchPage.mock.calls.map(call => call[0])).toEqual([
      'https://site1.example.test/page',
      'https://site2.example.test/page',
      'https://site3.example.test/page',
    ]);
    expect(mockedFetchPage.mock.calls[0][1]).toEqual({ timeoutMs: 10000, correlationId: undefined });
  });

  test('only fetches up to maxResults', async () => {
    const entries = await fetchFullContent(results(8), 2);

    expect(entries).toHaveLength(2);
    expect(mockedFetchPage).toHaveBeenCalledTimes(2);
  });

  test('records results without a URL', async () => {
    const entries = await fetchFullContent([{ title: 'Orphan' }], 5);

    expect(entries).toEqual([
      { index: 1, title: 'Orphan', url: undefined, content: '', summarized: false, summaryUnavailable: false },
    ]);
    expect(mockedFetchPage).not.toHaveBeenCalled();
  });

  test('reports progress after every result', async () => {
    const onProgress = jest.fn((_completed: number, _total: number, _url?: string) =>
      Promise.resolve()
    );

    await fetchFullContent(results(2), 2, { onProgress });

    expect(onProgress.mock.calls).toEqual([
      [1, 2, 'https://site1.example.test/page'],
      [2, 2, 'https://site2.example.test/page'],
    ]);
  });

  test('summarizes each page when asked to', async () => {
    const summarize = jest.fn((_text: string, title: string, _url: string) =>
      Promise.resolve(`Summary of ${title}`)
    );
    mockedCreateSummarizer.mockReturnValue({ summarize } as unknown as Summarizer);

    const entries = await fetchFullContent(results(2), 2, { summarize: true });

    expect(entries.map(entry => [entry.summarized, entry.content])).toEqual([
      [true, 'Summary of Result 1'],
      [true, 'Summary of Result 2'],
    ]);
  });

  test('marks summaries unavailable without a summarizer', async () => {
    mockedCreateSummarizer.mockReturnValue(null);

    const [entry] = await fetchFullContent(results(1), 1, { summarize: true });

    expect(entry.summaryUnavailable).toBe(true);
    expect(entry.content).toBe(pageText('https://site1.example.test/page'));
  });

  test('records summarization failures on the entry', async () => {
    const summarize = jest.fn((_text: string, _title: string, _url: string) =>
      Promise.reject(new UpstreamAPIError('Request timed out after 60000ms', 'llm'))
    );
    mockedCreateSummarizer.mockReturnValue({ summarize } as unknown as Summarizer);

    const [entry] = await fetchFullContent(results(1), 1, { summarize: true });

    expect(entry.summarized).toBe(false);
    expect(entry.error).toEqual({
      kind: 'upstream',
      message: 'Failed to summarize content: Upstream llm error: Request timed out after 60000ms',
    });
  });
});
