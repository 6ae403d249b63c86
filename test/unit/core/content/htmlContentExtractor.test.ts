import { describe, test, expect } from '@jest/globals';
import {
  NO_TITLE,
  STAGE_GATES,
  extractContent,
  runLastResortStage,
  runReparsedStage,
  runStrippedStage,
} from '../../../../src/core/content/htmlContentExtractor';
import {
  DEFAULT_RENDER_OPTIONS,
  MarkdownConverter,
} from '../../../../src/core/content/extractors/markdownConverter';

const ARTICLE_TEXT = 'Alpha beta gamma delta. '.repeat(13).trim();
const BODY_TEXT = 'Plain body text sentence here. '.repeat(20).trim();
const SIDEBAR_TEXT = 'Recovered sentence from the sidebar block. '.repeat(4).trim();

function page(title: string, body: string): string {
  return `<!DOCTYPE html><html><head><title>${title}</title></head><body>${body}</body></html>`;
}

describe('extractContent', () => {
  test('extracts the content div and leaves navigation out', async () => {
    const html = page(
      'Synthetic page',
      `<nav><a href="/home">Home</a> <a href="/about">About us and more links here</a></nav>
       <div id="content"><p>${ARTICLE_TEXT}</p></div>`
    );

    const result = await extractContent(html, 'https://example.com/post');

    expect(result.title).toBe('Synthetic page');
    expect(result.profile).toBe('generic');
    expect(result.markdownContent).toBe(ARTICLE_TEXT);
    expect(result.markdownContent).not.toContain('About us');
    // 311 characters is under the first gate, so the gentler pass supplies it
    expect(result.stage).toBe('reparsed');
    expect(result.contentSource).toBe('#content');
  });

  test('renders the whole body when no content selector matches', async () => {
    const html = page('Body only', `<p>${BODY_TEXT}</p>`);

    const result = await extractContent(html, 'https://example.com/plain');

    expect(result.markdownContent).toBe(BODY_TEXT);
    expect(result.stage).toBe('stripped');
    expect(result.contentSource).toBe('body');
  });

  test('re-parses the original document when full stripping removed the content', async () => {
    const html = page('Sidebar', `<div class="sidebar-content"><p>${SIDEBAR_TEXT}</p></div>`);

    const result = await extractContent(html, 'https://example.com/odd-layout');

    expect(result.stage).toBe('reparsed');
    expect(result.contentSource).toBe('body');
    expect(result.markdownContent).toBe(SIDEBAR_TEXT);
  });

  test('accepts the last resort however short it is', async () => {
    const html = page('Tiny', '<p>Tiny page.</p><script>var x = 1;</script>');

    const result = await extractContent(html, 'https://example.com/tiny');

    expect(result.stage).toBe('lastResort');
    expect(result.markdownContent).toBe('Tiny page.');
  });

  test('uses the encyclopedia container and drops edit links', async () => {
    const paragraph = 'Encyclopedic sentence with enough words to count. '.repeat(12).trim();
    const html = page(
      'Topic - Wikipedia',
      `<div id="mw-navigation">Main page Contents Current events</div>
       <div id="mw-content-text">
         <h2>Overview<span class="mw-editsection">[edit]</span></h2>
         <p>${paragraph}</p>
       </div>
       <div id="footer">Privacy policy</div>`
    );

    const result = await extractContent(html, 'https://en.wikipedia.org/wiki/Topic');

    expect(result.profile).toBe('encyclopedia');
    expect(result.stage).toBe('stripped');
    expect(result.contentSource).toBe('#mw-content-text');
    expect(result.markdownContent).toBe(`## Overview\n\n${paragraph}`);
  });

  test('falls back to the sentinel title', async () => {
    const result = await extractContent(`<html><body><p>${BODY_TEXT}</p></body></html>`, 'https://example.com');

    expect(result.title).toBe(NO_TITLE);
  });
});

describe('extraction stages', () => {
  const converter = new MarkdownConverter(DEFAULT_RENDER_OPTIONS);
  const document = {
    html: page('Sidebar', `<div class="sidebar-content"><p>${SIDEBAR_TEXT}</p></div>`),
    url: 'https://example.com/odd-layout',
  };

  test('the stripped stage loses sidebar content', () => {
    expect(runStrippedStage(document, 'generic', converter)).toEqual({
      markdown: '',
      contentSource: 'body',
    });
  });

  test('the reparsed stage starts from the original markup', () => {
    runStrippedStage(document, 'generic', converter);

    expect(runReparsedStage(document, 'generic', converter).markdown).toBe(SIDEBAR_TEXT);
  });

  test('the last resort renders the body for non-encyclopedia profiles', () => {
    const withArticle = {
      html: page('x', `<nav>Links</nav><article>${'word '.repeat(60)}</article>`),
      url: 'https://example.com',
    };

    const outcome = runLastResortStage(withArticle, 'generic', converter);

    expect(outcome.contentSource).toBe('body');
    expect(outcome.markdown.startsWith('Links')).toBe(true);
  });
});

describe('quality gates', () => {
  test('count code points rather than UTF-16 units', () => {
    expect(STAGE_GATES.stripped('😀'.repeat(300))).toBe(false);
    expect(STAGE_GATES.stripped('😀'.repeat(500))).toBe(true);
    expect(STAGE_GATES.reparsed(`  ${'😀'.repeat(60)}  `)).toBe(false);
    expect(STAGE_GATES.reparsed('😀'.repeat(100))).toBe(true);
  });
});

describe('image handling', () => {
  test('extracted articles carry no image markup by default', async () => {
    const html = page(
      'Growth report',
      `<article><p>${ARTICLE_TEXT}</p><p><img alt="Chart" src="https://img.example.test/chart.png"></p><p>${ARTICLE_TEXT}</p></article>`
    );

    const result = await extractContent(html, 'https://news.example.test/report');

    expect(result.markdownContent).toContain(ARTICLE_TEXT);
    expect(result.markdownContent).not.toContain('chart.png');
  });
});
