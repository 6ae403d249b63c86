/// <reference path="../../../types/turndown-plugin-gfm.d.ts" />
import TurndownService from 'turndown';
import { strikethrough, tables } from 'turndown-plugin-gfm';
import type { MarkdownRenderOptions } from '../types/extraction';
import { logger } from '../../../utils/logger';

// Images omitted, tables kept; what the extraction pipeline renders with unless told otherwise
export const DEFAULT_RENDER_OPTIONS: MarkdownRenderOptions = Object.freeze({
  includeImages: false,
  includeTables: true,
});

export const DETAILED_RENDER_OPTIONS: MarkdownRenderOptions = Object.freeze({
  includeImages: true,
  includeTables: true,
});

function asElement(node: TurndownService.Node): HTMLElement | null {
  return 'tagName' in node ? node : null;
}

// Same test turndown-plugin-gfm applies before it converts a table; it keeps
// every other table as raw HTML.
function hasHeadingRow(table: HTMLElement): boolean {
  const firstRow = table.querySelector('tr');
  const parent = firstRow?.parentNode;
  if (!firstRow || !parent) return false;
  if (parent.nodeName === 'THEAD') return true;

  const isFirstBody =
    parent.nodeName === 'TBODY' &&
    (parent.previousSibling === null ||
      (parent.previousSibling.nodeName === 'THEAD' &&
        /^\s*$/.test(parent.previousSibling.textContent ?? '')));

  return (
    parent.firstChild === firstRow &&
    (parent.nodeName === 'TABLE' || isFirstBody) &&
    Array.from(firstRow.childNodes).every(cell => cell.nodeName === 'TH')
  );
}

/**
 * HTML to markdown conversion for extracted page content.
 *
 * Links are kept inline, lines are never wrapped, and image and table handling
 * follow the options the converter was built with. Build one per configuration
 * rather than reconfiguring a shared instance.
 */
export class MarkdownConverter {
  private turndownService: TurndownService;

  constructor(readonly options: MarkdownRenderOptions = DEFAULT_RENDER_OPTIONS) {
    this.turndownService = new TurndownService({
      headingStyle: 'atx',
      hr: '---',
      bulletListMarker: '-',
      codeBlockStyle: 'fenced',
      fence: '```',
      emDelimiter: '*',
      strongDelimiter: '**',
      linkStyle: 'inlined',
      preformattedCode: true,
    });

    this.configureRules();
  }

  private configureRules(): void {
    this.turndownService.use(strikethrough);

    if (this.options.includeTables) {
      this.turndownService.use(tables);

      // Header-less tables get their first row promoted to the header
      this.turndownService.addRule('tables-without-heading', {
        filter: node => node.nodeName === 'TABLE' && !hasHeadingRow(node),
        replacement: (content, node) => {
          const rows = content.split('\n').filter(line => line.trim());
          if (rows.length === 0) return '';
          const columns = asElement(node)?.querySelector('tr')?.children.length ?? 1;
          const separator = `|${' --- |'.repeat(Math.max(columns, 1))}`;
          return `\n\n${[rows[0], separator, ...rows.slice(1)].join('\n')}\n\n`;
        },
      });
    }

    // Built-in rules win over remove(), so images need a rule of their own
    if (!this.options.includeImages) {
      this.turndownService.addRule('images', {
        filter: ['img', 'picture'],
        replacement: () => '',
      });
    }

    this.turndownService.addRule('headings', {
      filter: ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'],
      replacement: (content, node) => {
        const level = parseInt(node.nodeName.charAt(1), 10);
        const text = content.replace(/\s+/g, ' ').trim();
        return text ? `\n\n${'#'.repeat(level)} ${text}\n\n` : '';
      },
    });

    this.turndownService.addRule('paragraphs', {
      filter: 'p',
      replacement: content => `\n\n${content.trim()}\n\n`,
    });

    this.turndownService.addRule('code-blocks', {
      filter: 'pre',
      replacement: (_content, node) => {
        const code = (node.textContent ?? '').replace(/^\n+|\s+$/g, '');
        const element = asElement(node);
        const lang = element ? this.detectLanguage(element) : '';
        return `\n\n\`\`\`${lang}\n${code}\n\`\`\`\n\n`;
      },
    });

    this.turndownService.addRule('blockquotes', {
      filter: 'blockquote',
      replacement: content => `\n\n> ${content.trim().replace(/\n/g, '\n> ')}\n\n`,
    });
  }

  private detectLanguage(codeNode: HTMLElement): string {
    const className = codeNode.className || codeNode.querySelector('code')?.className || '';

    // language-js, lang-python, highlight-rust ...
    const langMatch = className.match(/(?:language-|lang-|highlight-)([a-zA-Z0-9]+)/);
    return langMatch ? langMatch[1] : '';
  }

  convertToMarkdown(html: string): string {
    try {
      return this.postProcessMarkdown(this.turndownService.turndown(html));
    } catch (error) {
      logger.warn({ error }, 'Markdown conversion failed, falling back to tag stripping');
      return html
        .replace(/<[^>]*>/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
    }
  }

  private postProcessMarkdown(markdown: string): string {
    return (
      markdown
        .replace(/\n{4,}/g, '\n\n\n')
        // headings always start a new block
        .replace(/([^\n])\n(#{1,6} )/g, '$1\n\n$2')
        .replace(/[ \t]+$/gm, '')
        .trim()
    );
  }
}
