import { describe, test, expect } from '@jest/globals';
import * as cheerio from 'cheerio';
import { stripNoise } from '../../../../../src/core/content/extractors/noiseStripper';

const GENERIC_PAGE = `
<html>
  <head><title>Page</title><style>body { color: red; }</style></head>
  <body>
    <header>Site header</header>
    <nav>Top navigation</nav>
    <div class="top-menu-wrapper">Menu entries</div>
    <div class="adslot">Buy things</div>
    <div id="content"><p>Main article text.</p><script>track()</script></div>
    <iframe src="https://embed.test/x"></iframe>
    <footer>Copyright</footer>
  </body>
</html>`;

describe('stripNoise', () => {
  test('full generic pass removes layout, noise classes and scripts', () => {
    const $ = cheerio.load(GENERIC_PAGE);

    const removed = stripNoise($, 'generic', 'full');

    expect(removed).toBeGreaterThan(0);
    expect($('body').text().replace(/\s+/g, ' ').trim()).toBe('Main article text.');
  });

  test('is idempotent', () => {
    const $ = cheerio.load(GENERIC_PAGE);
    stripNoise($, 'generic', 'full');
    const once = $('body').text();

    const removedAgain = stripNoise($, 'generic', 'full');

    expect(removedAgain).toBe(0);
    expect($('body').text()).toBe(once);
  });

  test('minimal pass only drops scripts and styles', () => {
    const $ = cheerio.load(GENERIC_PAGE);

    const removed = stripNoise($, 'generic', 'minimal');

    expect(removed).toBe(2);
    expect($('nav').length).toBe(1);
    expect($('iframe').length).toBe(1);
    expect($('script').length).toBe(0);
    expect($('style').length).toBe(0);
  });

  test('encyclopedia pass removes wiki chrome but keeps sidebars and menus', () => {
    const $ = cheerio.load(`
      <body>
        <div id="mw-navigation">Navigation</div>
        <div id="mw-content-text">
          <h2>History<span class="mw-editsection">[edit]</span></h2>
          <table class="sidebar"><tr><td>Infobox data</td></tr></table>
          <div class="noprint">Print hint</div>
        </div>
        <div id="catlinks">Categories</div>
      </body>`);

    stripNoise($, 'encyclopedia', 'full');

    expect($('#mw-navigation').length).toBe(0);
    expect($('.mw-editsection').length).toBe(0);
    expect($('.noprint').length).toBe(0);
    expect($('#catlinks').length).toBe(0);
    expect($('table.sidebar').length).toBe(1);
  });

  test('technical blog pass keeps article navigation', () => {
    const $ = cheerio.load(`
      <body>
        <nav class="site-nav">Products</nav>
        <article>
          <nav class="article-nav">Contents</nav>
          <div class="sidebar">Key takeaways</div>
        </article>
        <div class="newsletter-signup">Subscribe</div>
      </body>`);

    stripNoise($, 'technicalBlog', 'full');

    expect($('nav.site-nav').length).toBe(0);
    expect($('nav.article-nav').length).toBe(1);
    expect($('.sidebar').length).toBe(1);
    expect($('.newsletter-signup').length).toBe(0);
  });
});
