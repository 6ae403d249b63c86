// CSS selectors and domain lists driving the per-profile cleanup and content lookup

export const ENCYCLOPEDIA_DOMAIN = 'wikipedia.org';

// AI lab and tech company blogs keep real content in classes the generic noise rules would hit
export const TECHNICAL_BLOG_DOMAINS = [
  'anthropic.com',
  'openai.com',
  'ai.meta.com',
  'ai.google',
  'research.google',
  'github.blog',
  'microsoft.com/en-us/research',
  'deepmind.com',
] as const;

// Technical blogs whose article markup is known well enough for a dedicated candidate list
export const LAB_ARTICLE_DOMAINS = ['anthropic.com'] as const;

export const ALWAYS_STRIPPED_TAGS = ['script', 'style', 'noscript', 'iframe'] as const;

export const MINIMAL_STRIPPED_TAGS = ['script', 'style'] as const;

export const ENCYCLOPEDIA_CHROME_SELECTORS = [
  '#mw-navigation',
  '#mw-panel',
  '#mw-head',
  '.mw-jump-link',
  '.mw-editsection',
  '#mw-page-base',
  '.mw-indicators',
  '#catlinks',
  '.printfooter',
  '.noprint',
  '#footer',
] as const;

// No .sidebar/.menu here: article tables and infoboxes reuse those class names
export const ENCYCLOPEDIA_NOISE_SELECTORS = [
  '.navigation',
  '.ads',
  '.ad',
  '.banner',
  '.cookie',
  '.popup',
  '.share',
  '.comments',
  '.gdpr',
  '.promo',
] as const;

export const TECHNICAL_BLOG_NOISE_SELECTORS = [
  'nav:not(.article-nav)',
  'footer',
  '.cookie-banner',
  '.newsletter-signup',
  '.subscribe-form',
  '.gdpr-notice',
  '.popup-overlay',
] as const;

export const GENERIC_LAYOUT_TAGS = ['nav', 'header', 'footer'] as const;

export const GENERIC_NOISE_SELECTORS = [
  '.menu',
  '.navbar',
  '.sidebar',
  '.footer',
  '.header',
  '.navigation',
  '.ads',
  '.ad',
  '.banner',
  '.cookie',
  '.popup',
  '.social',
  '.share',
  '.related',
  '.comments',
  '.gdpr',
  '.promo',
  '.toolbar',
] as const;

// Matched as substrings of the class attribute, e.g. "top-navbar" or "adslot"
export const GENERIC_NOISE_CLASS_TOKENS = [
  'menu',
  'nav',
  'sidebar',
  'footer',
  'header',
  'ad',
] as const;

export const ENCYCLOPEDIA_CONTENT_SELECTOR = '#mw-content-text';

export const LAB_ARTICLE_CONTENT_SELECTORS = [
  'article',
  'main',
  '.content',
  '.post',
  '.post-content',
  '.article',
  '.article-content',
  '.blog-post',
  '.page-content',
] as const;

export const GENERIC_CONTENT_SELECTORS = [
  '#content',
  '#main',
  '#article',
  '#post',
  '.content',
  '.main',
  '.article',
  '.post',
  'article',
  'main',
  'section.content',
  'div.content',
  'div.main',
  'div.article',
] as const;
