import type { SiteProfile } from './types/extraction';
import { ENCYCLOPEDIA_DOMAIN, TECHNICAL_BLOG_DOMAINS } from './extractors/selectors';

export function classifySite(url: string): SiteProfile {
  if (url.includes(ENCYCLOPEDIA_DOMAIN)) {
    return 'encyclopedia';
  }
  if (TECHNICAL_BLOG_DOMAINS.some(domain => url.includes(domain))) {
    return 'technicalBlog';
  }
  return 'generic';
}
