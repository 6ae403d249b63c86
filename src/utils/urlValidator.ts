import { ValidationError } from '../mcp/errors';

export function hasHttpScheme(input: string): boolean {
  return /^https?:\/\//i.test(input);
}

export function isHttpUrl(input: string): boolean {
  try {
    const u = new URL(input);
    return u.protocol === 'http:' || u.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Trims the input and prepends https:// when no http(s) scheme is given.
 * Throws ValidationError for empty input or anything that still fails to parse.
 */
export function normalizeTargetUrl(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new ValidationError('No URL provided');
  }

  const withScheme = hasHttpScheme(trimmed) ? trimmed : `https://${trimmed}`;
  if (!isHttpUrl(withScheme)) {
    throw new ValidationError(`Invalid URL: ${input}`);
  }

  return withScheme;
}

export function normalizeInstanceUrl(input: string): string {
  return normalizeTargetUrl(input).replace(/\/+$/, '');
}

export function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    return url;
  }
}
