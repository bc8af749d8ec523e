// URL helpers: map-card slugs and provenance tokens
import psl from 'psl';

/** Everything after the last '#', or '' when the URL has no fragment separator. */
export function slugFromListingUrl(url: string | undefined | null): string {
  if (!url) return '';
  const i = url.lastIndexOf('#');
  return i >= 0 ? url.slice(i + 1) : '';
}

/**
 * Short provenance label: the registrable domain without its public suffix.
 * `https://sf.eater.com/maps/x` -> `eater`, `https://www.example.co.uk` -> `example`.
 */
export function sourceTokenFromUrl(url: string | undefined | null): string | null {
  if (!url) return null;
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
  if (!hostname) return null;
  const parsed = psl.parse(hostname);
  if ('error' in parsed) return hostname.split('.')[0] || null;
  // sld is null for bare suffixes and unlisted single-label hosts like "localhost"
  return parsed.sld ?? hostname.split('.')[0] ?? null;
}
