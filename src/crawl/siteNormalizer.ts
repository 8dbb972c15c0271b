import { MalformedUrlError } from "../core/errors";

export interface SiteUrlParts {
  scheme: string;
  netloc: string;
}

const SITE_URL_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\/([^/?#]*)/;

/**
 * Splits a URL into scheme and network location. The WHATWG URL parser
 * lower-cases hosts, so the split is done on the raw string to keep the
 * host exactly as it was written.
 */
export function parseSiteUrl(url: string): SiteUrlParts {
  const match = url.trimStart().match(SITE_URL_PATTERN);
  if (!match || match[2].length === 0) {
    throw new MalformedUrlError(url);
  }
  return { scheme: match[1].toLowerCase(), netloc: match[2] };
}

export function normalizeSite(url: string): string | undefined {
  try {
    const { scheme, netloc } = parseSiteUrl(url);
    return `${scheme}://${netloc}/`;
  } catch (error) {
    if (error instanceof MalformedUrlError) {
      return undefined;
    }
    throw error;
  }
}

/** Folds links into unique site roots in lexicographic order. */
export function collectSiteRoots(links: Iterable<string>): string[] {
  const sites = new Set<string>();
  for (const link of links) {
    const site = normalizeSite(link);
    if (site) {
      sites.add(site);
    }
  }
  return [...sites].sort();
}
