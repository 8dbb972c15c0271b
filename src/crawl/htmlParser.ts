import { load } from "cheerio";
import type { CrawlerConfig } from "../config";
import { parseSiteUrl } from "./siteNormalizer";

export interface AnchorLink {
  href: string;
  text: string;
}

const ABSOLUTE_HTTP_PATTERN = /^https?:\/\//i;
const SCHEME_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]*:/;

function sameOrigin(left: URL, right: URL): boolean {
  return left.protocol === right.protocol && left.host === right.host;
}

/**
 * Resolves `href` against `baseUrl`. Hosts keep the case they were written
 * in; the WHATWG parser is only trusted with the path part.
 */
function resolveUrl(baseUrl: string, href: string): string | undefined {
  if (ABSOLUTE_HTTP_PATTERN.test(href)) {
    return href;
  }

  let base: URL;
  let resolved: URL;
  try {
    base = new URL(baseUrl);
    resolved = new URL(href, base);
  } catch {
    return undefined;
  }

  if (SCHEME_PATTERN.test(href)) {
    return resolved.toString();
  }

  const { scheme, netloc } = parseSiteUrl(baseUrl);
  if (href.startsWith("//")) {
    return `${scheme}:${href}`;
  }
  if (!sameOrigin(resolved, base)) {
    return resolved.toString();
  }
  return `${scheme}://${netloc}${resolved.pathname}${resolved.search}${resolved.hash}`;
}

/** Every `a[href]` in document order, with its raw href and visible text. */
export function extractAnchors(html: string): AnchorLink[] {
  const $ = load(html);
  const anchors: AnchorLink[] = [];

  $("a[href]").each((_, element) => {
    anchors.push({
      href: $(element).attr("href") ?? "",
      text: $(element).text(),
    });
  });

  return anchors;
}

export function extractLinks(html: string, baseUrl: string): Set<string> {
  const links = new Set<string>();

  for (const anchor of extractAnchors(html)) {
    const href = anchor.href.trim();
    if (!href) {
      continue;
    }

    const resolved = resolveUrl(baseUrl, href);
    if (resolved) {
      links.add(resolved);
    }
  }

  return links;
}

function matchesHint(anchor: AnchorLink, hints: readonly string[]): boolean {
  const text = anchor.text.toLowerCase();
  const target = anchor.href.toLowerCase();
  return hints.some((hint) => {
    const needle = hint.toLowerCase();
    return text.includes(needle) || target.includes(needle);
  });
}

/**
 * Links whose text or href mentions a contact hint, resolved, de-duplicated
 * in first-seen order and capped at `maxContactPages`.
 */
export function findCandidateContactPages(
  html: string,
  baseUrl: string,
  config: Pick<CrawlerConfig, "contactHints" | "maxContactPages">,
): string[] {
  const candidates: string[] = [];
  const seen = new Set<string>();

  for (const anchor of extractAnchors(html)) {
    if (!matchesHint(anchor, config.contactHints)) {
      continue;
    }

    const resolved = resolveUrl(baseUrl, anchor.href.trim());
    if (!resolved || seen.has(resolved)) {
      continue;
    }

    seen.add(resolved);
    candidates.push(resolved);
  }

  return candidates.slice(0, config.maxContactPages);
}
