import type { CrawlerConfig } from "../config";
import { CrawlAbortedError, RunLevelError, TransportError, errorMessage } from "../core/errors";
import { type FetchLike, fetchPage } from "../core/fetch";
import { sleep } from "../core/time";
import type { Logger, MetricsRegistry } from "../observability";
import { type CrawlResult, type ProgressListener, failedResult } from "../types";
import { extractContacts, mergeContacts } from "./contactExtractor";
import { extractLinks, findCandidateContactPages } from "./htmlParser";
import { collectSiteRoots } from "./siteNormalizer";

export interface CrawlDependencies {
  config: CrawlerConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchLike;
}

export interface CrawlOptions {
  /** Called once per finished site, successful or not, with a 1-based index. */
  onProgress?: ProgressListener;
  signal?: AbortSignal;
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CrawlAbortedError();
  }
}

async function fetchTimed(url: string, deps: CrawlDependencies): Promise<string> {
  const stopTimer = deps.metrics.startTimer("page_fetch_ms");
  try {
    return await fetchPage(url, deps.config, deps.fetchFn);
  } finally {
    const durationMs = stopTimer();
    deps.logger.debug("page_fetched", { url, durationMs });
  }
}

/** Fetches the directory page and returns its unique member site roots, sorted. */
export async function collectSites(directoryUrl: string, deps: CrawlDependencies): Promise<string[]> {
  const html = await fetchTimed(directoryUrl, deps);
  return collectSiteRoots(extractLinks(html, directoryUrl));
}

/**
 * Crawls one site: its home page, then each candidate contact page after the
 * configured delay. A failed home page rejects with TransportError; failed
 * contact pages are recorded and skipped.
 */
export async function crawlSite(site: string, deps: CrawlDependencies, signal?: AbortSignal): Promise<CrawlResult> {
  const { config, logger, metrics } = deps;
  const html = await fetchTimed(site, deps);
  let contacts = extractContacts(html);
  const contactPages = findCandidateContactPages(html, site, config);
  const failedContactPages: string[] = [];

  for (const contactPage of contactPages) {
    await sleep(config.delayMs, signal);
    throwIfAborted(signal);

    let contactHtml: string;
    try {
      contactHtml = await fetchTimed(contactPage, deps);
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      metrics.incrementCounter("contact_pages_failed");
      failedContactPages.push(contactPage);
      logger.warn("crawl_contact_page_failed", { site, url: contactPage, error: error.message });
      continue;
    }

    metrics.incrementCounter("contact_pages_fetched");
    contacts = mergeContacts(contacts, extractContacts(contactHtml));
  }

  return {
    site,
    emails: contacts.emails,
    phones: contacts.phones,
    contactPagesChecked: contactPages,
    failedContactPages,
    outcome: failedContactPages.length > 0 ? "partial" : "complete",
  };
}

function recordOutcome(result: CrawlResult, metrics: MetricsRegistry): void {
  switch (result.outcome) {
    case "complete":
      metrics.incrementCounter("sites_ok");
      break;
    case "partial":
      metrics.incrementCounter("sites_partial");
      break;
    case "failed":
      metrics.incrementCounter("sites_failed");
      break;
  }
}

/**
 * One full run: discovery, then every site in order, one at a time. Per-site
 * transport failures become `failed` results; anything else ends the run.
 */
export async function runCrawl(deps: CrawlDependencies, options: CrawlOptions = {}): Promise<CrawlResult[]> {
  const { config, logger, metrics } = deps;
  const { signal, onProgress } = options;
  throwIfAborted(signal);

  logger.info("crawl_discovery_start", { url: config.directoryUrl });
  let sites: string[];
  try {
    sites = await collectSites(config.directoryUrl, deps);
  } catch (error) {
    throw new RunLevelError(`Site discovery failed for ${config.directoryUrl}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  metrics.incrementCounter("sites_discovered", sites.length);
  logger.info("crawl_sites_discovered", { total: sites.length });

  const results: CrawlResult[] = [];
  for (const [offset, site] of sites.entries()) {
    throwIfAborted(signal);
    const index = offset + 1;
    const stopTimer = metrics.startTimer("site_ms");

    let result: CrawlResult;
    try {
      result = await crawlSite(site, deps, signal);
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      result = failedResult(site, error.message);
    }

    const durationMs = stopTimer();
    recordOutcome(result, metrics);
    if (result.outcome === "failed") {
      logger.warn("crawl_site_failed", { site, index, total: sites.length, durationMs, error: result.error });
    } else {
      logger.info("crawl_site_complete", {
        site,
        index,
        total: sites.length,
        durationMs,
        outcome: result.outcome,
        emails: result.emails.length,
        phones: result.phones.length,
        contactPages: result.contactPagesChecked.length,
      });
    }

    results.push(result);
    await onProgress?.(index, sites.length, result);
    await sleep(config.delayMs, signal);
  }
  throwIfAborted(signal);

  logger.info("crawl_finished", { total: sites.length, ...metrics.summary().counters });
  return results;
}
