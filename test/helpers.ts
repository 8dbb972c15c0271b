import type { CrawlerConfig } from "../src/config";
import { DEFAULT_CONFIG } from "../src/config";
import type { FetchInit, FetchLike, HttpResponseLike } from "../src/core/fetch";
import { Logger } from "../src/observability";

export type FakeRoute = string | { status: number; body?: string } | Error | (() => Promise<string>);

export interface FakeFetch {
  fetchFn: FetchLike;
  calls: string[];
  inits: FetchInit[];
}

function respond(status: number, body: string): HttpResponseLike {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => body,
  };
}

/** URLs missing from `routes` fail the way an unresolvable host does. */
export function createFakeFetch(routes: Record<string, FakeRoute>): FakeFetch {
  const calls: string[] = [];
  const inits: FetchInit[] = [];

  const fetchFn: FetchLike = async (url, init) => {
    calls.push(url);
    inits.push(init);
    const route = routes[url];

    if (route === undefined) {
      throw new TypeError("fetch failed", { cause: new Error(`getaddrinfo ENOTFOUND ${new URL(url).host}`) });
    }
    if (route instanceof Error) {
      throw route;
    }
    if (typeof route === "string") {
      return respond(200, route);
    }
    if (typeof route === "function") {
      return respond(200, await route());
    }
    return respond(route.status, route.body ?? "");
  };

  return { fetchFn, calls, inits };
}

export function testConfig(overrides: Partial<CrawlerConfig> = {}): CrawlerConfig {
  return {
    ...DEFAULT_CONFIG,
    directoryUrl: "https://directory.test/members/",
    contactHints: ["kontakt", "contact", "om", "about"],
    userAgent: "test-agent",
    requestTimeoutMs: 1_000,
    delayMs: 0,
    maxContactPages: 8,
    outputPath: "unused.csv",
    ...overrides,
  };
}

export function quietLogger(component = "test"): Logger {
  return new Logger({ component, runId: "run_test", level: "error" });
}

export const DIRECTORY_HTML = `<html><body>
<a href="https://site-a.test/">Site A</a>
<a href="https://site-b.test/start">Site B</a>
<a href="https://site-a.test/about-us">Site A again</a>
</body></html>`;

export const SITE_A_HOME = `<html><body><p>Mail: info@site-a.test</p><a href="/kontakt">Kontakt</a></body></html>`;

export const SITE_A_CONTACT = `<html><body><p>Ring oss: +46 8 123 45 67</p></body></html>`;

/** Directory with sites A and B; A has one contact page, B is unreachable. */
export function twoSiteRoutes(): Record<string, FakeRoute> {
  return {
    "https://directory.test/members/": DIRECTORY_HTML,
    "https://site-a.test/": SITE_A_HOME,
    "https://site-a.test/kontakt": SITE_A_CONTACT,
  };
}
