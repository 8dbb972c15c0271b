import type { Server } from "node:http";
import { afterEach, describe, expect, it } from "vitest";
import { closeServer, createApp, listen, parseRunOverrides } from "../src/server";
import { CrawlRunner } from "../src/status";
import { InMemoryRunStore } from "../src/store";
import { DIRECTORY_HTML, createFakeFetch, quietLogger, testConfig, twoSiteRoutes } from "./helpers";

interface Harness {
  baseUrl: string;
  runner: CrawlRunner;
  release: () => void;
}

let server: Server | undefined;

afterEach(async () => {
  if (server) {
    await closeServer(server);
    server = undefined;
  }
});

/** The directory page is held back until `release` is called. */
async function startHarness(): Promise<Harness> {
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });

  const fake = createFakeFetch({
    ...twoSiteRoutes(),
    "https://directory.test/members/": async () => {
      await gate;
      return DIRECTORY_HTML;
    },
  });
  const store = new InMemoryRunStore();
  const logger = quietLogger();
  const runner = new CrawlRunner({
    baseConfig: testConfig(),
    store,
    logger,
    fetchFn: fake.fetchFn,
    sinkFactory: () => ({ location: "memory://results", writeResults: async () => undefined }),
  });

  const listening = await listen(createApp({ runner, store, logger }), "127.0.0.1", 0);
  server = listening;
  const address = listening.address();
  if (address === null || typeof address === "string") {
    throw new Error("expected a TCP address");
  }
  return { baseUrl: `http://127.0.0.1:${address.port}`, runner, release };
}

function post(url: string, body?: string): Promise<Response> {
  return fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: body ?? "{}",
  });
}

describe("parseRunOverrides", () => {
  it("refuses process-wide settings", () => {
    expect(() => parseRunOverrides({ storePath: "x.sqlite", delayMs: 0 })).toThrow(
      "Invalid configuration: request body: storePath cannot be changed per run",
    );
  });

  it("accepts the short payload keys with delay and timeout in seconds", () => {
    expect(
      parseRunOverrides({ directory_url: "https://other.test/list", delay: 0.5, timeout: "10", output: "run.csv" }),
    ).toEqual({
      directoryUrl: "https://other.test/list",
      delayMs: 500,
      requestTimeoutMs: 10_000,
      outputPath: "run.csv",
    });
  });

  it("reports a short key that is not a number under its config name", () => {
    expect(() => parseRunOverrides({ delay: "soon" })).toThrow(
      "Invalid configuration: request body: delayMs must be a number",
    );
  });

  it("passes run settings through", () => {
    expect(parseRunOverrides({ delayMs: 0, maxContactPages: 2 })).toEqual({ delayMs: 0, maxContactPages: 2 });
  });
});

describe("HTTP API", () => {
  it("serves the status page at the root", async () => {
    const { baseUrl } = await startHarness();

    const response = await fetch(`${baseUrl}/`);

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/html; charset=UTF-8");
    expect(await response.text()).toContain("<title>Contact crawler</title>");
  });

  it("reports idle status before any run", async () => {
    const { baseUrl } = await startHarness();

    const response = await fetch(`${baseUrl}/api/status`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      runId: null,
      total: 0,
      completed: 0,
      currentSite: null,
      startedAt: null,
      finishedAt: null,
      results: [],
      running: false,
      error: null,
    });
  });

  it("starts a run, refuses a second one and records it", async () => {
    const { baseUrl, runner, release } = await startHarness();

    const first = await post(`${baseUrl}/api/start`);
    expect(first.status).toBe(202);
    const started = await first.json();
    expect(started).toMatchObject({ status: "started" });

    const second = await post(`${baseUrl}/api/start`);
    expect(second.status).toBe(409);
    expect(await second.json()).toEqual({ error: "Crawler already running" });

    release();
    await runner.wait();

    const status = await (await fetch(`${baseUrl}/api/status`)).json();
    expect(status).toMatchObject({ running: false, completed: 2, total: 2, error: null });

    const runs = await (await fetch(`${baseUrl}/api/runs`)).json();
    expect(runs).toMatchObject([{ status: "completed", siteCount: 2 }]);

    const runId = runner.status().runId;
    const results = await (await fetch(`${baseUrl}/api/runs/${runId}/results`)).json();
    expect(results).toMatchObject([
      { site: "https://site-a.test/", outcome: "complete", emails: ["info@site-a.test"], phones: ["+46 8 123 45 67"] },
      { site: "https://site-b.test/", outcome: "failed" },
    ]);
  });

  it("cancels a running crawl", async () => {
    const { baseUrl, runner, release } = await startHarness();

    await post(`${baseUrl}/api/start`);
    const cancel = await post(`${baseUrl}/api/cancel`);
    expect(cancel.status).toBe(202);
    expect(await cancel.json()).toEqual({ status: "cancelling" });

    release();
    await runner.wait();
    expect(runner.status().error).toBe("crawl aborted");
  });

  it("refuses to cancel when nothing is running", async () => {
    const { baseUrl } = await startHarness();

    const response = await post(`${baseUrl}/api/cancel`);

    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({ error: "No crawl is running" });
  });

  it("rejects invalid overrides with the list of issues", async () => {
    const { baseUrl, runner } = await startHarness();

    const response = await post(`${baseUrl}/api/start`, JSON.stringify({ delayMs: -1 }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "Invalid configuration: delayMs must be >= 0",
      issues: ["delayMs must be >= 0"],
    });
    expect(runner.status().running).toBe(false);
  });

  it("rejects a body that is not JSON", async () => {
    const { baseUrl } = await startHarness();

    const response = await post(`${baseUrl}/api/start`, "{not json");

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Request body is not valid JSON" });
  });

  it("returns an empty list for an unknown run", async () => {
    const { baseUrl } = await startHarness();

    const response = await fetch(`${baseUrl}/api/runs/crawl_missing/results`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual([]);
  });
});
