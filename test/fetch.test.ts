import { Agent, MockAgent, getGlobalDispatcher, setGlobalDispatcher } from "undici";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TransportError } from "../src/core/errors";
import { type FetchLike, type FetchSettings, fetchPage, getFetchDispatcher } from "../src/core/fetch";
import { createFakeFetch } from "./helpers";

async function expectTransportError(promise: Promise<unknown>): Promise<TransportError> {
  const error = await promise.then(
    () => undefined,
    (caught: unknown) => caught,
  );
  if (!(error instanceof TransportError)) {
    throw new Error(`expected a TransportError, got ${String(error)}`);
  }
  return error;
}

const settings: FetchSettings = {
  userAgent: "test-agent",
  requestTimeoutMs: 1_000,
  ignoreHttpsErrors: false,
};

describe("fetchPage", () => {
  it("returns the body and sends the configured user agent", async () => {
    const fake = createFakeFetch({ "https://site.test/": "<html>ok</html>" });

    await expect(fetchPage("https://site.test/", settings, fake.fetchFn)).resolves.toBe("<html>ok</html>");
    expect(fake.calls).toEqual(["https://site.test/"]);
    expect(fake.inits[0].method).toBe("GET");
    expect(fake.inits[0].headers["user-agent"]).toBe("test-agent");
    expect(fake.inits[0].dispatcher).toBeUndefined();
  });

  it("rejects non-2xx responses with a TransportError carrying the status", async () => {
    const fake = createFakeFetch({ "https://site.test/missing": { status: 404 } });

    const error = await expectTransportError(fetchPage("https://site.test/missing", settings, fake.fetchFn));
    expect(error.message).toBe("HTTP 404 while fetching https://site.test/missing");
    expect(error.statusCode).toBe(404);
    expect(error.url).toBe("https://site.test/missing");
  });

  it("cancels the unread body of an error response", async () => {
    const cancel = vi.fn(async (): Promise<void> => undefined);
    const text = vi.fn(async () => "not found");
    const fetchFn: FetchLike = async () => ({ ok: false, status: 404, text, body: { cancel } });

    const error = await expectTransportError(fetchPage("https://site.test/gone", settings, fetchFn));
    expect(error.statusCode).toBe(404);
    expect(cancel).toHaveBeenCalledTimes(1);
    expect(text).not.toHaveBeenCalled();
  });

  it("wraps connection failures and keeps the cause", async () => {
    const fake = createFakeFetch({});

    const error = await expectTransportError(fetchPage("https://down.test/", settings, fake.fetchFn));
    expect(error.message).toBe("Request to https://down.test/ failed: fetch failed: getaddrinfo ENOTFOUND down.test");
    expect(error.statusCode).toBeUndefined();
    expect(error.cause).toBeInstanceOf(TypeError);
  });

  it("aborts after requestTimeoutMs", async () => {
    const hanging: FetchLike = (_url, init) =>
      new Promise((_resolve, reject) => {
        init.signal.addEventListener("abort", () => reject(new Error("aborted")));
      });

    await expect(fetchPage("https://slow.test/", { ...settings, requestTimeoutMs: 20 }, hanging)).rejects.toThrow(
      "Timed out after 20ms while fetching https://slow.test/",
    );
  });

  it("uses a shared insecure agent only when TLS errors are ignored", () => {
    expect(getFetchDispatcher(false)).toBeUndefined();
    const agent = getFetchDispatcher(true);
    expect(agent).toBeInstanceOf(Agent);
    expect(getFetchDispatcher(true)).toBe(agent);
  });
});

describe("fetchPage with the default client", () => {
  const previous = getGlobalDispatcher();
  let mockAgent: MockAgent;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    setGlobalDispatcher(mockAgent);
  });

  afterEach(async () => {
    setGlobalDispatcher(previous);
    await mockAgent.close();
  });

  it("reads the body through undici", async () => {
    mockAgent.get("https://member.test").intercept({ path: "/", method: "GET" }).reply(200, "<p>info@member.test</p>");

    await expect(fetchPage("https://member.test/", settings)).resolves.toBe("<p>info@member.test</p>");
  });

  it("classifies server errors as TransportError", async () => {
    mockAgent.get("https://member.test").intercept({ path: "/kontakt", method: "GET" }).reply(503, "busy");

    const error = await expectTransportError(fetchPage("https://member.test/kontakt", settings));
    expect(error.statusCode).toBe(503);
  });
});
