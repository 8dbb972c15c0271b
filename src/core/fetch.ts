import { Agent, fetch, type Dispatcher } from "undici";
import type { CrawlerConfig } from "../config";
import { TransportError } from "./errors";

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
  body?: { cancel(): Promise<void> } | null;
}

export interface FetchInit {
  method: "GET";
  headers: Record<string, string>;
  redirect: "follow";
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<HttpResponseLike>;

export type FetchSettings = Pick<CrawlerConfig, "userAgent" | "requestTimeoutMs" | "ignoreHttpsErrors">;

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Dispatcher | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

function describeFailure(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause = error.cause;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message}: ${cause.message}`;
  }
  return error.message;
}

/**
 * Performs exactly one GET and returns the body text. Every failure mode
 * (non-2xx status, DNS, refused connection, timeout) rejects with a
 * TransportError; retrying is left to the caller.
 */
export async function fetchPage(url: string, settings: FetchSettings, fetchFn: FetchLike = defaultFetch): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), settings.requestTimeoutMs);

  try {
    let response: HttpResponseLike;
    try {
      response = await fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": settings.userAgent,
          accept: "text/html,application/xhtml+xml",
        },
        redirect: "follow",
        signal: controller.signal,
        dispatcher: getFetchDispatcher(settings.ignoreHttpsErrors),
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TransportError(url, `Timed out after ${settings.requestTimeoutMs}ms while fetching ${url}`, {
          cause: error,
        });
      }
      throw new TransportError(url, `Request to ${url} failed: ${describeFailure(error)}`, { cause: error });
    }

    if (!response.ok) {
      const message = `HTTP ${response.status} while fetching ${url}`;
      // Unread bodies keep the connection checked out.
      try {
        await response.body?.cancel();
      } catch (error) {
        throw new TransportError(url, message, { statusCode: response.status, cause: error });
      }
      throw new TransportError(url, message, { statusCode: response.status });
    }

    try {
      return await response.text();
    } catch (error) {
      throw new TransportError(url, `Failed to read body of ${url}: ${describeFailure(error)}`, { cause: error });
    }
  } finally {
    clearTimeout(timeout);
  }
}
