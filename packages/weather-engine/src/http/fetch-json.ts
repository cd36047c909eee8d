import { FetchError, describeError } from "../errors.js";
import type { JsonValue } from "../json.js";
import { silentLogger } from "../logging.js";
import type { Logger } from "../logging.js";

const DEFAULT_USER_AGENT = "place-weather/0.1.0";
const BACKOFF_BASE_MS = 600;

export interface FetchJsonOptions {
  timeoutMs: number;
  /**
   * Extra attempts after the first one.
   */
  retries: number;
  logger?: Logger;
  fetchImpl?: typeof fetch;
  delay?: (ms: number) => Promise<void>;
}

/**
 * Hides credentials before a URL reaches a log line or an error message:
 * the `key` query parameter and the token segment after `/v2` or `/v2.N`.
 */
export const maskUrl = (url: string): string =>
  url.replace(/([?&]key=)[^&#]+/g, "$1***").replace(/(\/v2(?:\.\d+)?\/)[^/]+\//, "$1***/");

export const backoffDelayMs = (attempt: number): number => BACKOFF_BASE_MS * 2 ** attempt;

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * GET a JSON document. A parsed body is returned whatever it says; deciding whether it
 * reports an application error is up to the caller.
 */
export async function fetchJson(url: string, options: FetchJsonOptions): Promise<JsonValue> {
  const fetchImpl = options.fetchImpl ?? globalFetch();
  const delay = options.delay ?? sleep;
  const logger = options.logger ?? silentLogger;
  const masked = maskUrl(url);
  const attempts = Math.max(0, Math.floor(options.retries)) + 1;

  let lastError: unknown;
  for (let attempt = 0; attempt < attempts; attempt += 1) {
    logger.debug(`GET ${masked}`);
    try {
      return await attemptOnce(fetchImpl, url, options.timeoutMs);
    } catch (error) {
      lastError = error;
      if (attempt + 1 < attempts) {
        const waitMs = backoffDelayMs(attempt);
        logger.debug(`request failed (${maskUrl(describeError(error))}), retry in ${(waitMs / 1000).toFixed(1)}s`);
        await delay(waitMs);
      }
    }
  }

  throw new FetchError(masked, attempts, lastError, maskUrl(describeError(lastError)));
}

async function attemptOnce(fetchImpl: typeof fetch, url: string, timeoutMs: number): Promise<JsonValue> {
  const response = await fetchImpl(url, {
    method: "GET",
    signal: AbortSignal.timeout(timeoutMs),
    headers: {
      Accept: "application/json",
      "User-Agent": DEFAULT_USER_AGENT
    }
  });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
  }

  const body = await response.text();
  const parsed: JsonValue = JSON.parse(body);
  return parsed;
}

function globalFetch(): typeof fetch {
  if (typeof fetch === "function") {
    return fetch.bind(globalThis);
  }
  throw new Error("fetch is not available in the current environment");
}
