// CHANGE: Provide retrying HTTP utilities with concurrency limits.
// WHY: Every upstream call has a bounded timeout, bounded retries and bounded parallelism.

import axios, { AxiosError, AxiosInstance, AxiosResponse } from "axios";
import pLimit from "p-limit";
import { NET } from "../config.js";
import { debug } from "../logger.js";

const RETRY_ATTEMPTS = 3;
const RETRY_BASE_DELAY_MS = 500;

const concurrencyLimit = pLimit(Math.max(1, NET.CONCURRENCY));

const httpClient: AxiosInstance = axios.create({
  timeout: NET.TIMEOUT,
  maxRedirects: 5,
  headers: {
    "User-Agent": "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
    "Accept-Language": "en-US,en;q=0.9",
    Accept: "*/*"
  }
});

function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}

function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    } else if (typeof value === "number") {
      out[key.toLowerCase()] = String(value);
    }
  }
  return out;
}

async function executeWithRetry<T>(operation: () => Promise<AxiosResponse<T>>, attempt: number): Promise<AxiosResponse<T>> {
  try {
    return await operation();
  } catch (rawError) {
    if (!axios.isAxiosError(rawError)) {
      throw rawError;
    }
    const error: AxiosError = rawError;
    const nextAttempt = attempt + 1;
    if (nextAttempt >= RETRY_ATTEMPTS) {
      throw error;
    }
    const status = error.response?.status;
    const isNetworkIssue = error.code === "ECONNRESET" || error.code === "ETIMEDOUT" || error.code === "ECONNABORTED";
    const isRetryableStatus = typeof status === "number" && status >= 500 && status < 600;
    if (!isNetworkIssue && !isRetryableStatus) {
      throw error;
    }
    const backoff = RETRY_BASE_DELAY_MS * 2 ** attempt;
    debug(`HTTP retry (${nextAttempt}/${RETRY_ATTEMPTS}) after ${backoff}ms for ${error.config?.url ?? "unknown-url"}`);
    await sleep(backoff);
    return executeWithRetry(operation, nextAttempt);
  }
}

/**
 * Perform GET request expecting a text payload (markup, script or query string).
 *
 * @param url - Target URL.
 * @returns Response body and headers.
 */
export async function getText(url: string): Promise<{ readonly data: string; readonly headers: Record<string, string>; readonly status: number }> {
  const response = await concurrencyLimit(() =>
    executeWithRetry(() => httpClient.get<string>(url, { responseType: "text" }), 0)
  );
  return {
    data: typeof response.data === "string" ? response.data : String(response.data),
    headers: normaliseHeaders(response.headers),
    status: response.status
  };
}

/**
 * Perform GET request expecting binary payload, optionally restricted to a byte range.
 *
 * @param url - Target URL.
 * @param range - Inclusive byte range to request.
 * @returns Buffer with binary payload and response headers.
 */
export async function getBinary(
  url: string,
  range?: { readonly start: number; readonly end: number }
): Promise<{ readonly data: Buffer; readonly headers: Record<string, string>; readonly status: number }> {
  const headers = range ? { Range: `bytes=${range.start}-${range.end}` } : undefined;
  const response = await concurrencyLimit(() =>
    executeWithRetry(() => httpClient.get<ArrayBuffer>(url, { responseType: "arraybuffer", headers }), 0)
  );
  return {
    data: Buffer.from(response.data),
    headers: normaliseHeaders(response.headers),
    status: response.status
  };
}

/**
 * Perform HEAD request to retrieve metadata without downloading payload.
 *
 * @param url - Target URL.
 * @returns Normalised headers to inspect metadata.
 */
export async function head(url: string): Promise<{ readonly headers: Record<string, string>; readonly status: number }> {
  const response = await concurrencyLimit(() => executeWithRetry(() => httpClient.head(url), 0));
  return {
    headers: normaliseHeaders(response.headers),
    status: response.status
  };
}

export { httpClient };
