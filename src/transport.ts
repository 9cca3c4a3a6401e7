// CHANGE: Transport seam between the pipeline and the network.
// WHY: The orchestrator only sees FetchError, whatever the underlying client raised.

import axios from "axios";
import { FetchError, describeError } from "./errors.js";
import { debug } from "./logger.js";
import { getBinary, getText, head } from "./utils/http.js";

/**
 * Network collaborator used by the pipeline and by stream downloads.
 *
 * Invariant: every failure is surfaced as {@link FetchError}.
 */
export interface Transport {
  fetch(url: string): Promise<string>;
  /** Order-preserving, all-or-nothing batch fetch. */
  fetchAll(urls: readonly string[]): Promise<string[]>;
  head(url: string): Promise<Record<string, string>>;
  /** Fetch the inclusive byte range `start..end`. */
  fetchRange(url: string, start: number, end: number): Promise<Buffer>;
}

async function guard<T>(url: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof FetchError) {
      throw error;
    }
    const status = axios.isAxiosError(error) ? error.response?.status : undefined;
    throw new FetchError(url, describeError(error), { status, cause: error });
  }
}

/**
 * {@link Transport} backed by the shared axios client with retry and concurrency limits.
 */
export class HttpTransport implements Transport {
  async fetch(url: string): Promise<string> {
    return guard(url, async () => {
      const response = await getText(url);
      debug(`Fetched ${url} with status ${response.status} (${response.data.length} chars)`);
      if (response.data.length === 0) {
        throw new FetchError(url, "empty response body", { status: response.status });
      }
      return response.data;
    });
  }

  async fetchAll(urls: readonly string[]): Promise<string[]> {
    return Promise.all(urls.map(url => this.fetch(url)));
  }

  async head(url: string): Promise<Record<string, string>> {
    return guard(url, async () => (await head(url)).headers);
  }

  async fetchRange(url: string, start: number, end: number): Promise<Buffer> {
    return guard(url, async () => {
      const response = await getBinary(url, { start, end });
      debug(`Fetched bytes ${start}-${end} of ${url} (${response.data.byteLength} received)`);
      return response.data;
    });
  }
}
