// CHANGE: Confirm HTTP helpers retry on transient failures only.
// WHY: Retries are bounded and limited to network issues and 5xx statuses.

import { AxiosError, AxiosHeaders, AxiosResponse, InternalAxiosRequestConfig } from "axios";
import { afterEach, describe, expect, it, vi } from "vitest";
import { getBinary, getText, httpClient } from "../src/utils/http.js";

const TARGET = "https://example.com/watch";
const config: InternalAxiosRequestConfig = { url: TARGET, headers: new AxiosHeaders() };

function failure(status: number): AxiosError {
  const error = new AxiosError(`status ${status}`);
  error.response = {
    status,
    statusText: "Error",
    headers: {},
    config,
    data: null
  } satisfies AxiosResponse;
  return error;
}

describe("getText", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("retries on 5xx responses", async () => {
    const spy = vi.spyOn(httpClient, "get");
    spy.mockRejectedValueOnce(failure(500));
    spy.mockResolvedValueOnce({
      status: 200,
      statusText: "OK",
      headers: { "Content-Type": "text/html" },
      config,
      data: "<html></html>"
    } satisfies AxiosResponse<string>);

    const response = await getText(TARGET);
    expect(response.data).toBe("<html></html>");
    expect(response.headers).toEqual({ "content-type": "text/html" });
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it("does not retry client errors", async () => {
    const spy = vi.spyOn(httpClient, "get");
    spy.mockRejectedValueOnce(failure(404));

    await expect(getText(TARGET)).rejects.toThrow("status 404");
    expect(spy).toHaveBeenCalledTimes(1);
  });
});

describe("getBinary", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("sends an inclusive Range header", async () => {
    const spy = vi.spyOn(httpClient, "get");
    spy.mockResolvedValueOnce({
      status: 206,
      statusText: "Partial Content",
      headers: {},
      config,
      data: new Uint8Array([1, 2, 3]).buffer
    } satisfies AxiosResponse<ArrayBuffer>);

    const response = await getBinary(TARGET, { start: 0, end: 2 });
    expect([...response.data]).toEqual([1, 2, 3]);
    expect(spy).toHaveBeenCalledWith(TARGET, { responseType: "arraybuffer", headers: { Range: "bytes=0-2" } });
  });
});
