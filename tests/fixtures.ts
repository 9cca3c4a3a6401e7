// CHANGE: Shared in-process transport and page builders for pipeline tests.
// WHY: Tests never reach the network; every body is served from memory.

import { SOURCES } from "../src/config.js";
import { FetchError } from "../src/errors.js";
import { Transport } from "../src/transport.js";
import { JsonValue } from "../src/types.js";

export const VIDEO_ID = "aBcDeFgHiJk";
export const SCRIPT_URL = "https://youtube.com/s/player/test/base.js";

/**
 * Script whose transform is swap(2), reverse, slice(3): "abcdefghij" -> "gfedabc".
 */
export const SIGNATURE_SCRIPT = [
  "var Xy={ab:function(a){a.reverse()},cd:function(a,b){a.splice(0,b)},",
  "ef:function(a,b){var c=a[0];a[0]=a[b%a.length];a[b%a.length]=c}};",
  'Qz=function(a){a=a.split("");Xy.ef(a,2);Xy.ab(a,1);Xy.cd(a,3);return a.join("")};',
  "c&&d.set(b,encodeURIComponent(Qz(e)));"
].join("\n");

export const PROGRESSIVE_MANIFEST = [
  "url=https%3A%2F%2Fmedia.example%2Fvideoplayback%3Fid%3D18",
  "itag=18",
  "type=video%2Fmp4%3B+codecs%3D%22avc1.42001E%2C+mp4a.40.2%22",
  "s=abcdefghij",
  "clen=1000",
  "bitrate=500000"
].join("&");

export const ADAPTIVE_MANIFEST = [
  [
    "url=https%3A%2F%2Fmedia.example%2Fvideoplayback%3Fid%3D137%26signature%3Dpresigned",
    "itag=137",
    "type=video%2Fmp4%3B+codecs%3D%22avc1.640028%22",
    "fps=30",
    "bitrate=4000000",
    "clen=50000"
  ].join("&"),
  [
    "url=https%3A%2F%2Fmedia.example%2Fvideoplayback%3Fid%3D140",
    "itag=140",
    "type=audio%2Fmp4%3B+codecs%3D%22mp4a.40.2%22",
    "s=0123456789",
    "sp=sig",
    "bitrate=128000",
    "clen=4000"
  ].join("&")
].join(",");

export function buildArgs(overrides: Record<string, JsonValue> = {}): Record<string, JsonValue> {
  return {
    video_id: VIDEO_ID,
    title: "Sample Clip",
    author: "Sample Channel",
    length_seconds: "212",
    url_encoded_fmt_stream_map: PROGRESSIVE_MANIFEST,
    adaptive_fmts: ADAPTIVE_MANIFEST,
    ...overrides
  };
}

export function buildWatchHtml(args: Record<string, JsonValue> = buildArgs()): string {
  const config = { assets: { js: "/s/player/test/base.js" }, sts: 18000, args };
  return [
    "<!doctype html><html><head><title>watch</title></head><body>",
    `<script>var ytplayer = ytplayer || {};ytplayer.config = ${JSON.stringify(config)};ytplayer.load = function(){};</script>`,
    "</body></html>"
  ].join("");
}

export interface FakeTransportBodies {
  readonly watchHtml?: string;
  readonly script?: string;
  readonly videoInfo?: string;
  readonly heads?: Readonly<Record<string, Record<string, string>>>;
  readonly media?: Readonly<Record<string, Buffer>>;
}

/**
 * In-memory {@link Transport} keyed by URL, recording every request.
 */
export class FakeTransport implements Transport {
  readonly requests: string[] = [];
  readonly ranges: { readonly url: string; readonly start: number; readonly end: number }[] = [];
  private readonly bodies: FakeTransportBodies;

  constructor(bodies: FakeTransportBodies = {}) {
    this.bodies = bodies;
  }

  async fetch(url: string): Promise<string> {
    this.requests.push(url);
    let body: string | undefined;
    if (url.startsWith(SOURCES.WATCH)) {
      body = this.bodies.watchHtml ?? buildWatchHtml();
    } else if (url === SCRIPT_URL) {
      body = this.bodies.script ?? SIGNATURE_SCRIPT;
    } else if (url.startsWith(SOURCES.VIDEO_INFO)) {
      body = this.bodies.videoInfo ?? "status=ok";
    }
    if (body === undefined) {
      throw new FetchError(url, "no fixture for url", { status: 404 });
    }
    return body;
  }

  async fetchAll(urls: readonly string[]): Promise<string[]> {
    return Promise.all(urls.map(url => this.fetch(url)));
  }

  async head(url: string): Promise<Record<string, string>> {
    this.requests.push(`HEAD ${url}`);
    return this.bodies.heads?.[url] ?? {};
  }

  async fetchRange(url: string, start: number, end: number): Promise<Buffer> {
    this.ranges.push({ url, start, end });
    const media = this.bodies.media?.[url];
    if (!media) {
      throw new FetchError(url, "no media fixture", { status: 404 });
    }
    return media.subarray(start, end + 1);
  }
}
