// CHANGE: Immutable descriptor of one playable variant with chunked download.
// WHY: Attributes are fixed at construction; only the measured size is memoized, once.

import sanitize from "sanitize-filename";
import { DOWNLOAD } from "./config.js";
import { FetchError, ManifestParseError, describeError } from "./errors.js";
import { itagProfile } from "./itags.js";
import { debug, info, warn } from "./logger.js";
import { Transport } from "./transport.js";
import { ByteSink, ManifestCategory, RawManifestEntry, StreamMonostate } from "./types.js";

const MIME_TYPE_CODECS = /^(\w+\/[\w.+-]+)\s*;\s*codecs="([^"]*)"$/;

/**
 * Split a manifest `type` field into mime type and codec list.
 *
 * @example
 * parseMimeType('video/mp4; codecs="avc1.42001E, mp4a.40.2"')
 * // { mimeType: "video/mp4", codecs: ["avc1.42001E", "mp4a.40.2"] }
 */
export function parseMimeType(raw: string): { readonly mimeType: string; readonly codecs: readonly string[] } {
  const trimmed = raw.trim();
  const match = MIME_TYPE_CODECS.exec(trimmed);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    const codecs = match[2]
      .split(",")
      .map(codec => codec.trim())
      .filter(codec => codec !== "");
    return { mimeType: match[1], codecs };
  }
  if (/^\w+\/[\w.+-]+$/.test(trimmed)) {
    return { mimeType: trimmed, codecs: [] };
  }
  throw new ManifestParseError(`Unrecognised stream type "${raw}"`);
}

function optionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export interface StreamInit {
  /** Signed manifest entry; must carry `url`, `itag` and `type`. */
  readonly entry: RawManifestEntry;
  readonly category: ManifestCategory;
  readonly title: string;
  readonly monostate: StreamMonostate;
  readonly transport: Transport;
}

/**
 * One stream variant: attributes, final URL and download.
 */
export class Stream {
  readonly itag: number;
  readonly url: string;
  readonly mimeType: string;
  readonly type: string;
  readonly subtype: string;
  readonly codecs: readonly string[];
  readonly isProgressive: boolean;
  readonly isAdaptive: boolean;
  readonly videoCodec?: string;
  readonly audioCodec?: string;
  readonly resolution?: string;
  readonly abr?: string;
  readonly fps?: number;
  readonly bitrate?: number;
  /** Size declared by the manifest (`clen`), when present. */
  readonly declaredSize?: number;
  readonly title: string;

  private readonly monostate: StreamMonostate;
  private readonly transport: Transport;
  private sizeSlot?: Promise<number>;

  /**
   * @throws ManifestParseError when `url`, `itag` or `type` is missing or malformed.
   */
  constructor(init: StreamInit) {
    const { entry, category } = init;
    const itag = optionalInt(entry.itag);
    if (itag === undefined) {
      throw new ManifestParseError(`Manifest entry without a numeric itag: ${JSON.stringify(entry)}`);
    }
    if (!entry.url) {
      throw new ManifestParseError(`Manifest entry ${itag} has no url`);
    }
    if (!entry.type) {
      throw new ManifestParseError(`Manifest entry ${itag} has no type`);
    }
    const { mimeType, codecs } = parseMimeType(entry.type);
    const [type = "", subtype = ""] = mimeType.split("/");
    const profile = itagProfile(itag);

    this.itag = itag;
    this.url = entry.url;
    this.mimeType = mimeType;
    this.type = type;
    this.subtype = subtype;
    this.codecs = codecs;
    this.isProgressive = category === "progressive";
    this.isAdaptive = !this.isProgressive;
    if (this.isProgressive) {
      this.videoCodec = codecs[0];
      this.audioCodec = codecs[1];
    } else if (type === "audio") {
      this.audioCodec = codecs[0];
    } else {
      this.videoCodec = codecs[0];
    }
    this.resolution = entry.quality_label ?? profile?.resolution;
    this.abr = profile?.abr;
    this.fps = optionalInt(entry.fps);
    this.bitrate = optionalInt(entry.bitrate);
    this.declaredSize = optionalInt(entry.clen);
    this.title = init.title;
    this.monostate = init.monostate;
    this.transport = init.transport;
  }

  get includesAudioTrack(): boolean {
    return this.isProgressive || this.type === "audio";
  }

  get includesVideoTrack(): boolean {
    return this.isProgressive || this.type === "video";
  }

  /**
   * Size in bytes: the declared `clen`, otherwise the `content-length` of a HEAD request.
   *
   * Invariant: concurrent callers share one lookup; a failed lookup is not cached.
   */
  filesize(): Promise<number> {
    this.sizeSlot ??= this.measureSize().catch((error: unknown) => {
      this.sizeSlot = undefined;
      throw error;
    });
    return this.sizeSlot;
  }

  private async measureSize(): Promise<number> {
    if (this.declaredSize !== undefined) {
      return this.declaredSize;
    }
    const headers = await this.transport.head(this.url);
    const length = optionalInt(headers["content-length"]);
    if (length === undefined) {
      throw new FetchError(this.url, "response has no content-length");
    }
    debug(`Measured itag ${this.itag}: ${length} bytes`);
    return length;
  }

  /**
   * Filesystem-safe file name derived from the video title and container subtype.
   */
  defaultFilename(): string {
    const base = sanitize(this.title).trim() || `stream-${this.itag}`;
    return `${base}.${this.subtype}`;
  }

  /**
   * Download the stream in ranged chunks into `sink`.
   *
   * Progress callbacks fire after each chunk is written; the completion callback fires once
   * after the sink is closed. On failure the sink is aborted and the error rethrown.
   *
   * @throws FetchError when a range request fails or returns no bytes.
   */
  async download(sink: ByteSink, chunkSize: number = DOWNLOAD.CHUNK_SIZE): Promise<void> {
    try {
      const totalBytes = await this.filesize();
      info(`Downloading itag ${this.itag} (${totalBytes} bytes) to ${sink.path}`);
      let downloaded = 0;
      while (downloaded < totalBytes) {
        const end = Math.min(downloaded + chunkSize, totalBytes) - 1;
        const chunk = await this.transport.fetchRange(this.url, downloaded, end);
        if (chunk.byteLength === 0) {
          throw new FetchError(this.url, `empty range ${downloaded}-${end}`);
        }
        await sink.write(chunk);
        downloaded += chunk.byteLength;
        this.monostate.onProgress?.(this, chunk, totalBytes, Math.max(0, totalBytes - downloaded));
      }
      await sink.close();
    } catch (error) {
      warn(`Download of itag ${this.itag} to ${sink.path} failed: ${describeError(error)}`);
      await sink.abort();
      throw error;
    }
    this.monostate.onComplete?.(this, sink);
  }

  toString(): string {
    const quality = this.isAdaptive && this.type === "audio" ? `abr="${this.abr ?? "unknown"}"` : `res="${this.resolution ?? "unknown"}"`;
    return `<Stream: itag="${this.itag}" mime_type="${this.mimeType}" ${quality} progressive="${this.isProgressive}">`;
  }
}
