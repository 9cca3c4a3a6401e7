// CHANGE: Define strongly typed domain models for the stream resolution pipeline.
// WHY: Loosely-typed upstream payloads are narrowed once and flow through typed seams.

import type { Stream } from "./stream.js";

/**
 * JSON-like value type used for permissive properties without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

/**
 * One stream variant as decoded from a manifest string, before any signing.
 */
export type RawManifestEntry = Readonly<Record<string, string>>;

/**
 * Manifest categories found under the same keys in the player config and the metadata payload.
 */
export type ManifestCategory = "progressive" | "adaptive";

/**
 * Upstream key holding each manifest category.
 */
export const MANIFEST_KEYS: Readonly<Record<ManifestCategory, string>> = {
  progressive: "url_encoded_fmt_stream_map",
  adaptive: "adaptive_fmts"
};

/**
 * Descrambled manifests of one source.
 *
 * Invariant: order of each list matches the order of variants in the upstream string.
 */
export interface ManifestSet {
  readonly progressive: readonly RawManifestEntry[];
  readonly adaptive: readonly RawManifestEntry[];
}

/**
 * Pipeline stage of a session.
 */
export type SessionStage = "uninitialized" | "fetched" | "descrambled" | "ready";

/**
 * Destination for downloaded bytes.
 *
 * @property path - Human-readable location reported to completion callbacks.
 */
export interface ByteSink {
  readonly path: string;
  write(chunk: Buffer): Promise<void>;
  close(): Promise<void>;
  /** Release the destination after a failed download, discarding partial bytes. */
  abort(): Promise<void>;
}

export type ProgressCallback = (stream: Stream, chunk: Buffer, totalBytes: number, bytesRemaining: number) => void;

export type CompleteCallback = (stream: Stream, sink: ByteSink) => void;

/**
 * Callback slots shared by reference between a session and every stream it builds.
 *
 * Invariant: exactly one instance per session; streams never copy it.
 */
export class StreamMonostate {
  onProgress?: ProgressCallback;
  onComplete?: CompleteCallback;

  constructor(onProgress?: ProgressCallback, onComplete?: CompleteCallback) {
    this.onProgress = onProgress;
    this.onComplete = onComplete;
  }
}

/**
 * Descriptive metadata surfaced alongside the streams.
 */
export interface VideoMetadata {
  readonly title: string;
  readonly author?: string;
  readonly lengthSeconds?: number;
  readonly viewCount?: number;
  readonly thumbnailUrl?: string;
}

/**
 * Artifacts gathered by the fetch stage.
 */
export interface FetchedArtifacts {
  readonly watchHtml: string;
  readonly scriptUrl: string;
  readonly script: string;
  readonly videoInfoUrl: string;
  readonly videoInfo: string;
}
