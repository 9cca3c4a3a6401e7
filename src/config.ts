// CHANGE: Centralise configuration source with environment overrides.
// WHY: HTTP timeouts, concurrency and chunking must be tunable without code changes.

import * as dotenv from "dotenv";

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const parsed = Number.parseInt(process.env[name] ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Upstream endpoints the pipeline talks to.
 */
export const SOURCES = {
  ORIGIN: "https://youtube.com",
  WATCH: "https://youtube.com/watch?v=",
  VIDEO_INFO: "https://youtube.com/get_video_info"
} as const;

/**
 * Network-level configuration for HTTP operations.
 *
 * Invariant: `CONCURRENCY` and `TIMEOUT` are positive.
 */
export const NET = {
  TIMEOUT: intFromEnv("STREAMS_HTTP_TIMEOUT", 30000),
  CONCURRENCY: intFromEnv("STREAMS_CONCURRENCY", 4)
} as const;

/**
 * Chunked download settings.
 */
export const DOWNLOAD = {
  CHUNK_SIZE: intFromEnv("STREAMS_CHUNK_SIZE", 9437184),
  OUTPUT_DIR: process.env.STREAMS_OUTPUT_DIR ?? "."
} as const;
