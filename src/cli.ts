// CHANGE: Extract CLI orchestration functions for reuse in program entrypoint and tests.
// WHY: CLI helpers stay importable without triggering command parsing.

import { Command, InvalidArgumentError } from "commander";
import path from "path";
import { DOWNLOAD } from "./config.js";
import { describeError } from "./errors.js";
import { debug, error as logError, info } from "./logger.js";
import { StreamQuery } from "./query.js";
import { FileSink } from "./sink.js";
import { Video } from "./video.js";

export interface ListOptions {
  readonly progressive?: boolean;
  readonly adaptive?: boolean;
}

export interface DownloadOptions {
  readonly itag: number;
  readonly output: string;
}

/**
 * Tabular rows for `list`, one per stream.
 */
export function describeStreams(streams: StreamQuery): Record<string, string | number>[] {
  return streams.all().map(stream => ({
    itag: stream.itag,
    mimeType: stream.mimeType,
    kind: stream.isProgressive ? "progressive" : "adaptive",
    quality: stream.resolution ?? stream.abr ?? "",
    codecs: stream.codecs.join(", "),
    size: stream.declaredSize ?? ""
  }));
}

/**
 * List mode entry point: resolve streams and print them.
 */
export async function listAction(url: string, options: ListOptions): Promise<void> {
  const video = await Video.create(url);
  let streams = video.streams;
  if (options.progressive) {
    streams = streams.progressive();
  }
  if (options.adaptive) {
    streams = streams.adaptive();
  }
  info(`${video.title}: ${streams.count()} streams`);
  console.table(describeStreams(streams));
}

/**
 * Download mode entry point: resolve streams and save one of them.
 */
export async function downloadAction(url: string, options: DownloadOptions): Promise<void> {
  const video = await Video.create(url);
  const stream = video.streams.get(options.itag);
  if (!stream) {
    throw new Error(`No stream with itag ${options.itag} for ${video.videoId}`);
  }
  video.registerOnProgressCallback((current, _chunk, totalBytes, bytesRemaining) => {
    const percent = totalBytes === 0 ? 100 : Math.round(((totalBytes - bytesRemaining) / totalBytes) * 100);
    debug(`itag ${current.itag}: ${percent}% (${bytesRemaining} bytes remaining)`);
  });
  video.registerOnCompleteCallback((current, sink) => {
    info(`itag ${current.itag} saved to ${sink.path}`);
  });
  const sink = await FileSink.open(path.join(options.output, stream.defaultFilename()));
  await stream.download(sink);
}

function parseItag(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("itag must be a positive integer");
  }
  return parsed;
}

/**
 * Construct commander program with configured commands.
 *
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(): Command {
  const program = new Command();
  program.name("stream-resolver").description("Resolve watch pages into downloadable streams").version("1.0.0");

  program
    .command("list")
    .description("List every stream available for a video")
    .argument("<url>", "watch URL or video id")
    .option("--progressive", "only progressive (audio+video) streams")
    .option("--adaptive", "only adaptive (single track) streams")
    .action(async (url: string, options: ListOptions) => listAction(url, options));

  program
    .command("download")
    .description("Download one stream by itag")
    .argument("<url>", "watch URL or video id")
    .requiredOption("-i, --itag <itag>", "format tag of the stream", parseItag)
    .option("-o, --output <dir>", "output directory", DOWNLOAD.OUTPUT_DIR)
    .action(async (url: string, options: DownloadOptions) => downloadAction(url, options));

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 */
export async function runCli(argv: readonly string[]): Promise<void> {
  const program = buildProgram();
  try {
    await program
      .configureOutput({
        outputError: (str: string) => logError(str)
      })
      .parseAsync([...argv]);
  } catch (error) {
    logError(`CLI failed: ${describeError(error)}`);
    process.exitCode = 1;
  }
}
