#!/usr/bin/env node
// CHANGE: Delegate execution to modular CLI runner and expose the library surface.
// WHY: Importing the package must not trigger command parsing.

import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv);
}

export { runCli };
export { Video } from "./video.js";
export type { VideoOptions } from "./video.js";
export { Stream } from "./stream.js";
export { StreamQuery } from "./query.js";
export type { StreamFilter, SortableAttribute } from "./query.js";
export { descramble, encodeManifest } from "./descrambler.js";
export { deriveTransform, SignatureTransform } from "./signature.js";
export type { SignatureOperation } from "./signature.js";
export { extractConfig, deriveAuxiliaryUrls, videoId, watchUrl } from "./extract.js";
export { HttpTransport } from "./transport.js";
export type { Transport } from "./transport.js";
export { FileSink } from "./sink.js";
export * from "./errors.js";
export * from "./types.js";
