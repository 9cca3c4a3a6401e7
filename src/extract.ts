// CHANGE: Locate the embedded player configuration and auxiliary URLs in watch-page markup.
// WHY: Extraction anchors on assignment markers, never on positional offsets.

import { SOURCES } from "./config.js";
import { ConfigExtractionError, InvalidUrlError } from "./errors.js";
import { ConfigNode } from "./player-config.js";

const CONFIG_MARKER = /ytplayer\.config\s*=\s*/g;
const SCRIPT_ASSET = /"(?:jsUrl|PLAYER_JS_URL|js)"\s*:\s*"([^"]+)"/;
const STS = /"sts"\s*:\s*(\d+)/;
const VIDEO_ID = /(?:v=|\/)([0-9A-Za-z_-]{11})(?:[?&#/]|$)/;
const BARE_VIDEO_ID = /^[0-9A-Za-z_-]{11}$/;

/**
 * Extract the 11-character video id from a watch URL, short link or bare id.
 *
 * @throws InvalidUrlError when no id can be found.
 *
 * @example
 * videoId("https://youtube.com/watch?v=aBcDeFgHiJk") // "aBcDeFgHiJk"
 */
export function videoId(url: string): string {
  const trimmed = url.trim();
  if (BARE_VIDEO_ID.test(trimmed)) {
    return trimmed;
  }
  const match = VIDEO_ID.exec(trimmed);
  if (!match?.[1]) {
    throw new InvalidUrlError(`No video id found in "${url}"`);
  }
  return match[1];
}

export function watchUrl(id: string): string {
  return `${SOURCES.WATCH}${id}`;
}

/**
 * Slice a balanced JSON object starting at `startIndex`, honouring string literals.
 *
 * @returns The object text, or undefined when the braces never balance.
 */
export function sliceBalancedObject(text: string, startIndex: number): string | undefined {
  if (text[startIndex] !== "{") {
    return undefined;
  }
  let depth = 0;
  let inString = false;
  let escaping = false;
  for (let index = startIndex; index < text.length; index += 1) {
    const char = text[index];
    if (inString) {
      if (escaping) {
        escaping = false;
      } else if (char === "\\") {
        escaping = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return text.slice(startIndex, index + 1);
      }
    }
  }
  return undefined;
}

/**
 * Parse the `ytplayer.config` object embedded in watch-page markup.
 *
 * @param markup - Raw watch page.
 * @throws ConfigExtractionError when the marker is absent or the object does not parse.
 */
export function extractConfig(markup: string): ConfigNode {
  for (const marker of markup.matchAll(CONFIG_MARKER)) {
    const start = (marker.index ?? 0) + marker[0].length;
    const objectText = sliceBalancedObject(markup, start);
    if (objectText !== undefined) {
      return ConfigNode.parse(objectText, "ytplayer.config");
    }
  }
  throw new ConfigExtractionError("Player configuration marker ytplayer.config not found in watch page");
}

function absoluteUrl(raw: string): string {
  const unescaped = raw.replace(/\\\//g, "/");
  if (unescaped.startsWith("//")) {
    return `https:${unescaped}`;
  }
  if (unescaped.startsWith("/")) {
    return `${SOURCES.ORIGIN}${unescaped}`;
  }
  return unescaped;
}

/**
 * Derive the script URL and the metadata URL from watch-page markup.
 *
 * @param markup - Raw watch page.
 * @param id - Video id of the session.
 * @throws ConfigExtractionError when the player script asset is not referenced.
 */
export function deriveAuxiliaryUrls(markup: string, id: string): { readonly metadataUrl: string; readonly scriptUrl: string } {
  const asset = SCRIPT_ASSET.exec(markup)?.[1];
  if (!asset) {
    throw new ConfigExtractionError("Player script URL not found in watch page");
  }
  const params = new URLSearchParams({
    video_id: id,
    el: "$el",
    ps: "default",
    eurl: watchUrl(id),
    hl: "en_US"
  });
  const sts = STS.exec(markup)?.[1];
  if (sts) {
    params.set("sts", sts);
  }
  return {
    metadataUrl: `${SOURCES.VIDEO_INFO}?${params.toString()}`,
    scriptUrl: absoluteUrl(asset)
  };
}
