// CHANGE: Static format-tag lookup for resolution and audio bitrate.
// WHY: Adaptive manifests often omit quality labels; the tag alone identifies them.

import fs from "fs-extra";
import { fileURLToPath } from "url";
import { isRecord } from "./player-config.js";
import { JsonValue } from "./types.js";

/**
 * Known attributes of a format tag.
 *
 * @property resolution - Vertical resolution label such as `720p`.
 * @property abr - Audio bitrate label such as `128kbps`.
 */
export interface ItagProfile {
  readonly itag: number;
  readonly resolution?: string;
  readonly abr?: string;
}

const ITAG_TABLE_PATH = fileURLToPath(new URL("../data/itags.json", import.meta.url));

function optionalString(value: JsonValue | undefined): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function loadTable(): ReadonlyMap<number, ItagProfile> {
  const raw: JsonValue = fs.readJsonSync(ITAG_TABLE_PATH);
  const table = new Map<number, ItagProfile>();
  if (!isRecord(raw)) {
    throw new Error(`Malformed itag table: ${ITAG_TABLE_PATH}`);
  }
  for (const [key, value] of Object.entries(raw)) {
    if (!isRecord(value)) {
      throw new Error(`Malformed itag entry ${key} in ${ITAG_TABLE_PATH}`);
    }
    const itag = Number.parseInt(key, 10);
    table.set(itag, {
      itag,
      resolution: optionalString(value.resolution),
      abr: optionalString(value.abr)
    });
  }
  return table;
}

let cachedTable: ReadonlyMap<number, ItagProfile> | undefined;

/**
 * Look up a format tag.
 *
 * @returns Profile, or undefined for tags the table does not know.
 */
export function itagProfile(itag: number): ItagProfile | undefined {
  cachedTable ??= loadTable();
  return cachedTable.get(itag);
}
