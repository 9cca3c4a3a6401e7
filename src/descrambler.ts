// CHANGE: Decode delimiter-encoded manifest strings into ordered variant mappings.
// WHY: An absent manifest is an empty category; a malformed one is a hard failure.

import { ManifestParseError } from "./errors.js";
import { RawManifestEntry } from "./types.js";

const VARIANT_DELIMITER = /[,;]/;
const FIELD_DELIMITER = "&";

function decodeComponent(raw: string, variantIndex: number): string {
  try {
    return decodeURIComponent(raw.replace(/\+/g, " "));
  } catch {
    throw new ManifestParseError(`Invalid percent-encoding in variant ${variantIndex}: "${raw}"`);
  }
}

function parseVariant(variant: string, variantIndex: number): RawManifestEntry {
  if (variant.trim() === "") {
    throw new ManifestParseError(`Empty variant at position ${variantIndex}`);
  }
  const fields = new Map<string, string>();
  for (const field of variant.split(FIELD_DELIMITER)) {
    const separator = field.indexOf("=");
    if (separator <= 0) {
      throw new ManifestParseError(`Malformed field "${field}" in variant ${variantIndex}`);
    }
    const key = decodeComponent(field.slice(0, separator), variantIndex);
    fields.set(key, decodeComponent(field.slice(separator + 1), variantIndex));
  }
  return Object.fromEntries(fields);
}

/**
 * Decode a manifest string into one mapping per stream variant.
 *
 * Variants are separated by `,` or `;`, fields by `&`; keys and values are form-encoded.
 *
 * @param manifest - Raw manifest string, possibly absent.
 * @returns Entries in upstream order; empty when the manifest is empty or absent.
 * @throws ManifestParseError on empty variants, fields without a key, or bad percent-encoding.
 *
 * @example
 * descramble("itag=18&s=XYZ;itag=22&s=ABC")
 * // [{ itag: "18", s: "XYZ" }, { itag: "22", s: "ABC" }]
 */
export function descramble(manifest: string | undefined): RawManifestEntry[] {
  if (manifest === undefined || manifest.trim() === "") {
    return [];
  }
  return manifest.trim().split(VARIANT_DELIMITER).map((variant, index) => parseVariant(variant, index));
}

/**
 * Encode entries back into a manifest string using `,` between variants.
 */
export function encodeManifest(entries: readonly RawManifestEntry[]): string {
  return entries
    .map(entry =>
      Object.entries(entry)
        .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(value)}`)
        .join(FIELD_DELIMITER)
    )
    .join(",");
}
