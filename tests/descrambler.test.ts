// CHANGE: Validate manifest decoding, ordering and malformed-input failures.
// WHY: An empty manifest is a valid empty category; a malformed one must fail loudly.

import { describe, expect, it } from "vitest";
import { descramble, encodeManifest } from "../src/descrambler.js";
import { ManifestParseError } from "../src/errors.js";
import type { RawManifestEntry } from "../src/types.js";

describe("descramble", () => {
  it("decodes variants separated by ';' and fields separated by '&'", () => {
    const entries = descramble("url=http%3A%2F%2Fx%2Fa&itag=18&s=XYZ;url=http%3A%2F%2Fx%2Fb&itag=22&s=ABC");
    expect(entries).toEqual([
      { url: "http://x/a", itag: "18", s: "XYZ" },
      { url: "http://x/b", itag: "22", s: "ABC" }
    ]);
  });

  it("accepts ',' as variant delimiter and keeps upstream order", () => {
    const entries = descramble("itag=140&type=audio,itag=18&type=video,itag=22&type=video");
    expect(entries.map(entry => entry.itag)).toEqual(["140", "18", "22"]);
  });

  it("yields an empty sequence for empty or absent manifests", () => {
    expect(descramble("")).toEqual([]);
    expect(descramble("   ")).toEqual([]);
    expect(descramble(undefined)).toEqual([]);
  });

  it("decodes '+' as a space before percent-decoding", () => {
    const [entry] = descramble("type=video%2Fmp4%3B+codecs%3D%22avc1.42001E%2C+mp4a.40.2%22&note=a%2Bb");
    expect(entry).toEqual({ type: 'video/mp4; codecs="avc1.42001E, mp4a.40.2"', note: "a+b" });
  });

  it("keeps the last value of a repeated key", () => {
    expect(descramble("itag=18&itag=22")).toEqual([{ itag: "22" }]);
  });

  it("accepts empty values", () => {
    expect(descramble("itag=18&s=")).toEqual([{ itag: "18", s: "" }]);
  });

  it.each([
    ["empty variant", "itag=18,,itag=22"],
    ["trailing delimiter", "itag=18;"],
    ["field without '='", "itag=18&broken"],
    ["empty key", "itag=18&=value"],
    ["bad percent-encoding", "url=%E0%A4%A"]
  ])("rejects %s", (_label, manifest) => {
    expect(() => descramble(manifest)).toThrow(ManifestParseError);
  });

  it("reconstructs the same entries after re-encoding", () => {
    const entries: RawManifestEntry[] = [
      { url: "https://media.example/videoplayback?id=1&x=y", itag: "18", s: "A+B/C=" },
      { type: 'audio/webm; codecs="opus"', itag: "251" }
    ];
    expect(descramble(encodeManifest(entries))).toEqual(entries);
  });
});
