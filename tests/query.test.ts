// CHANGE: Verify filtering, ordering and lookups over stream collections.
// WHY: Every query returns a new view and leaves the source order intact.

import { describe, expect, it } from "vitest";
import { StreamQuery } from "../src/query.js";
import { Stream } from "../src/stream.js";
import { ManifestCategory, StreamMonostate } from "../src/types.js";
import { FakeTransport } from "./fixtures.js";

const monostate = new StreamMonostate();
const transport = new FakeTransport();

function stream(category: ManifestCategory, itag: string, type: string, extra: Record<string, string> = {}): Stream {
  return new Stream({
    entry: { url: `https://media.example/videoplayback?id=${itag}`, itag, type, ...extra },
    category,
    title: "Sample Clip",
    monostate,
    transport
  });
}

const streams = [
  stream("progressive", "18", 'video/mp4; codecs="avc1.42001E, mp4a.40.2"', { bitrate: "500000" }),
  stream("progressive", "22", 'video/mp4; codecs="avc1.64001F, mp4a.40.2"', { bitrate: "1500000" }),
  stream("adaptive", "137", 'video/mp4; codecs="avc1.640028"', { bitrate: "4000000", fps: "30" }),
  stream("adaptive", "248", 'video/webm; codecs="vp9"', { fps: "60" }),
  stream("adaptive", "140", 'audio/mp4; codecs="mp4a.40.2"', { bitrate: "128000" }),
  stream("adaptive", "251", 'audio/webm; codecs="opus"', { bitrate: "160000" })
];

const itags = (query: StreamQuery): number[] => query.all().map(item => item.itag);

describe("StreamQuery", () => {
  const query = new StreamQuery(streams);

  it("keeps upstream order", () => {
    expect(itags(query)).toEqual([18, 22, 137, 248, 140, 251]);
    expect(query.count()).toBe(6);
    expect([...query].map(item => item.itag)).toEqual([18, 22, 137, 248, 140, 251]);
  });

  it("filters by progressive and adaptive", () => {
    expect(itags(query.progressive())).toEqual([18, 22]);
    expect(itags(query.adaptive())).toEqual([137, 248, 140, 251]);
    expect(itags(query.filter({ progressive: false }))).toEqual([137, 248, 140, 251]);
  });

  it("filters single-track streams", () => {
    expect(itags(query.filter({ onlyAudio: true }))).toEqual([140, 251]);
    expect(itags(query.filter({ onlyVideo: true }))).toEqual([137, 248]);
  });

  it("combines attribute criteria", () => {
    expect(itags(query.filter({ subtype: "webm" }))).toEqual([248, 251]);
    expect(itags(query.filter({ fileExtension: "mp4", adaptive: true }))).toEqual([137, 140]);
    expect(itags(query.filter({ res: "720p" }))).toEqual([22]);
    expect(itags(query.filter({ fps: 60 }))).toEqual([248]);
    expect(itags(query.filter({ abr: "160kbps" }))).toEqual([251]);
    expect(itags(query.filter({ audioCodec: "opus" }))).toEqual([251]);
    expect(itags(query.filter({ videoCodec: "avc1.640028" }))).toEqual([137]);
    expect(itags(query.filter({ mimeType: "audio/mp4" }))).toEqual([140]);
    expect(itags(query.filter({ customFilters: [item => item.itag > 200] }))).toEqual([248, 251]);
  });

  it("looks streams up by itag", () => {
    expect(query.get(140)?.mimeType).toBe("audio/mp4");
    expect(query.get(999)).toBeUndefined();
    expect(query.filter({ itag: 22 }).first()?.itag).toBe(22);
  });

  it("selects highest and lowest bitrate among streams declaring one", () => {
    expect(query.highestBitrate()?.itag).toBe(137);
    expect(query.lowestBitrate()?.itag).toBe(140);
    expect(new StreamQuery([]).highestBitrate()).toBeUndefined();
  });

  it("orders by resolution, dropping streams without one", () => {
    const ordered = query.orderBy("resolution");
    expect(itags(ordered)).toEqual([18, 22, 137, 248]);
    expect(ordered.desc().first()?.itag).toBe(248);
    expect(ordered.asc().last()?.itag).toBe(248);
  });

  it("never mutates the source view", () => {
    query.desc();
    query.orderBy("bitrate");
    query.filter({ onlyAudio: true });
    expect(itags(query)).toEqual([18, 22, 137, 248, 140, 251]);
  });
});
