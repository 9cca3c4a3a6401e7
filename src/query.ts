// CHANGE: Immutable query interface over the streams of one session.
// WHY: Every query returns a new view; the underlying list is never recomputed or mutated.

import { Stream } from "./stream.js";

/**
 * Filter criteria; every provided criterion must hold.
 */
export interface StreamFilter {
  readonly progressive?: boolean;
  readonly adaptive?: boolean;
  readonly onlyAudio?: boolean;
  readonly onlyVideo?: boolean;
  readonly itag?: number;
  readonly type?: string;
  readonly subtype?: string;
  readonly fileExtension?: string;
  readonly mimeType?: string;
  readonly res?: string;
  readonly fps?: number;
  readonly abr?: string;
  readonly videoCodec?: string;
  readonly audioCodec?: string;
  readonly customFilters?: readonly ((stream: Stream) => boolean)[];
}

export type SortableAttribute = "itag" | "resolution" | "abr" | "fps" | "bitrate" | "declaredSize";

function numericValue(stream: Stream, attribute: SortableAttribute): number | undefined {
  const value = stream[attribute];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === "number") {
    return value;
  }
  // "720p" -> 720, "128kbps" -> 128
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function predicatesFor(criteria: StreamFilter): ((stream: Stream) => boolean)[] {
  const predicates: ((stream: Stream) => boolean)[] = [];
  const { progressive, adaptive, onlyAudio, onlyVideo } = criteria;
  if (progressive !== undefined) predicates.push(s => s.isProgressive === progressive);
  if (adaptive !== undefined) predicates.push(s => s.isAdaptive === adaptive);
  if (onlyAudio) predicates.push(s => s.includesAudioTrack && !s.includesVideoTrack);
  if (onlyVideo) predicates.push(s => s.includesVideoTrack && !s.includesAudioTrack);
  if (criteria.itag !== undefined) predicates.push(s => s.itag === criteria.itag);
  if (criteria.type !== undefined) predicates.push(s => s.type === criteria.type);
  const subtype = criteria.subtype ?? criteria.fileExtension;
  if (subtype !== undefined) predicates.push(s => s.subtype === subtype);
  if (criteria.mimeType !== undefined) predicates.push(s => s.mimeType === criteria.mimeType);
  if (criteria.res !== undefined) predicates.push(s => s.resolution === criteria.res);
  if (criteria.fps !== undefined) predicates.push(s => s.fps === criteria.fps);
  if (criteria.abr !== undefined) predicates.push(s => s.abr === criteria.abr);
  if (criteria.videoCodec !== undefined) predicates.push(s => s.videoCodec === criteria.videoCodec);
  if (criteria.audioCodec !== undefined) predicates.push(s => s.audioCodec === criteria.audioCodec);
  predicates.push(...(criteria.customFilters ?? []));
  return predicates;
}

/**
 * Ordered, read-only collection of {@link Stream} with chainable queries.
 */
export class StreamQuery implements Iterable<Stream> {
  private readonly streams: readonly Stream[];
  private readonly byItag: ReadonlyMap<number, Stream>;

  constructor(streams: readonly Stream[]) {
    this.streams = [...streams];
    const byItag = new Map<number, Stream>();
    for (const stream of this.streams) {
      if (!byItag.has(stream.itag)) {
        byItag.set(stream.itag, stream);
      }
    }
    this.byItag = byItag;
  }

  /**
   * Keep streams matching every given criterion.
   */
  filter(criteria: StreamFilter): StreamQuery {
    const predicates = predicatesFor(criteria);
    return new StreamQuery(this.streams.filter(stream => predicates.every(predicate => predicate(stream))));
  }

  progressive(): StreamQuery {
    return this.filter({ progressive: true });
  }

  adaptive(): StreamQuery {
    return this.filter({ adaptive: true });
  }

  /**
   * Sort ascending by an attribute; streams lacking it are dropped.
   */
  orderBy(attribute: SortableAttribute): StreamQuery {
    const ranked = this.streams
      .map(stream => ({ stream, rank: numericValue(stream, attribute) }))
      .filter((item): item is { stream: Stream; rank: number } => item.rank !== undefined)
      .sort((left, right) => left.rank - right.rank)
      .map(item => item.stream);
    return new StreamQuery(ranked);
  }

  asc(): StreamQuery {
    return this;
  }

  desc(): StreamQuery {
    return new StreamQuery([...this.streams].reverse());
  }

  /**
   * Stream for a format tag; the first one wins when a tag repeats.
   */
  get(itag: number): Stream | undefined {
    return this.byItag.get(itag);
  }

  highestBitrate(): Stream | undefined {
    return this.orderBy("bitrate").last();
  }

  lowestBitrate(): Stream | undefined {
    return this.orderBy("bitrate").first();
  }

  first(): Stream | undefined {
    return this.streams[0];
  }

  last(): Stream | undefined {
    return this.streams[this.streams.length - 1];
  }

  count(): number {
    return this.streams.length;
  }

  all(): readonly Stream[] {
    return this.streams;
  }

  [Symbol.iterator](): Iterator<Stream> {
    return this.streams[Symbol.iterator]();
  }
}
