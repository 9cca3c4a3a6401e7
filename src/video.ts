// CHANGE: Session orchestrator driving fetch, extract, descramble, sign and build.
// WHY: Each stage threads its result to the next; a stage commits only on full success.

import { descramble } from "./descrambler.js";
import { FetchError, ManifestParseError, SessionStateError } from "./errors.js";
import { deriveAuxiliaryUrls, extractConfig, videoId, watchUrl } from "./extract.js";
import { debug, info } from "./logger.js";
import { ConfigNode } from "./player-config.js";
import { StreamQuery } from "./query.js";
import { SignatureTransform, deriveTransform } from "./signature.js";
import { Stream } from "./stream.js";
import { HttpTransport, Transport } from "./transport.js";
import {
  CompleteCallback,
  FetchedArtifacts,
  MANIFEST_KEYS,
  ManifestCategory,
  ManifestSet,
  ProgressCallback,
  RawManifestEntry,
  SessionStage,
  StreamMonostate,
  VideoMetadata
} from "./types.js";

export interface VideoOptions {
  /** Skip the eager `prefetchInit()` performed by {@link Video.create}. */
  readonly deferPrefetchInit?: boolean;
  readonly onProgress?: ProgressCallback;
  readonly onComplete?: CompleteCallback;
  readonly transport?: Transport;
}

const EMPTY_MANIFESTS: ManifestSet = { progressive: [], adaptive: [] };

/**
 * Descramble both manifest categories of one source.
 *
 * @param lookup - Reads a raw manifest string by upstream key; undefined when absent.
 */
export function descrambleManifests(lookup: (key: string) => string | undefined): ManifestSet {
  return {
    progressive: descramble(lookup(MANIFEST_KEYS.progressive)),
    adaptive: descramble(lookup(MANIFEST_KEYS.adaptive))
  };
}

/**
 * Resolve the final URL of one entry.
 *
 * Pre-signed URLs are kept; a plain `sig`/`signature` field is appended as-is; a scrambled
 * `s` token is passed through the transform and appended under `sp` (default `signature`).
 *
 * @throws ManifestParseError when the entry has no `url`.
 */
export function applySignature(entry: RawManifestEntry, transform: SignatureTransform): RawManifestEntry {
  const url = entry.url;
  if (!url) {
    throw new ManifestParseError(`Manifest entry ${entry.itag ?? "?"} has no url`);
  }
  const scrambled = entry.s;
  if (url.includes("signature=") || (scrambled === undefined && /[?&]l?sig=/.test(url))) {
    return entry;
  }
  const separator = url.includes("?") ? "&" : "?";
  const plain = entry.sig ?? entry.signature;
  if (scrambled === undefined) {
    return plain === undefined ? entry : { ...entry, url: `${url}${separator}signature=${encodeURIComponent(plain)}` };
  }
  const parameter = entry.sp ?? "signature";
  return { ...entry, url: `${url}${separator}${parameter}=${encodeURIComponent(transform.apply(scrambled))}` };
}

function signManifests(manifests: ManifestSet, transform: SignatureTransform): ManifestSet {
  return {
    progressive: manifests.progressive.map(entry => applySignature(entry, transform)),
    adaptive: manifests.adaptive.map(entry => applySignature(entry, transform))
  };
}

function parseQueryString(payload: string): Readonly<Record<string, string>> {
  return Object.fromEntries(new URLSearchParams(payload));
}

function requirePayload(url: string, body: string | undefined): string {
  if (body === undefined || body.trim() === "") {
    throw new FetchError(url, "empty response body");
  }
  return body;
}

/**
 * One resolution session for one video.
 *
 * Stages: `uninitialized` → `fetched` (prefetch) → `descrambled` → `ready` (init).
 */
export class Video {
  readonly videoId: string;
  readonly watchUrl: string;

  private readonly transport: Transport;
  private readonly monostate: StreamMonostate;
  private currentStage: SessionStage = "uninitialized";
  private artifacts?: FetchedArtifacts;
  private videoInfo?: Readonly<Record<string, string>>;
  private playerConfig?: ConfigNode;
  private playerResponse?: ConfigNode;
  private configManifests: ManifestSet = EMPTY_MANIFESTS;
  private videoInfoManifestSet: ManifestSet = EMPTY_MANIFESTS;
  private fmtStreams: readonly Stream[] = [];
  private streamQuery?: StreamQuery;

  /**
   * Build a session without any network I/O.
   *
   * @param url - Watch URL, short link or bare video id.
   * @throws InvalidUrlError when no video id can be found.
   */
  constructor(url: string, options: VideoOptions = {}) {
    this.videoId = videoId(url);
    this.watchUrl = watchUrl(this.videoId);
    this.transport = options.transport ?? new HttpTransport();
    this.monostate = new StreamMonostate(options.onProgress, options.onComplete);
  }

  /**
   * Build a session and run `prefetchInit()` unless `deferPrefetchInit` is set.
   */
  static async create(url: string, options: VideoOptions = {}): Promise<Video> {
    const video = new Video(url, options);
    if (!options.deferPrefetchInit) {
      await video.prefetchInit();
    }
    return video;
  }

  get stage(): SessionStage {
    return this.currentStage;
  }

  /**
   * Download page markup, then the player script and metadata payload concurrently.
   *
   * A repeated call re-fetches, overwrites the artifacts and drops derived state.
   *
   * @throws FetchError on transport failure or empty payload.
   * @throws ConfigExtractionError when the page references no player script.
   */
  async prefetch(): Promise<void> {
    debug(`prefetch started for ${this.videoId}`);
    const watchHtml = requirePayload(this.watchUrl, await this.transport.fetch(this.watchUrl));
    const { metadataUrl, scriptUrl } = deriveAuxiliaryUrls(watchHtml, this.videoId);
    const [script, videoInfo] = await this.transport.fetchAll([scriptUrl, metadataUrl]);

    this.artifacts = {
      watchHtml,
      scriptUrl,
      script: requirePayload(scriptUrl, script),
      videoInfoUrl: metadataUrl,
      videoInfo: requirePayload(metadataUrl, videoInfo)
    };
    this.resetDerivedState();
    this.currentStage = "fetched";
    debug(`prefetch finished for ${this.videoId}`);
  }

  /**
   * Extract the player config, descramble all manifests, sign every entry and build streams.
   *
   * @throws SessionStateError when called before `prefetch()`.
   * @throws ConfigExtractionError when the player config is missing or malformed.
   * @throws ManifestParseError when a manifest string or entry is malformed.
   * @throws SignatureResolutionError when the player script yields no transform.
   */
  init(): void {
    const artifacts = this.artifacts;
    if (!artifacts) {
      throw new SessionStateError(`init() called before prefetch() for ${this.videoId}`);
    }
    info(`init started for ${this.videoId}`);

    const playerConfig = extractConfig(artifacts.watchHtml);
    const args = playerConfig.child("args");
    const videoInfo = parseQueryString(artifacts.videoInfo);

    const configManifests = descrambleManifests(key => args.optionalString(key));
    const videoInfoManifests = descrambleManifests(key => videoInfo[key]);
    this.resetDerivedState();
    this.videoInfo = videoInfo;
    this.playerConfig = playerConfig;
    this.configManifests = configManifests;
    this.videoInfoManifestSet = videoInfoManifests;
    this.currentStage = "descrambled";

    const transform = deriveTransform(artifacts.script);
    const signedConfig = signManifests(configManifests, transform);
    const signedVideoInfo = signManifests(videoInfoManifests, transform);

    const rawPlayerResponse = args.optionalString("player_response");
    const playerResponse = rawPlayerResponse === undefined ? undefined : ConfigNode.parse(rawPlayerResponse, "player_response");

    this.playerResponse = playerResponse;
    const title = this.readMetadata(args, playerResponse).title;
    const streams = [
      ...this.buildStreams(signedConfig.progressive, "progressive", title),
      ...this.buildStreams(signedConfig.adaptive, "adaptive", title)
    ];

    this.configManifests = signedConfig;
    this.videoInfoManifestSet = signedVideoInfo;
    this.fmtStreams = streams;
    this.streamQuery = undefined;
    this.currentStage = "ready";
    info(`init finished for ${this.videoId}: ${streams.length} streams`);
  }

  /**
   * Equivalent to `prefetch()` followed by `init()`.
   */
  async prefetchInit(): Promise<void> {
    await this.prefetch();
    this.init();
  }

  /**
   * Query interface over every built stream, computed on first access and cached until the
   * next `init()` or `prefetch()`.
   */
  get streams(): StreamQuery {
    this.streamQuery ??= new StreamQuery(this.fmtStreams);
    return this.streamQuery;
  }

  registerOnProgressCallback(callback: ProgressCallback): void {
    this.monostate.onProgress = callback;
  }

  registerOnCompleteCallback(callback: CompleteCallback): void {
    this.monostate.onComplete = callback;
  }

  get fetchedArtifacts(): FetchedArtifacts | undefined {
    return this.artifacts;
  }

  /**
   * Flat mapping parsed from the metadata payload; undefined before `init()`.
   */
  get videoInfoRecord(): Readonly<Record<string, string>> | undefined {
    return this.videoInfo;
  }

  get config(): ConfigNode | undefined {
    return this.playerConfig;
  }

  get playerResponseNode(): ConfigNode | undefined {
    return this.playerResponse;
  }

  /**
   * Manifests from the player config; the source of {@link streams}. Unsigned while the stage
   * is `descrambled`, signed once it is `ready`.
   */
  get manifests(): ManifestSet {
    return this.configManifests;
  }

  /**
   * Manifests from the metadata payload, signed alongside the config manifests but never
   * merged into {@link streams}.
   */
  get videoInfoManifests(): ManifestSet {
    return this.videoInfoManifestSet;
  }

  /**
   * Descriptive metadata; requires `init()`.
   */
  get metadata(): VideoMetadata {
    const config = this.playerConfig;
    if (!config || this.currentStage !== "ready") {
      throw new SessionStateError(`metadata requested before init() for ${this.videoId}`);
    }
    return this.readMetadata(config.child("args"), this.playerResponse);
  }

  get title(): string {
    return this.metadata.title;
  }

  private readMetadata(args: ConfigNode, playerResponse: ConfigNode | undefined): VideoMetadata {
    const details = playerResponse?.optionalChild("videoDetails");
    return {
      title: args.optionalString("title") ?? details?.optionalString("title") ?? this.videoId,
      author: args.optionalString("author") ?? details?.optionalString("author"),
      lengthSeconds: args.optionalNumber("length_seconds") ?? details?.optionalNumber("lengthSeconds"),
      viewCount: args.optionalNumber("view_count") ?? details?.optionalNumber("viewCount"),
      thumbnailUrl: args.optionalString("thumbnail_url")
    };
  }

  private buildStreams(entries: readonly RawManifestEntry[], category: ManifestCategory, title: string): Stream[] {
    return entries.map(
      entry =>
        new Stream({
          entry,
          category,
          title,
          monostate: this.monostate,
          transport: this.transport
        })
    );
  }

  private resetDerivedState(): void {
    this.videoInfo = undefined;
    this.playerConfig = undefined;
    this.playerResponse = undefined;
    this.configManifests = EMPTY_MANIFESTS;
    this.videoInfoManifestSet = EMPTY_MANIFESTS;
    this.fmtStreams = [];
    this.streamQuery = undefined;
  }
}
