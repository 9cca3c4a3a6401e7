// CHANGE: Typed error taxonomy for every pipeline stage.
// WHY: Callers must tell "no streams of this kind" apart from "the pipeline broke".

/**
 * Base class for every error raised by the resolver.
 */
export class StreamResolverError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Transport failure: network error, non-success status, timeout or empty payload.
 * Retryable by the caller.
 */
export class FetchError extends StreamResolverError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options?: { readonly status?: number; readonly cause?: unknown }) {
    super(`Fetch failed for ${url}: ${message}`, { cause: options?.cause });
    this.url = url;
    this.status = options?.status;
  }
}

/**
 * The watch page no longer carries the embedded player configuration in the expected shape.
 */
export class ConfigExtractionError extends StreamResolverError {}

/**
 * A manifest string does not follow the variant/field delimiter structure.
 */
export class ManifestParseError extends StreamResolverError {}

/**
 * No signature transform could be derived from the player script.
 */
export class SignatureResolutionError extends StreamResolverError {}

/**
 * The input is neither a watch URL nor a bare video id.
 */
export class InvalidUrlError extends StreamResolverError {}

/**
 * A pipeline stage was invoked before the stage it depends on completed.
 */
export class SessionStateError extends StreamResolverError {}

/**
 * Render an unknown thrown value as a log-friendly message.
 *
 * @param value - Caught value.
 */
export function describeError(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
