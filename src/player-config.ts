// CHANGE: Typed accessors over the loosely-typed player configuration.
// WHY: A missing key or wrong shape fails here with its path, not deep inside stream building.

import { ConfigExtractionError } from "./errors.js";
import { JsonValue } from "./types.js";

export type JsonRecord = { readonly [key: string]: JsonValue };

export function isRecord(value: JsonValue | undefined): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read-only view over one node of the parsed player configuration.
 *
 * Invariant: the wrapped value is never mutated; `path` locates it from the root (`$`).
 */
export class ConfigNode {
  readonly path: string;
  private readonly value: JsonValue;

  constructor(value: JsonValue, path = "$") {
    this.value = value;
    this.path = path;
  }

  /**
   * Parse JSON text into a root node.
   *
   * @param text - JSON source.
   * @param source - Label used in error messages.
   * @throws ConfigExtractionError when the text is not JSON.
   */
  static parse(text: string, source: string): ConfigNode {
    let parsed: JsonValue;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new ConfigExtractionError(`${source} is not valid JSON`, { cause: error });
    }
    return new ConfigNode(parsed);
  }

  private record(): JsonRecord {
    if (!isRecord(this.value)) {
      throw new ConfigExtractionError(`Expected an object at ${this.path}`);
    }
    return this.value;
  }

  private entry(key: string): JsonValue | undefined {
    const record = this.record();
    return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
  }

  has(key: string): boolean {
    return this.entry(key) !== undefined;
  }

  /**
   * Required nested object.
   */
  child(key: string): ConfigNode {
    const value = this.entry(key);
    if (!isRecord(value)) {
      throw new ConfigExtractionError(`Expected an object at ${this.path}.${key}`);
    }
    return new ConfigNode(value, `${this.path}.${key}`);
  }

  optionalChild(key: string): ConfigNode | undefined {
    return this.has(key) ? this.child(key) : undefined;
  }

  /**
   * Required string value.
   */
  string(key: string): string {
    const value = this.optionalString(key);
    if (value === undefined) {
      throw new ConfigExtractionError(`Expected a string at ${this.path}.${key}`);
    }
    return value;
  }

  /**
   * String value when present; `undefined` when the key is absent or null.
   *
   * @throws ConfigExtractionError when the key holds a non-string value.
   */
  optionalString(key: string): string | undefined {
    const value = this.entry(key);
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== "string") {
      throw new ConfigExtractionError(`Expected a string at ${this.path}.${key}`);
    }
    return value;
  }

  /**
   * Numeric value; numeric strings are accepted since upstream mixes both.
   */
  optionalNumber(key: string): number | undefined {
    const value = this.entry(key);
    if (typeof value === "number") {
      return value;
    }
    if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
      return Number(value);
    }
    return undefined;
  }
}
