// CHANGE: Derive the signature transform from player script text as a small instruction list.
// WHY: Script text is parsed, never evaluated; only three elementary operations are accepted.

import { SignatureResolutionError } from "./errors.js";
import { debug } from "./logger.js";

/**
 * Elementary string operation understood by the interpreter.
 *
 * - `reverse`: reverse the characters.
 * - `slice`: drop the first `argument` characters.
 * - `swap`: exchange the first character with the one at `argument % length`.
 */
export type SignatureOperation =
  | { readonly kind: "reverse" }
  | { readonly kind: "slice"; readonly argument: number }
  | { readonly kind: "swap"; readonly argument: number };

const IDENTIFIER = "[a-zA-Z0-9$_]+";

// Ordered from most to least specific; the first match wins.
const ENTRY_POINT_PATTERNS: readonly RegExp[] = [
  new RegExp(`\\b[cs]\\s*&&\\s*[adf]\\.set\\([^,]+\\s*,\\s*encodeURIComponent\\s*\\(\\s*(${IDENTIFIER})\\(`),
  new RegExp(`\\b[a-zA-Z0-9]+\\s*&&\\s*[a-zA-Z0-9]+\\.set\\([^,]+\\s*,\\s*encodeURIComponent\\s*\\(\\s*(${IDENTIFIER})\\(`),
  new RegExp(`(?:^|[^a-zA-Z0-9$_])(${IDENTIFIER})\\s*=\\s*function\\(\\s*a\\s*\\)\\s*\\{\\s*a\\s*=\\s*a\\.split\\(\\s*""\\s*\\)`),
  new RegExp(`(["'])signature\\1\\s*,\\s*(${IDENTIFIER})\\(`),
  new RegExp(`\\.sig\\|\\|(${IDENTIFIER})\\(`)
];

const CALL_STATEMENT = new RegExp(
  `^(?:${IDENTIFIER}\\s*=\\s*)?(${IDENTIFIER})(?:\\.(${IDENTIFIER})|\\[["'](${IDENTIFIER})["']\\])\\(\\s*${IDENTIFIER}\\s*,\\s*(\\d+)\\s*\\)$`
);

const HELPER_METHOD = new RegExp(
  `(?:["'](${IDENTIFIER})["']|(${IDENTIFIER}))\\s*:\\s*function\\s*\\([^)]*\\)\\s*\\{([^}]*)\\}`,
  "g"
);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Locate the name of the function that turns a scrambled token into a signature.
 *
 * @param script - Player script text.
 * @throws SignatureResolutionError when no known pattern matches.
 */
export function findEntryPoint(script: string): string {
  for (const pattern of ENTRY_POINT_PATTERNS) {
    const match = pattern.exec(script);
    // The quoted-signature pattern captures the quote first.
    const name = match ? match[match.length - 1] : undefined;
    if (name) {
      debug(`Signature entry point "${name}" matched ${pattern.source.slice(0, 40)}...`);
      return name;
    }
  }
  throw new SignatureResolutionError("Signature entry point not found in player script");
}

function findFunctionBody(script: string, name: string): string {
  const escaped = escapeRegExp(name);
  const patterns = [
    new RegExp(`(?:^|[^a-zA-Z0-9$_.])${escaped}\\s*=\\s*function\\s*\\(\\s*${IDENTIFIER}\\s*\\)\\s*\\{([^}]*)\\}`),
    new RegExp(`function\\s+${escaped}\\s*\\(\\s*${IDENTIFIER}\\s*\\)\\s*\\{([^}]*)\\}`)
  ];
  for (const pattern of patterns) {
    const body = pattern.exec(script)?.[1];
    if (body !== undefined) {
      return body;
    }
  }
  throw new SignatureResolutionError(`Body of signature function "${name}" not found`);
}

type OperationKind = SignatureOperation["kind"];

function classifyMethod(body: string): OperationKind | undefined {
  if (/\.reverse\(\s*\)/.test(body)) {
    return "reverse";
  }
  if (/\.splice\(\s*0\s*,/.test(body) || /\.slice\(/.test(body)) {
    return "slice";
  }
  if (/\[0\]\s*=/.test(body) && /%/.test(body)) {
    return "swap";
  }
  return undefined;
}

function findHelperTable(script: string, objectName: string): ReadonlyMap<string, OperationKind> {
  const pattern = new RegExp(`var\\s+${escapeRegExp(objectName)}\\s*=\\s*\\{([\\s\\S]*?)\\};`);
  const body = pattern.exec(script)?.[1];
  if (body === undefined) {
    throw new SignatureResolutionError(`Operation table "${objectName}" not found`);
  }
  const table = new Map<string, OperationKind>();
  for (const match of body.matchAll(HELPER_METHOD)) {
    const method = match[1] ?? match[2];
    const kind = classifyMethod(match[3] ?? "");
    if (!method) {
      continue;
    }
    if (!kind) {
      throw new SignatureResolutionError(`Unrecognised operation "${objectName}.${method}"`);
    }
    table.set(method, kind);
  }
  if (table.size === 0) {
    throw new SignatureResolutionError(`Operation table "${objectName}" is empty`);
  }
  return table;
}

function toOperation(kind: OperationKind, argument: number): SignatureOperation {
  switch (kind) {
    case "reverse":
      return { kind };
    case "slice":
    case "swap":
      return { kind, argument };
  }
}

/**
 * Parse the ordered operation list out of the player script.
 *
 * @param script - Player script text.
 * @throws SignatureResolutionError when the entry point, its body or its operation table is missing.
 */
export function parseOperations(script: string): SignatureOperation[] {
  const name = findEntryPoint(script);
  const body = findFunctionBody(script, name);
  const tables = new Map<string, ReadonlyMap<string, OperationKind>>();
  const operations: SignatureOperation[] = [];

  for (const rawStatement of body.split(";")) {
    const statement = rawStatement.trim();
    if (statement === "" || /\.split\(|\.join\(/.test(statement)) {
      continue;
    }
    const call = CALL_STATEMENT.exec(statement);
    if (!call) {
      throw new SignatureResolutionError(`Unrecognised statement in "${name}": ${statement}`);
    }
    const [, objectName, dotted, bracketed, rawArgument] = call;
    const method = dotted ?? bracketed;
    if (!objectName || !method || !rawArgument) {
      throw new SignatureResolutionError(`Unrecognised statement in "${name}": ${statement}`);
    }
    let table = tables.get(objectName);
    if (!table) {
      table = findHelperTable(script, objectName);
      tables.set(objectName, table);
    }
    const kind = table.get(method);
    if (!kind) {
      throw new SignatureResolutionError(`Operation "${objectName}.${method}" missing from its table`);
    }
    operations.push(toOperation(kind, Number.parseInt(rawArgument, 10)));
  }

  if (operations.length === 0) {
    throw new SignatureResolutionError(`Signature function "${name}" applies no operations`);
  }
  return operations;
}

function applyOperation(characters: string[], operation: SignatureOperation): string[] {
  switch (operation.kind) {
    case "reverse":
      return [...characters].reverse();
    case "slice":
      return characters.slice(operation.argument);
    case "swap": {
      if (characters.length === 0) {
        return characters;
      }
      const target = operation.argument % characters.length;
      const swapped = [...characters];
      swapped[0] = characters[target] ?? "";
      swapped[target] = characters[0] ?? "";
      return swapped;
    }
  }
}

/**
 * Pure interpreter over a fixed operation list.
 */
export class SignatureTransform {
  readonly operations: readonly SignatureOperation[];

  constructor(operations: readonly SignatureOperation[]) {
    this.operations = [...operations];
  }

  /**
   * Apply the operations left-to-right to a scrambled token.
   */
  apply(token: string): string {
    return this.operations.reduce<string[]>(applyOperation, Array.from(token)).join("");
  }
}

/**
 * Derive a reusable transform from player script text.
 *
 * @throws SignatureResolutionError when no transform can be derived.
 */
export function deriveTransform(script: string): SignatureTransform {
  const operations = parseOperations(script);
  debug(`Derived signature transform with ${operations.length} operations`);
  return new SignatureTransform(operations);
}
