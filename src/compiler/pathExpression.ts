import type { PathToken } from "../contracts/chartDocument";
import { MalformedPathError } from "./errors";

export type PathPattern = string;

export const ANY_INDEX_MARKER = "[]";

const RESERVED_SEGMENTS = new Set(["__proto__", "prototype", "constructor"]);

function pushField(tokens: PathToken[], field: string, path: string): void {
  if (!field) return;
  if (RESERVED_SEGMENTS.has(field)) {
    throw new MalformedPathError(`Reserved segment '${field}' in path ${path}.`, path);
  }
  tokens.push(field);
}

/**
 * Parses `series[0].dataLabels.enabled` into `["series", 0, "dataLabels", "enabled"]`.
 * Stray dots are tolerated; brackets must hold a non-negative integer literal.
 */
export function parsePath(path: string): PathToken[] {
  if (!path) {
    throw new MalformedPathError("Update paths cannot be empty.", path);
  }

  const tokens: PathToken[] = [];
  let buffer = "";
  let i = 0;
  while (i < path.length) {
    const ch = path[i];
    if (ch === ".") {
      pushField(tokens, buffer, path);
      buffer = "";
      i += 1;
      continue;
    }
    if (ch === "[") {
      pushField(tokens, buffer, path);
      buffer = "";
      const end = path.indexOf("]", i);
      if (end === -1) {
        throw new MalformedPathError(`Unmatched '[' in path ${path}.`, path);
      }
      const indexText = path.slice(i + 1, end);
      if (!/^\d+$/.test(indexText)) {
        throw new MalformedPathError(`List index must be numeric in path ${path}.`, path);
      }
      tokens.push(Number(indexText));
      i = end + 1;
      continue;
    }
    buffer += ch;
    i += 1;
  }
  pushField(tokens, buffer, path);

  if (tokens.length === 0) {
    throw new MalformedPathError(`Path ${path} does not name any field.`, path);
  }
  if (typeof tokens[0] === "number") {
    throw new MalformedPathError(`Path ${path} must start with a field name.`, path);
  }
  return tokens;
}

/** Collapses every index into the preceding field, so `series[0]` and `series[3]` match alike. */
export function normalizePath(tokens: readonly PathToken[]): PathPattern {
  const parts: string[] = [];
  for (const token of tokens) {
    if (typeof token === "number") {
      if (parts.length > 0) {
        parts[parts.length - 1] += ANY_INDEX_MARKER;
      } else {
        parts.push(ANY_INDEX_MARKER);
      }
      continue;
    }
    parts.push(token);
  }
  return parts.join(".");
}

export function stringifyPath(tokens: readonly PathToken[]): string {
  let out = "";
  for (const token of tokens) {
    if (typeof token === "number") {
      out += `[${token}]`;
    } else {
      out += out ? `.${token}` : token;
    }
  }
  return out;
}
