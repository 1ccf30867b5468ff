import type { JsonMap, JsonNode, NoValue, PathToken } from "../contracts/chartDocument";
import { NO_VALUE, viewNode } from "../contracts/chartDocument";
import { allowedPatterns } from "../schema/editableFields";
import { InvalidContainerError, PathNotEditableError } from "./errors";
import { normalizePath } from "./pathExpression";

function hasOwn(map: JsonMap, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key);
}

function emptyContainerFor(next: PathToken): JsonNode {
  return typeof next === "number" ? [] : {};
}

function fitsToken(node: JsonNode, next: PathToken): boolean {
  const view = viewNode(node);
  return typeof next === "number" ? view.kind === "sequence" : view.kind === "mapping";
}

/** Reads the value at `tokens`; missing data of any kind yields `NO_VALUE`, never an error. */
export function getValue(root: JsonNode, tokens: readonly PathToken[]): JsonNode | NoValue {
  let current: JsonNode = root;
  for (const token of tokens) {
    const view = viewNode(current);
    if (typeof token === "number") {
      if (view.kind !== "sequence" || token >= view.node.length) return NO_VALUE;
      current = view.node[token];
    } else {
      if (view.kind !== "mapping" || !hasOwn(view.node, token)) return NO_VALUE;
      current = view.node[token];
    }
  }
  return current;
}

export function validatePath(tokens: readonly PathToken[], chartKind: string | null | undefined): void {
  const pattern = normalizePath(tokens);
  if (!allowedPatterns(chartKind).has(pattern)) {
    throw new PathNotEditableError(pattern, chartKind ?? null);
  }
}

/**
 * Writes `value` at `tokens`, creating or replacing intermediate containers so the walk can
 * continue. Returns what was stored there before. No schema check happens here.
 */
export function setValue(root: JsonNode, tokens: readonly PathToken[], value: JsonNode): JsonNode | NoValue {
  if (tokens.length === 0) {
    throw new InvalidContainerError("Cannot write to an empty path.", "");
  }

  let current: JsonNode = root;
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const isLast = i === tokens.length - 1;
    const view = viewNode(current);

    if (typeof token === "number") {
      if (view.kind !== "sequence") {
        throw new InvalidContainerError(`Expected list while updating path segment ${token}.`, token);
      }
      const list = view.node;
      if (isLast) {
        const previous: JsonNode | NoValue = token < list.length ? list[token] : NO_VALUE;
        while (list.length <= token) list.push(null);
        list[token] = value;
        return previous;
      }
      const next = tokens[i + 1];
      while (list.length <= token) list.push(emptyContainerFor(next));
      if (!fitsToken(list[token], next)) {
        list[token] = emptyContainerFor(next);
      }
      current = list[token];
      continue;
    }

    if (view.kind !== "mapping") {
      throw new InvalidContainerError(`Expected mapping while updating path segment '${token}'.`, token);
    }
    const map = view.node;
    if (isLast) {
      const previous: JsonNode | NoValue = hasOwn(map, token) ? map[token] : NO_VALUE;
      map[token] = value;
      return previous;
    }
    const next = tokens[i + 1];
    if (!hasOwn(map, token) || !fitsToken(map[token], next)) {
      map[token] = emptyContainerFor(next);
    }
    current = map[token];
  }

  return NO_VALUE;
}
