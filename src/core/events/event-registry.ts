/**
 * Event Registry
 *
 * Binds change handlers to path patterns. A pattern may contain `{uid}`
 * tokens, each matching one identifier segment. Matching is pure: it
 * returns the invocations to perform and leaves dispatch to the caller.
 *
 * @module
 */

import type { ConfigEvent, ConfigEventHandler, ConfigEventKind } from "../../types/index.js";
import { InvalidPathError } from "../errors.js";

// =============================================================================
// Patterns
// =============================================================================

export const UID_TOKEN = "{uid}";

/**
 * Characters accepted by a `{uid}` token
 */
export const UID_PATTERN = "[A-Za-z0-9_-]+";

export interface CompiledPattern {
  pattern: string;
  regex: RegExp;
  tokenCount: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compiles a path pattern. The pattern must match the start of a path,
 * optionally followed by `.` and any remainder.
 */
export function compilePattern(pattern: string): CompiledPattern {
  if (pattern.length === 0) {
    throw new InvalidPathError(pattern, "pattern is empty");
  }

  const pieces = pattern.split(UID_TOKEN);
  const body = pieces.map(escapeRegExp).join(`(${UID_PATTERN})`);

  return {
    pattern,
    regex: new RegExp(`^(?<path>${body})(?<extra>\\..+)?$`),
    tokenCount: pieces.length - 1,
  };
}

export interface PatternMatch {
  /** Portion of the path consumed by the pattern */
  path: string;
  /** Remainder after the consumed portion, including the leading dot */
  extra: string | null;
  tokens: string[];
}

export function matchPattern(compiled: CompiledPattern, path: string): PatternMatch | null {
  const match = compiled.regex.exec(path);
  if (!match?.groups) return null;

  const consumed = match.groups.path;
  if (consumed === undefined) return null;

  // Group 1 is the named path group; token captures follow it
  const tokens = match.slice(2, 2 + compiled.tokenCount).filter((token): token is string => token !== undefined);

  return { path: consumed, extra: match.groups.extra ?? null, tokens };
}

// =============================================================================
// Bindings
// =============================================================================

/**
 * Event fields known at dispatch time; binding data is added by the binding
 */
export type DispatchPayload = Omit<ConfigEvent<never>, "data">;

export interface HandlerBinding {
  id: number;
  kind: ConfigEventKind;
  pattern: CompiledPattern;
  invoke(payload: DispatchPayload): void | Promise<void>;
}

export type Invocation =
  | { type: "handler"; binding: HandlerBinding; tokens: string[] }
  | { type: "reprocess"; path: string };

export class EventRegistry {
  private readonly bindings: HandlerBinding[] = [];
  private nextId = 1;

  /**
   * Binds a handler to a path pattern for one event kind. `data` is handed
   * to the handler on every call and may be omitted.
   *
   * @returns Function that removes the binding
   */
  subscribe<TData = void>(
    kind: ConfigEventKind,
    pattern: string,
    handler: ConfigEventHandler<TData>,
    data: TData
  ): () => void {
    const binding: HandlerBinding = {
      id: this.nextId++,
      kind,
      pattern: compilePattern(pattern),
      invoke: (payload) => handler({ ...payload, data }),
    };
    this.bindings.push(binding);

    return () => {
      const index = this.bindings.indexOf(binding);
      if (index !== -1) {
        this.bindings.splice(index, 1);
      }
    };
  }

  /**
   * Invocations for an event at `path`, in registration order. A binding
   * whose pattern matches only a prefix of the path asks for that prefix to
   * be processed as a unit instead of receiving the event.
   */
  match(kind: ConfigEventKind, path: string): Invocation[] {
    const invocations: Invocation[] = [];

    for (const binding of this.bindings) {
      if (binding.kind !== kind) continue;

      const result = matchPattern(binding.pattern, path);
      if (!result) continue;

      if (result.extra !== null) {
        invocations.push({ type: "reprocess", path: result.path });
      } else {
        invocations.push({ type: "handler", binding, tokens: result.tokens });
      }
    }

    return invocations;
  }

  get size(): number {
    return this.bindings.length;
  }

  clear(): void {
    this.bindings.length = 0;
  }
}
