/**
 * Generational result cache.
 *
 * Entries are keyed by (userId, accessVersion, fingerprint). A grant change
 * bumps accessVersion, so older entries simply stop being addressed; they are
 * never deleted explicitly and age out through capacity eviction.
 */

import crypto from "crypto";
import type { ToolInvocation, ToolResult } from "./types";

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    const items = value.map(canonicalize);
    return items.every((item) => typeof item === "string")
      ? [...items].sort()
      : items;
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) {
        sorted[key] = canonicalize(entry);
      }
    }
    return sorted;
  }
  return value;
}

/**
 * sha256 of the canonical JSON of {tool, parameters}: sorted keys, sorted
 * category lists, undefined members dropped
 */
export function fingerprint(call: ToolInvocation): string {
  const canonical = JSON.stringify(canonicalize({ tool: call.tool, parameters: call.parameters }));
  return crypto.createHash("sha256").update(canonical).digest("hex");
}

export function cacheKey(userId: number, accessVersion: number, print: string): string {
  return `${userId}:${accessVersion}:${print}`;
}

export interface ResultCache {
  get(key: string): ToolResult | undefined;
  set(key: string, result: ToolResult): void;
  readonly size: number;
}

/**
 * Insertion-ordered Map bounded by capacity; the oldest insertion goes first.
 */
export class BoundedResultCache implements ResultCache {
  private entries = new Map<string, ToolResult>();

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): ToolResult | undefined {
    return this.entries.get(key);
  }

  set(key: string, result: ToolResult): void {
    if (this.entries.has(key)) {
      this.entries.set(key, result);
      return;
    }
    while (this.entries.size >= this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, result);
  }
}
