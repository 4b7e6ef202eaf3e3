// Utility functions for codegen

import { createHash } from "crypto";
import { readFileSync, writeFileSync, existsSync } from "fs";
import { IOError, describeError } from "./errors.js";
import type { GeneratedOutput, Pipeline } from "./types.js";

// =====================================================
// Digest Computation
// =====================================================

export function stableStringify(obj: unknown): string {
  if (obj === null) return "null";
  if (typeof obj === "boolean" || typeof obj === "number") return JSON.stringify(obj);
  if (typeof obj === "string") return JSON.stringify(obj);
  if (Array.isArray(obj)) {
    return "[" + obj.map(stableStringify).join(",") + "]";
  }
  if (typeof obj === "object") {
    const record: Record<string, unknown> = { ...obj };
    const pairs = Object.keys(record).sort().map(k => `${JSON.stringify(k)}:${stableStringify(record[k])}`);
    return "{" + pairs.join(",") + "}";
  }
  throw new Error(`Cannot stringify: ${typeof obj}`);
}

export function computeDigest(obj: unknown): string {
  const canonical = stableStringify(obj);
  return createHash("sha256").update(canonical).digest("hex");
}

// =====================================================
// Text Matching
// =====================================================

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Regex source matching a C++ signature with any whitespace between its tokens.
 *
 * Examples:
 *   "A f(B x)"      -> "A\\s+f\\(B\\s+x\\)"
 *   "  A   f(B x) " -> same
 */
export function signaturePattern(signature: string): string {
  return signature
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join("\\s+");
}

// =====================================================
// File Access
// =====================================================

export function readText(path: string, pipeline: Pipeline): string {
  try {
    return readFileSync(path, "utf-8");
  } catch (err) {
    throw new IOError(`Cannot read ${path}: ${describeError(err)}`, { pipeline, path }, { cause: err });
  }
}

export function writeText(path: string, content: string, pipeline: Pipeline): void {
  try {
    writeFileSync(path, content);
  } catch (err) {
    throw new IOError(`Cannot write ${path}: ${describeError(err)}`, { pipeline, path }, { cause: err });
  }
}

export type SyncStatus = "generated" | "unchanged" | "missing" | "out-of-sync";

export interface SyncResult {
  path: string;
  status: SyncStatus;
}

/**
 * Compare an output with what is on disk and, unless checking, write it.
 * Identical content is never rewritten.
 */
export function syncOutput(output: GeneratedOutput, pipeline: Pipeline, check: boolean): SyncResult {
  const { path, content } = output;
  if (!existsSync(path)) {
    if (check) return { path, status: "missing" };
    writeText(path, content, pipeline);
    return { path, status: "generated" };
  }
  if (readText(path, pipeline) === content) {
    return { path, status: "unchanged" };
  }
  if (check) return { path, status: "out-of-sync" };
  writeText(path, content, pipeline);
  return { path, status: "generated" };
}
