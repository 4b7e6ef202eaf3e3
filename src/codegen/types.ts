// Type definitions for codegen

import { ConfigError } from "./errors.js";

// =====================================================
// Type Definitions
// =====================================================

export type Pipeline = "loader" | "template" | "patch" | "config";
export type MissingFieldPolicy = "empty" | "error";
export type Anchor = "forward" | "reverse";

/** One row of the transfer syntax table. */
export interface TransferSyntaxEntry {
  identifier: string;
  externalIdentifier: string | null;  // null: no counterpart in the external library
  raw: Record<string, unknown>;       // verbatim JSON object, exposed to templates
}

/** JSON member names holding the two identifiers. */
export interface FieldNames {
  identifier: string;
  externalIdentifier: string;
}

export interface TemplateConfig {
  templatePath: string;
  outputPath: string;
  binding: string;
  missingFields: MissingFieldPolicy;
}

export interface PatchConfig {
  targetPath: string;
  forwardSignature: string;
  reverseSignature: string;
  hostPrefix: string;
  externalPrefix: string;
}

export interface CodegenConfig {
  specPath: string;
  fields: FieldNames;
  template: TemplateConfig | null;
  patch: PatchConfig | null;
}

export interface GeneratedOutput {
  path: string;
  content: string;
}

// A single `case <label>: return <result>;` clause
export interface CaseClause {
  label: string;
  result: string;
}

// =====================================================
// Type Constants
// =====================================================

export const DEFAULT_FIELDS: FieldNames = {
  identifier: "identifier",
  externalIdentifier: "externalIdentifier",
};

export const DEFAULT_BINDING = "Syntaxes";
export const MISSING_FIELD_POLICIES: readonly string[] = ["empty", "error"];

// =====================================================
// Type Guards
// =====================================================

export function isMissingFieldPolicy(v: unknown): v is MissingFieldPolicy {
  return typeof v === "string" && MISSING_FIELD_POLICIES.includes(v);
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// =====================================================
// Assertion Helpers
// =====================================================

export function assertString(v: unknown, field: string): string {
  if (typeof v !== "string") throw new ConfigError(`${field} must be a string`, { field });
  return v;
}

export function optionalString(v: unknown, field: string, fallback: string): string {
  return v !== undefined ? assertString(v, field) : fallback;
}

export function assertTable(v: unknown, field: string): Record<string, unknown> {
  if (!isRecord(v)) throw new ConfigError(`[${field}] must be a table`, { field });
  return v;
}
