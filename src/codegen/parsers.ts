// JSON and TOML parsing functions for codegen

import path from "path";
import { parse as parseToml } from "@iarna/toml";
import type {
  CodegenConfig,
  FieldNames,
  PatchConfig,
  TemplateConfig,
  TransferSyntaxEntry,
} from "./types.js";
import {
  DEFAULT_BINDING,
  DEFAULT_FIELDS,
  assertString,
  assertTable,
  isMissingFieldPolicy,
  isRecord,
  optionalString,
} from "./types.js";
import { CodegenError, ConfigError, ParseError, describeError } from "./errors.js";
import { readText } from "./utils.js";

// =====================================================
// Transfer Syntax Table
// =====================================================

export function parseEntries(
  text: string,
  source: string,
  fields: FieldNames = DEFAULT_FIELDS,
): TransferSyntaxEntry[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ParseError(`Invalid JSON in ${source}: ${describeError(err)}`, { pipeline: "loader", path: source }, { cause: err });
  }

  if (!Array.isArray(parsed)) {
    throw new ParseError(`Expected a top-level array in ${source}`, { pipeline: "loader", path: source });
  }

  const entries: TransferSyntaxEntry[] = [];

  parsed.forEach((raw: unknown, index: number) => {
    if (!isRecord(raw)) {
      throw new ParseError(`Entry #${index} in ${source} is not an object`, { pipeline: "loader", path: source });
    }

    const identifier = raw[fields.identifier];
    if (typeof identifier !== "string") {
      throw new ParseError(`Entry #${index} in ${source}: ${fields.identifier} must be a string`, {
        pipeline: "loader",
        path: source,
        field: fields.identifier,
      });
    }

    const external = raw[fields.externalIdentifier];
    if (external !== undefined && typeof external !== "string") {
      throw new ParseError(`Entry ${identifier} in ${source}: ${fields.externalIdentifier} must be a string`, {
        pipeline: "loader",
        path: source,
        field: fields.externalIdentifier,
        entry: identifier,
      });
    }

    // Table order is kept as is; duplicates are left for the C++ compiler to reject
    entries.push({ identifier, externalIdentifier: external ?? null, raw });
  });

  return entries;
}

export function loadEntries(specPath: string, fields: FieldNames = DEFAULT_FIELDS): TransferSyntaxEntry[] {
  return parseEntries(readText(specPath, "loader"), specPath, fields);
}

// =====================================================
// Configuration
// =====================================================

export const DEFAULT_CONFIG_FILE = "transfer-syntax-codegen.toml";

function parseFields(raw: unknown): FieldNames {
  if (raw === undefined) return DEFAULT_FIELDS;
  const t = assertTable(raw, "fields");
  return {
    identifier: optionalString(t["identifier"], "fields.identifier", DEFAULT_FIELDS.identifier),
    externalIdentifier: optionalString(t["external_identifier"], "fields.external_identifier", DEFAULT_FIELDS.externalIdentifier),
  };
}

function parseTemplateSection(raw: unknown, baseDir: string): TemplateConfig | null {
  if (raw === undefined) return null;
  const t = assertTable(raw, "template");

  const missing = t["missing_fields"] ?? "empty";
  if (!isMissingFieldPolicy(missing)) {
    throw new ConfigError(`Invalid template.missing_fields: ${String(missing)} (expected "empty" or "error")`, {
      field: "template.missing_fields",
    });
  }

  return {
    templatePath: path.resolve(baseDir, assertString(t["template_path"], "template.template_path")),
    outputPath: path.resolve(baseDir, assertString(t["output_path"], "template.output_path")),
    binding: optionalString(t["binding"], "template.binding", DEFAULT_BINDING),
    missingFields: missing,
  };
}

function parsePatchSection(raw: unknown, baseDir: string): PatchConfig | null {
  if (raw === undefined) return null;
  const t = assertTable(raw, "patch");

  const forwardSignature = assertString(t["forward_signature"], "patch.forward_signature");
  const reverseSignature = assertString(t["reverse_signature"], "patch.reverse_signature");
  if (forwardSignature.trim() === "" || reverseSignature.trim() === "") {
    throw new ConfigError("patch signatures must not be empty", { field: "patch" });
  }

  return {
    targetPath: path.resolve(baseDir, assertString(t["target_path"], "patch.target_path")),
    forwardSignature,
    reverseSignature,
    hostPrefix: optionalString(t["host_prefix"], "patch.host_prefix", ""),
    externalPrefix: optionalString(t["external_prefix"], "patch.external_prefix", ""),
  };
}

/**
 * Parse a TOML configuration. Relative paths resolve against baseDir.
 */
export function parseConfig(text: string, baseDir: string, source = DEFAULT_CONFIG_FILE): CodegenConfig {
  let parsed: unknown;
  try {
    parsed = parseToml(text);
  } catch (err) {
    throw new ConfigError(`Invalid TOML in ${source}: ${describeError(err)}`, { pipeline: "config", path: source }, { cause: err });
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Invalid TOML structure in ${source}`, { pipeline: "config", path: source });
  }

  try {
    return {
      specPath: path.resolve(baseDir, assertString(parsed["spec_path"], "spec_path")),
      fields: parseFields(parsed["fields"]),
      template: parseTemplateSection(parsed["template"], baseDir),
      patch: parsePatchSection(parsed["patch"], baseDir),
    };
  } catch (err) {
    if (err instanceof CodegenError) throw err.withContext({ pipeline: "config", path: source });
    throw err;
  }
}

export function loadConfig(configPath: string): CodegenConfig {
  const resolved = path.resolve(configPath);
  const text = readText(resolved, "config");
  return parseConfig(text, path.dirname(resolved), resolved);
}
