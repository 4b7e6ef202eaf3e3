// Command-line orchestration for the two generators

import path from "path";
import { CodegenError, ConfigError } from "./errors.js";
import { generatePatch } from "./gen-patch.js";
import { generateTemplate } from "./gen-template.js";
import { DEFAULT_CONFIG_FILE, loadConfig, loadEntries } from "./parsers.js";
import type { CodegenConfig, GeneratedOutput, Pipeline } from "./types.js";
import { syncOutput } from "./utils.js";
import type { SyncResult } from "./utils.js";

export type PipelineSelection = "template" | "patch" | "all";

export interface CliOptions {
  configPath: string;
  check: boolean;
  pipeline: PipelineSelection;
  help: boolean;
}

export const USAGE = [
  "Usage: transfer-syntax-codegen [--config <path>] [--check] [template|patch|all]",
  "",
  "Options:",
  `  --config <path>  Configuration file (default: ${DEFAULT_CONFIG_FILE})`,
  "  --check          Report out-of-sync outputs without writing them",
  "  -h, --help       Show this help",
].join("\n");

function isPipelineSelection(v: string): v is PipelineSelection {
  return v === "template" || v === "patch" || v === "all";
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { configPath: DEFAULT_CONFIG_FILE, check: false, pipeline: "all", help: false };
  let pipelineSeen = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--check") {
      options.check = true;
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg === "--config") {
      if (i + 1 >= args.length) {
        throw new ConfigError("--config requires an argument", { pipeline: "config" });
      }
      options.configPath = args[++i];
    } else if (!arg.startsWith("-") && isPipelineSelection(arg) && !pipelineSeen) {
      options.pipeline = arg;
      pipelineSeen = true;
    } else {
      throw new ConfigError(`Unknown argument '${arg}'`, { pipeline: "config" });
    }
  }

  return options;
}

interface PlannedOutput {
  pipeline: Pipeline;
  output: GeneratedOutput;
}

/**
 * Compute every selected output before touching the disk, so a failing
 * pipeline leaves all files as they were.
 */
export function planOutputs(config: CodegenConfig, selection: PipelineSelection): PlannedOutput[] {
  const wantTemplate = selection === "template" || selection === "all";
  const wantPatch = selection === "patch" || selection === "all";

  if (selection === "template" && config.template === null) {
    throw new ConfigError("No [template] section in configuration", { pipeline: "config" });
  }
  if (selection === "patch" && config.patch === null) {
    throw new ConfigError("No [patch] section in configuration", { pipeline: "config" });
  }
  if (config.template === null && config.patch === null) {
    throw new ConfigError("Configuration enables neither [template] nor [patch]", { pipeline: "config" });
  }

  const entries = loadEntries(config.specPath, config.fields);
  const planned: PlannedOutput[] = [];

  if (wantTemplate && config.template !== null) {
    planned.push({ pipeline: "template", output: generateTemplate(entries, config.template) });
  }
  if (wantPatch && config.patch !== null) {
    planned.push({ pipeline: "patch", output: generatePatch(entries, config.patch) });
  }
  return planned;
}

export function runCodegen(options: CliOptions, cwd: string = process.cwd()): number {
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(path.resolve(cwd, options.configPath));
  const results: SyncResult[] = planOutputs(config, options.pipeline).map(({ pipeline, output }) =>
    syncOutput(output, pipeline, options.check),
  );

  let hasChanges = false;
  for (const { path: outputPath, status } of results) {
    switch (status) {
      case "generated":
        console.log(`Generated: ${outputPath}`);
        break;
      case "unchanged":
        console.log(`Unchanged: ${outputPath}`);
        break;
      case "missing":
        console.error(`MISSING: ${outputPath}`);
        hasChanges = true;
        break;
      case "out-of-sync":
        console.error(`OUT OF SYNC: ${outputPath}`);
        hasChanges = true;
        break;
    }
  }

  if (options.check) {
    if (hasChanges) {
      console.error("\nRun 'transfer-syntax-codegen' without --check to regenerate.");
      return 1;
    }
    console.log("All generated files are in sync.");
    return 0;
  }

  console.log("\nCodegen complete.");
  return 0;
}

export function formatFailure(err: unknown): string {
  if (err instanceof CodegenError) {
    return `Error [${err.context.pipeline ?? "codegen"}] ${err.code}: ${err.message}`;
  }
  return `Error [codegen]: ${err instanceof Error ? err.message : String(err)}`;
}
