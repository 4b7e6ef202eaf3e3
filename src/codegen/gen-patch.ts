// Patch generator: rewrites the forward and reverse mapping switches in place

import type { Anchor, CaseClause, GeneratedOutput, PatchConfig, TransferSyntaxEntry } from "./types.js";
import { ConfigError, PatternNotFoundError } from "./errors.js";
import { SwitchBodyLocator, spliceRegion } from "./region.js";
import type { RegionLocator, SwitchRegion } from "./region.js";
import { readText } from "./utils.js";

type Prefixes = Pick<PatchConfig, "hostPrefix" | "externalPrefix">;

interface MappedEntry {
  identifier: string;
  externalIdentifier: string;
}

function mappedEntries(entries: TransferSyntaxEntry[]): MappedEntry[] {
  const mapped: MappedEntry[] = [];
  for (const e of entries) {
    if (e.externalIdentifier !== null) {
      mapped.push({ identifier: e.identifier, externalIdentifier: e.externalIdentifier });
    }
  }
  return mapped;
}

/** host -> external, in table order */
export function deriveForwardCases(entries: TransferSyntaxEntry[], prefixes: Prefixes): CaseClause[] {
  return mappedEntries(entries).map(e => ({
    label: prefixes.hostPrefix + e.identifier,
    result: prefixes.externalPrefix + e.externalIdentifier,
  }));
}

/** external -> host, in table order */
export function deriveReverseCases(entries: TransferSyntaxEntry[], prefixes: Prefixes): CaseClause[] {
  return mappedEntries(entries).map(e => ({
    label: prefixes.externalPrefix + e.externalIdentifier,
    result: prefixes.hostPrefix + e.identifier,
  }));
}

export function renderCases(cases: CaseClause[], indent: string): string {
  return cases
    .map(c => `${indent}case ${c.label}:\n${indent}  return ${c.result};\n\n`)
    .join("");
}

interface PendingEdit {
  anchor: Anchor;
  region: SwitchRegion;
  cases: CaseClause[];
}

function locateOrThrow(
  text: string,
  locator: RegionLocator,
  anchor: Anchor,
  targetPath: string,
): SwitchRegion {
  const region = locator.locate(text);
  if (region === null) {
    throw new PatternNotFoundError(
      `No ${anchor} mapping switch found in ${targetPath} for "${locator.description}"`,
      { pipeline: "patch", path: targetPath, anchor },
    );
  }
  return region;
}

/**
 * Rewrite both switch bodies of `text`. Regions are located against the
 * untouched text and spliced back to front, so offsets stay valid; nothing
 * is returned unless both anchors matched.
 */
export function patchSource(
  text: string,
  entries: TransferSyntaxEntry[],
  config: PatchConfig,
  locators: { forward: RegionLocator; reverse: RegionLocator } = {
    forward: new SwitchBodyLocator(config.forwardSignature),
    reverse: new SwitchBodyLocator(config.reverseSignature),
  },
): string {
  const edits: PendingEdit[] = [
    {
      anchor: "forward",
      region: locateOrThrow(text, locators.forward, "forward", config.targetPath),
      cases: deriveForwardCases(entries, config),
    },
    {
      anchor: "reverse",
      region: locateOrThrow(text, locators.reverse, "reverse", config.targetPath),
      cases: deriveReverseCases(entries, config),
    },
  ];

  edits.sort((a, b) => a.region.start - b.region.start);
  const [first, second] = edits;
  if (first.region.end > second.region.start) {
    throw new ConfigError(
      `The forward and reverse anchors select overlapping regions in ${config.targetPath}`,
      { pipeline: "patch", path: config.targetPath },
    );
  }

  let patched = text;
  for (const edit of [second, first]) {
    patched = spliceRegion(patched, edit.region, renderCases(edit.cases, edit.region.indent));
  }
  return patched;
}

export function generatePatch(entries: TransferSyntaxEntry[], config: PatchConfig): GeneratedOutput {
  const text = readText(config.targetPath, "patch");
  return { path: config.targetPath, content: patchSource(text, entries, config) };
}
