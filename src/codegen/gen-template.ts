// Template generator: renders the mustache template over the whole table

import Mustache from "mustache";
import type { GeneratedOutput, TemplateConfig, TransferSyntaxEntry } from "./types.js";
import { RenderError, describeError } from "./errors.js";
import { computeDigest, readText } from "./utils.js";

// Tokens that look a name up in the current context
const VARIABLE_TOKENS: readonly string[] = ["name", "&", "{", "#", "^"];

function childSpans(token: readonly unknown[]): readonly unknown[] {
  const children = token[4];
  return Array.isArray(children) ? children : [];
}

/**
 * Names referenced directly inside every `{{#binding}}` section. Nested
 * sections are not descended into: they may push a context of their own.
 */
export function collectEntryFields(spans: readonly unknown[], binding: string): Set<string> {
  const names = new Set<string>();

  const visit = (tokens: readonly unknown[], inside: boolean): void => {
    for (const token of tokens) {
      if (!Array.isArray(token)) continue;
      const [type, value]: readonly unknown[] = token;
      if (typeof type !== "string" || typeof value !== "string") continue;

      if (inside && VARIABLE_TOKENS.includes(type) && value !== ".") {
        names.add(value.split(".")[0]);
      }
      // An inverted binding section only renders for an empty table
      if ((type === "#" || type === "^") && !inside) {
        visit(childSpans(token), type === "#" && value === binding);
      }
    }
  };

  visit(spans, false);
  return names;
}

function parseTemplate(template: string, templatePath: string): readonly unknown[] {
  try {
    return Mustache.parse(template);
  } catch (err) {
    throw new RenderError(`Invalid template ${templatePath}: ${describeError(err)}`, {
      pipeline: "template",
      path: templatePath,
    }, { cause: err });
  }
}

export function buildBinding(entries: TransferSyntaxEntry[], binding: string): Record<string, unknown> {
  const rows = entries.map(e => e.raw);
  return {
    Digest: computeDigest(rows),
    [binding]: rows,
  };
}

/**
 * Render a template over the table. Under the "error" policy a field the
 * template reads but an entry lacks (and the root binding does not supply)
 * is a RenderError; under "empty" it renders as "".
 */
export function renderTemplate(
  template: string,
  entries: TransferSyntaxEntry[],
  config: Pick<TemplateConfig, "templatePath" | "binding" | "missingFields">,
): string {
  const spans = parseTemplate(template, config.templatePath);
  const view = buildBinding(entries, config.binding);

  if (config.missingFields === "error") {
    const fields = collectEntryFields(spans, config.binding);
    for (const entry of entries) {
      for (const field of fields) {
        if (!Object.hasOwn(entry.raw, field) && !Object.hasOwn(view, field)) {
          throw new RenderError(
            `Template ${config.templatePath} references ${field}, which entry ${entry.identifier} does not have`,
            { pipeline: "template", path: config.templatePath, field, entry: entry.identifier },
          );
        }
      }
    }
  }

  try {
    // C++ text goes out verbatim: no HTML escaping
    return Mustache.render(template, view, {}, { escape: (value: unknown) => String(value) });
  } catch (err) {
    throw new RenderError(`Cannot render ${config.templatePath}: ${describeError(err)}`, {
      pipeline: "template",
      path: config.templatePath,
    }, { cause: err });
  }
}

export function generateTemplate(entries: TransferSyntaxEntry[], config: TemplateConfig): GeneratedOutput {
  const template = readText(config.templatePath, "template");
  return { path: config.outputPath, content: renderTemplate(template, entries, config) };
}
