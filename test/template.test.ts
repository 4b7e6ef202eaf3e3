import fs from "node:fs/promises";
import path from "node:path";

import Mustache from "mustache";
import { describe, expect, it } from "vitest";

import {
  IOError,
  RenderError,
  buildBinding,
  collectEntryFields,
  computeDigest,
  generateTemplate,
  renderTemplate,
} from "../src/codegen/index.js";
import type { TemplateConfig } from "../src/codegen/index.js";
import { entry, makeTempDir } from "./helpers.js";

const base = { templatePath: "syntaxes.mustache", binding: "Syntaxes" };
const empty = { ...base, missingFields: "empty" as const };
const strict = { ...base, missingFields: "error" as const };

const ROW_TEMPLATE = "{{#Syntaxes}}{{identifier}}={{externalIdentifier}};{{/Syntaxes}}";

describe("renderTemplate", () => {
  const entries = [entry("A", "X"), entry("B")];

  it("iterates the table in order", () => {
    expect(renderTemplate(ROW_TEMPLATE, [entry("C", "Z"), entry("A", "X")], empty)).toBe("C=Z;A=X;");
  });

  it("renders a missing field as empty under the empty policy", () => {
    expect(renderTemplate(ROW_TEMPLATE, entries, empty)).toBe("A=X;B=;");
  });

  it("fails on a missing field under the error policy", () => {
    try {
      renderTemplate(ROW_TEMPLATE, entries, strict);
      expect.unreachable("renderTemplate should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(RenderError);
      if (err instanceof RenderError) {
        expect(err.context.field).toBe("externalIdentifier");
        expect(err.context.entry).toBe("B");
        expect(err.message).toBe(
          "Template syntaxes.mustache references externalIdentifier, which entry B does not have",
        );
      }
    }
  });

  it("accepts names supplied by the root binding under the error policy", () => {
    const digest = computeDigest([{ identifier: "A", externalIdentifier: "X" }, { identifier: "B" }]);
    const out = renderTemplate("{{#Syntaxes}}{{identifier}}@{{Digest}} {{/Syntaxes}}", entries, strict);
    expect(out).toBe(`A@${digest} B@${digest} `);
  });

  it("does not count inherited object members as entry fields", () => {
    try {
      renderTemplate("{{#Syntaxes}}[{{constructor}}]{{/Syntaxes}}", [entry("A")], strict);
      expect.unreachable("renderTemplate should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(RenderError);
      if (err instanceof RenderError) {
        expect(err.context.field).toBe("constructor");
        expect(err.context.entry).toBe("A");
      }
    }
  });

  it("does not check names in an inverted collection section", () => {
    const template = "{{^Syntaxes}}no {{rows}}{{/Syntaxes}}{{#Syntaxes}}{{identifier}};{{/Syntaxes}}";
    expect(renderTemplate(template, entries, strict)).toBe("A;B;");
  });

  it("does not HTML-escape values", () => {
    expect(renderTemplate(ROW_TEMPLATE, [entry("a<b>", "x&y")], empty)).toBe("a<b>=x&y;");
  });

  it("exposes the table under the configured binding key", () => {
    expect(renderTemplate("{{#Rows}}{{identifier}}{{/Rows}}", entries, { ...empty, binding: "Rows" })).toBe("AB");
    // a template that does not know the key sees an empty section
    expect(renderTemplate(ROW_TEMPLATE, entries, { ...empty, binding: "Rows" })).toBe("");
  });

  it("reports a template that does not parse", () => {
    expect(() => renderTemplate("{{#Syntaxes}}{{identifier}}", entries, empty)).toThrow(RenderError);
  });

  it("is deterministic", () => {
    const template = "// {{Digest}}\n" + ROW_TEMPLATE;
    expect(renderTemplate(template, entries, empty)).toBe(renderTemplate(template, entries, empty));
  });
});

describe("collectEntryFields", () => {
  it("collects names used directly inside the collection section", () => {
    const spans = Mustache.parse(
      "{{Digest}}{{#Syntaxes}}{{a}}{{{b}}}{{&c}}{{d.e}}{{#f}}{{g}}{{/f}}{{^h}}{{/h}}{{.}}{{/Syntaxes}}",
    );
    expect([...collectEntryFields(spans, "Syntaxes")].sort()).toEqual(["a", "b", "c", "d", "f", "h"]);
  });

  it("leaves out names used only in an inverted collection section", () => {
    const spans = Mustache.parse("{{^Syntaxes}}{{none}}{{/Syntaxes}}{{#Syntaxes}}{{a}}{{/Syntaxes}}");
    expect([...collectEntryFields(spans, "Syntaxes")]).toEqual(["a"]);
  });
});

describe("buildBinding", () => {
  it("binds the raw rows and the table digest", () => {
    const binding = buildBinding([entry("A", "X")], "Syntaxes");
    expect(binding).toEqual({
      Digest: computeDigest([{ identifier: "A", externalIdentifier: "X" }]),
      Syntaxes: [{ identifier: "A", externalIdentifier: "X" }],
    });
  });
});

describe("generateTemplate", () => {
  it("reads the template from disk and targets the output path", async () => {
    const tmp = await makeTempDir();
    try {
      const config: TemplateConfig = {
        templatePath: path.join(tmp.dir, "syntaxes.mustache"),
        outputPath: path.join(tmp.dir, "Syntaxes.impl.h"),
        binding: "Syntaxes",
        missingFields: "empty",
      };
      await fs.writeFile(config.templatePath, "{{#Syntaxes}}case {{identifier}}:\n{{/Syntaxes}}");
      expect(generateTemplate([entry("A"), entry("B")], config)).toEqual({
        path: config.outputPath,
        content: "case A:\ncase B:\n",
      });
    } finally {
      await tmp.cleanup();
    }
  });

  it("fails with IOError when the template is missing", () => {
    const config: TemplateConfig = {
      templatePath: "/nonexistent/syntaxes.mustache",
      outputPath: "/nonexistent/Syntaxes.impl.h",
      binding: "Syntaxes",
      missingFields: "empty",
    };
    expect(() => generateTemplate([entry("A")], config)).toThrow(IOError);
  });
});
