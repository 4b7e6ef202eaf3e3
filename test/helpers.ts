import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { TransferSyntaxEntry } from "../src/codegen/index.js";

export const makeTempDir = async (): Promise<{ readonly dir: string; readonly cleanup: () => Promise<void> }> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "transfer-syntax-codegen-"));
  return {
    dir,
    cleanup: async () => {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
};

export const entry = (identifier: string, externalIdentifier?: string): TransferSyntaxEntry => ({
  identifier,
  externalIdentifier: externalIdentifier ?? null,
  raw: externalIdentifier === undefined ? { identifier } : { identifier, externalIdentifier },
});

export const FORWARD_SIGNATURE = "Ext::Syntax Convert::ToExternal(Host::Syntax syntax)";
export const REVERSE_SIGNATURE = "Host::Syntax Convert::ToHost(Ext::Syntax syntax)";

export const forwardFunction = (body: string): string =>
  [
    `  ${FORWARD_SIGNATURE}`,
    "  {",
    "    switch (syntax)",
    "    {",
    body + "      default:",
    '        throw std::runtime_error("unknown");',
    "    }",
    "  }",
  ].join("\n");

export const reverseFunction = (body: string): string =>
  [
    `  ${REVERSE_SIGNATURE}`,
    "  {",
    "    switch (syntax)",
    "    {",
    body + "      default:",
    '        throw std::runtime_error("unknown");',
    "    }",
    "  }",
  ].join("\n");

export const sourceFile = (forwardBody: string, reverseBody: string): string =>
  ["namespace Sample", "{", forwardFunction(forwardBody), "", reverseFunction(reverseBody), "}", ""].join("\n");
