// Locating editable switch bodies in C++ source text

import { signaturePattern } from "./utils.js";

/**
 * Span of a switch body, between the switch's opening brace and the line
 * carrying `default:`. `indent` is the leading whitespace of that line.
 */
export interface SwitchRegion {
  start: number;
  end: number;
  indent: string;
}

export interface RegionLocator {
  readonly description: string;
  locate(text: string): SwitchRegion | null;
}

const DEFAULT_LINE = /([ \t]*)default\s*:/y;

/**
 * First line inside the switch body (opened just before `start`) that
 * begins with `default:` at the switch's own brace depth; null if the
 * switch closes first. Braces in comments and literals are skipped.
 */
function findDefaultLine(text: string, start: number): { lineStart: number; indent: string } | null {
  let depth = 1;
  let i = start;

  while (i < text.length) {
    const c = text[i];

    if (c === "\n") {
      if (depth === 1) {
        DEFAULT_LINE.lastIndex = i + 1;
        const m = DEFAULT_LINE.exec(text);
        if (m !== null) return { lineStart: i + 1, indent: m[1] };
      }
      i++;
    } else if (c === "/" && text[i + 1] === "/") {
      const eol = text.indexOf("\n", i);
      if (eol === -1) return null;
      i = eol;
    } else if (c === "/" && text[i + 1] === "*") {
      const close = text.indexOf("*/", i + 2);
      if (close === -1) return null;
      i = close + 2;
    } else if (c === '"' || c === "'") {
      i++;
      while (i < text.length && text[i] !== c && text[i] !== "\n") {
        i += text[i] === "\\" ? 2 : 1;
      }
      i++;
    } else if (c === "{") {
      depth++;
      i++;
    } else if (c === "}") {
      depth--;
      // the switch closed without a default: of its own
      if (depth === 0) return null;
      i++;
    } else {
      i++;
    }
  }

  return null;
}

/**
 * Textual locator for
 *
 *   <signature>
 *   {
 *     switch (<expr>)
 *     {
 *       ...body...
 *       default:
 *
 * Only the first signature match counts. `default:` must start its own line
 * and belong to that switch, not to a nested one or to later code.
 */
export class SwitchBodyLocator implements RegionLocator {
  readonly description: string;
  private readonly pattern: RegExp;

  constructor(signature: string) {
    this.description = signature.trim();
    this.pattern = new RegExp(`${signaturePattern(signature)}\\s*\\{\\s*switch\\s*\\([^)]*\\)\\s*\\{`);
  }

  locate(text: string): SwitchRegion | null {
    const m = this.pattern.exec(text);
    if (m === null) return null;
    const start = m.index + m[0].length;
    const found = findDefaultLine(text, start);
    if (found === null) return null;
    // The newline before `default:` belongs to the region
    return { start, end: found.lineStart, indent: found.indent };
  }
}

/** Replace the region's body; `default:` keeps its line and indentation. */
export function spliceRegion(text: string, region: SwitchRegion, body: string): string {
  return text.slice(0, region.start) + "\n" + body + text.slice(region.end);
}
