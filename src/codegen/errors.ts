/**
 * Error hierarchy for the transfer syntax generators.
 *
 * Every error is fatal to the run that raised it:
 * - IOError: unreadable or unwritable path
 * - ParseError: malformed JSON table
 * - PatternNotFoundError: anchor region missing from the patch target
 * - RenderError: template does not parse or references a missing field
 * - ConfigError: invalid configuration file or CLI selection
 */

import type { Anchor, Pipeline } from "./types.js";

export interface ErrorContext {
  pipeline?: Pipeline;
  path?: string;
  anchor?: Anchor;
  field?: string;
  entry?: string;
}

export interface CodegenErrorJSON {
  code: string;
  message: string;
  context: ErrorContext;
}

export abstract class CodegenError extends Error {
  abstract readonly code: string;
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.context = context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Fill in context keys the thrower did not know about; existing keys win. */
  withContext(context: ErrorContext): this {
    Object.assign(this.context, { ...context, ...this.context });
    return this;
  }

  toJSON(): CodegenErrorJSON {
    return {
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export class IOError extends CodegenError {
  readonly code = "ERR_IO";
}

export class ParseError extends CodegenError {
  readonly code = "ERR_PARSE";
}

export class PatternNotFoundError extends CodegenError {
  readonly code = "ERR_PATTERN_NOT_FOUND";
}

export class RenderError extends CodegenError {
  readonly code = "ERR_RENDER";
}

export class ConfigError extends CodegenError {
  readonly code = "ERR_CONFIG";
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
