/**
 * Error hierarchy for bidi-css.
 *
 * All library errors inherit from BidiCssError. File-system failures keep the
 * underlying error as `cause`; none of them is retried.
 */

import type { Direction } from "./direction.js";
import type { TokenReference } from "./parser/types.js";
import type { Diagnostic } from "./validator.js";

// ---------------------------------------------------------------------------
// BidiCssError — base for all library errors
// ---------------------------------------------------------------------------

export class BidiCssError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "BidiCssError";
  }
}

// ---------------------------------------------------------------------------
// Generation errors
// ---------------------------------------------------------------------------

/** The requested direction is not `ltr` or `rtl`. */
export class InvalidDirectionError extends BidiCssError {
  readonly direction: string;

  constructor(direction: string) {
    super(`Invalid direction: '${direction}' (expected 'ltr' or 'rtl')`);
    this.name = "InvalidDirectionError";
    this.direction = direction;
  }
}

/** One or more token references name no known token. */
export class UnknownTokenError extends BidiCssError {
  readonly references: readonly TokenReference[];

  constructor(references: readonly TokenReference[]) {
    super(describeUnknown(references));
    this.name = "UnknownTokenError";
    this.references = references;
  }
}

function describeUnknown(references: readonly TokenReference[]): string {
  const [first] = references;
  if (!first) return "Unknown token";
  const more = references.length > 1 ? ` (and ${references.length - 1} more)` : "";
  return `Unknown token '${first.raw}' at ${formatLocation(first)}${more}`;
}

/** Malformed token syntax, such as an unterminated `#{` interpolation. */
export class SourceSyntaxError extends BidiCssError {
  constructor(
    message: string,
    readonly line: number,
    readonly column: number,
    readonly fragment: number = 0,
  ) {
    super(`Syntax error at ${formatLocation({ fragment, line, column })}: ${message}`);
    this.name = "SourceSyntaxError";
  }
}

/** The source has error-level diagnostics. */
export class SourceValidationError extends BidiCssError {
  readonly diagnostics: readonly Diagnostic[];

  constructor(diagnostics: readonly Diagnostic[]) {
    const messages = diagnostics.map((d) => `[${d.rule}] ${d.message}`).join("; ");
    super(`Source validation failed: ${messages}`);
    this.name = "SourceValidationError";
    this.diagnostics = diagnostics;
  }
}

// ---------------------------------------------------------------------------
// I/O errors
// ---------------------------------------------------------------------------

export class SourceReadError extends BidiCssError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Could not read source ${path}: ${messageOf(cause)}`, { cause });
    this.name = "SourceReadError";
    this.path = path;
  }
}

export class OutputWriteError extends BidiCssError {
  readonly path: string;
  readonly direction: Direction;

  constructor(path: string, direction: Direction, cause: unknown) {
    super(`Could not write ${direction} output ${path}: ${messageOf(cause)}`, { cause });
    this.name = "OutputWriteError";
    this.path = path;
    this.direction = direction;
  }
}

// ---------------------------------------------------------------------------
// Configuration and CLI errors
// ---------------------------------------------------------------------------

export class ConfigError extends BidiCssError {
  readonly code = "CONFIG_ERROR";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export class CliUsageError extends BidiCssError {
  readonly code = "USAGE_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function formatLocation(loc: {
  fragment: number;
  line: number;
  column: number;
}): string {
  const prefix = loc.fragment > 0 ? `fragment ${loc.fragment + 1}, ` : "";
  return `${prefix}${loc.line}:${loc.column}`;
}
