/**
 * Source validator — lint rules over a direction-agnostic stylesheet.
 *
 * Unknown tokens and malformed interpolations are errors. Hard-coded physical
 * sides are only reported; nothing is rewritten.
 */

import { TOKEN_NAMES } from "./direction.js";
import { SourceSyntaxError, SourceValidationError } from "./errors.js";
import { tokenizeSource } from "./parser/lexer.js";
import { SegmentType } from "./parser/types.js";
import type {
  Segment,
  StylesheetSource,
  TextSegment,
  TokenReference,
} from "./parser/types.js";

export const Severity = {
  ERROR: "error",
  WARNING: "warning",
  INFO: "info",
} as const;

export type Severity = (typeof Severity)[keyof typeof Severity];

export interface Diagnostic {
  rule: string;
  severity: Severity;
  message: string;
  fragment?: number;
  line?: number;
  column?: number;
  fix?: string;
}

export interface LintInput {
  source: StylesheetSource;
  segments: readonly Segment[];
}

export interface LintRule {
  name: string;
  apply(input: LintInput): Diagnostic[];
}

// Helpers

function references(input: LintInput): TokenReference[] {
  return input.segments.filter(
    (s): s is TokenReference => s.type === SegmentType.TOKEN,
  );
}

function textSegments(input: LintInput): TextSegment[] {
  return input.segments.filter(
    (s): s is TextSegment => s.type === SegmentType.TEXT,
  );
}

/** Blank out comments, keeping offsets and line breaks. */
function maskComments(text: string): string {
  return text.replace(/\/\*[\s\S]*?\*\//g, (comment) => comment.replace(/[^\n]/g, " "));
}

function positionAt(
  segment: TextSegment,
  offset: number,
): { fragment: number; line: number; column: number } {
  const before = segment.value.slice(0, offset);
  const lines = before.split("\n");
  const last = lines[lines.length - 1] ?? "";
  if (lines.length === 1) {
    return { fragment: segment.fragment, line: segment.line, column: segment.column + offset };
  }
  return {
    fragment: segment.fragment,
    line: segment.line + lines.length - 1,
    column: last.length + 1,
  };
}

// ---------- Built-in lint rules ----------

const unknownTokenRule: LintRule = {
  name: "unknown_token",
  apply(input: LintInput): Diagnostic[] {
    return references(input)
      .filter((ref) => ref.token === null)
      .map((ref) => ({
        rule: "unknown_token",
        severity: Severity.ERROR,
        message: `Unknown token '${ref.raw}'`,
        fragment: ref.fragment,
        line: ref.line,
        column: ref.column,
        fix: `Use one of: ${TOKEN_NAMES.join(", ")}`,
      }));
  },
};

const tokenInSelectorRule: LintRule = {
  name: "token_in_selector",
  apply(input: LintInput): Diagnostic[] {
    return references(input)
      .filter((ref) => ref.token !== null && ref.context === "selector")
      .map((ref) => ({
        rule: "token_in_selector",
        severity: Severity.WARNING,
        message: `Token '${ref.raw}' is used in a selector`,
        fragment: ref.fragment,
        line: ref.line,
        column: ref.column,
      }));
  },
};

const PHYSICAL_PROPERTY =
  /(^|[\s;{])((?:padding|margin|border)-(?:left|right)(?:-[a-z]+)*|left|right)\s*:/g;
const PHYSICAL_VALUE = /(^|[\s;{])(float|clear|text-align)\s*:\s*(left|right)(?![\w-])/g;

const physicalSideRule: LintRule = {
  name: "physical_side",
  apply(input: LintInput): Diagnostic[] {
    const diagnostics: Diagnostic[] = [];

    for (const segment of textSegments(input)) {
      const text = maskComments(segment.value);

      for (const match of text.matchAll(PHYSICAL_PROPERTY)) {
        const lead = match[1] ?? "";
        const property = match[2] ?? "";
        diagnostics.push({
          rule: "physical_side",
          severity: Severity.WARNING,
          message: `Property '${property}' hard-codes a physical side`,
          ...positionAt(segment, (match.index ?? 0) + lead.length),
          fix: "Build the property name from <defaultFloat> or <oppositeFloat>",
        });
      }

      for (const match of text.matchAll(PHYSICAL_VALUE)) {
        const lead = match[1] ?? "";
        const property = match[2] ?? "";
        const side = match[3] ?? "";
        diagnostics.push({
          rule: "physical_side",
          severity: Severity.WARNING,
          message: `'${property}: ${side}' hard-codes a physical side`,
          ...positionAt(segment, (match.index ?? 0) + lead.length),
          fix: side === "left" ? "Use <defaultFloat>" : "Use <oppositeFloat>",
        });
      }
    }

    return diagnostics;
  },
};

const noTokensRule: LintRule = {
  name: "no_tokens",
  apply(input: LintInput): Diagnostic[] {
    if (references(input).length > 0) return [];
    return [
      {
        rule: "no_tokens",
        severity: Severity.INFO,
        message: "Source has no token references; both outputs will be identical",
      },
    ];
  },
};

const BUILT_IN_RULES: LintRule[] = [
  unknownTokenRule,
  tokenInSelectorRule,
  physicalSideRule,
  noTokensRule,
];

/**
 * Run every lint rule over a source. A malformed interpolation is reported
 * as a single "syntax" error, since nothing else can be checked.
 */
export function checkSource(
  source: StylesheetSource,
  extraRules?: LintRule[],
): Diagnostic[] {
  let segments: Segment[];
  try {
    segments = tokenizeSource(source);
  } catch (err) {
    if (!(err instanceof SourceSyntaxError)) throw err;
    return [
      {
        rule: "syntax",
        severity: Severity.ERROR,
        message: err.message,
        fragment: err.fragment,
        line: err.line,
        column: err.column,
      },
    ];
  }

  const rules = extraRules ? [...BUILT_IN_RULES, ...extraRules] : BUILT_IN_RULES;
  const input: LintInput = { source, segments };
  const diagnostics: Diagnostic[] = [];

  for (const rule of rules) {
    diagnostics.push(...rule.apply(input));
  }

  return diagnostics;
}

/**
 * Check a source and throw if any error-severity diagnostics are found.
 * Returns warnings and info diagnostics.
 */
export function checkSourceOrRaise(
  source: StylesheetSource,
  extraRules?: LintRule[],
): Diagnostic[] {
  const diagnostics = checkSource(source, extraRules);
  const errors = diagnostics.filter((d) => d.severity === Severity.ERROR);

  if (errors.length > 0) {
    throw new SourceValidationError(errors);
  }

  return diagnostics;
}
