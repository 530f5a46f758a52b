/**
 * Source and segment types produced by the lexer.
 */

import type { TokenName } from "../direction.js";

/**
 * A direction-agnostic stylesheet: ordered text fragments, usually one per
 * input file. The generated text is the concatenation of the fragments.
 */
export interface StylesheetSource {
  readonly origin?: string;
  readonly fragments: readonly string[];
}

export const SegmentType = {
  TEXT: "TEXT",
  TOKEN: "TOKEN",
} as const;

export type SegmentType = (typeof SegmentType)[keyof typeof SegmentType];

/** Where in the stylesheet a reference sits. Used for diagnostics only. */
export type TokenContext = "selector" | "property" | "value" | "url" | "comment";

/** `<name>` or `#{$name}`. */
export type TokenSyntax = "angle" | "interpolation";

export interface SourcePosition {
  /** Index of the fragment within the source */
  fragment: number;
  /** 1-based line within the fragment */
  line: number;
  /** 1-based column within the line */
  column: number;
}

export interface TextSegment extends SourcePosition {
  type: typeof SegmentType.TEXT;
  value: string;
}

export interface TokenReference extends SourcePosition {
  type: typeof SegmentType.TOKEN;
  /** Name as written, e.g. "default-float" */
  name: string;
  /** Canonical token, or null when the name is unknown */
  token: TokenName | null;
  /** The reference exactly as it appears in the source */
  raw: string;
  syntax: TokenSyntax;
  context: TokenContext;
}

export type Segment = TextSegment | TokenReference;
