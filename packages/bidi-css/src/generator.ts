/**
 * Directional stylesheet generator.
 *
 * Substitutes every token reference in a source with the value its profile
 * binds. Substitution is purely lexical: bound values are inserted as they
 * are and never scanned again, and an unknown token fails the whole source.
 */

import {
  DIRECTIONS,
  bindingFor,
  resolveProfile,
} from "./direction.js";
import type { Direction, DirectionProfile, TokenName } from "./direction.js";
import { BidiCssError, UnknownTokenError } from "./errors.js";
import { tokenizeSource } from "./parser/lexer.js";
import { SegmentType } from "./parser/types.js";
import type {
  StylesheetSource,
  TokenContext,
  TokenReference,
} from "./parser/types.js";

export interface Substitution {
  token: TokenName;
  value: string;
  context: TokenContext;
  fragment: number;
  line: number;
  column: number;
}

export interface GeneratedStylesheet {
  readonly direction: Direction;
  readonly origin?: string;
  readonly css: string;
  readonly substitutions: readonly Substitution[];
}

export type DirectionOutcome =
  | { direction: Direction; ok: true; stylesheet: GeneratedStylesheet }
  | { direction: string; ok: false; error: BidiCssError };

/**
 * Generate the stylesheet for one profile.
 *
 * @throws UnknownTokenError listing every unknown reference
 * @throws SourceSyntaxError for malformed interpolations
 */
export function generate(
  source: StylesheetSource,
  profile: DirectionProfile,
): GeneratedStylesheet {
  const segments = tokenizeSource(source);

  const unknown = segments.filter(
    (s): s is TokenReference => s.type === SegmentType.TOKEN && s.token === null,
  );
  if (unknown.length > 0) {
    throw new UnknownTokenError(unknown);
  }

  const parts: string[] = [];
  const substitutions: Substitution[] = [];

  for (const segment of segments) {
    if (segment.type === SegmentType.TEXT) {
      parts.push(segment.value);
      continue;
    }
    if (segment.token === null) continue;

    const value = bindingFor(profile, segment.token);
    parts.push(value);
    substitutions.push(
      Object.freeze({
        token: segment.token,
        value,
        context: segment.context,
        fragment: segment.fragment,
        line: segment.line,
        column: segment.column,
      }),
    );
  }

  return Object.freeze({
    direction: profile.direction,
    origin: source.origin,
    css: parts.join(""),
    substitutions: Object.freeze(substitutions),
  });
}

/**
 * Generate both directions.
 *
 * @throws the first failure; an unknown token fails both directions alike
 */
export function generateAll(
  source: StylesheetSource,
): Record<Direction, GeneratedStylesheet> {
  return {
    ltr: generate(source, resolveProfile("ltr")),
    rtl: generate(source, resolveProfile("rtl")),
  };
}

/**
 * Generate each direction independently, capturing failures per direction
 * instead of throwing.
 */
export function generateEach(
  source: StylesheetSource,
  directions: readonly string[] = DIRECTIONS,
): DirectionOutcome[] {
  return directions.map((direction): DirectionOutcome => {
    try {
      const stylesheet = generate(source, resolveProfile(direction));
      return { direction: stylesheet.direction, ok: true, stylesheet };
    } catch (err) {
      if (!(err instanceof BidiCssError)) throw err;
      return { direction, ok: false, error: err };
    }
  });
}
