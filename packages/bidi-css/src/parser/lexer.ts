/**
 * Stylesheet source lexer.
 *
 * Splits a direction-agnostic stylesheet into text segments and token
 * references:
 * - Angle references: <defaultFloat>, <opposite-float>
 * - Interpolations: #{$default-float}
 * - Escaped angle bracket: \< (kept as written, never a reference)
 *
 * Everything else is text and passes through untouched. A light scan of
 * braces, colons, semicolons, url(...) and comments classifies each
 * reference's context; that scan carries over from one fragment to the next.
 */

import { canonicalTokenName } from "../direction.js";
import { SourceSyntaxError } from "../errors.js";
import { SegmentType } from "./types.js";
import type {
  Segment,
  StylesheetSource,
  TokenContext,
  TokenReference,
  TokenSyntax,
} from "./types.js";

const ANGLE_REFERENCE = /<([A-Za-z][A-Za-z0-9_-]*)>/y;
const INTERPOLATION_REFERENCE = /#\{\$([A-Za-z][A-Za-z0-9_-]*)\}/y;

interface ScanState {
  depth: number;
  inValue: boolean;
  inUrl: boolean;
  inComment: boolean;
  quote: string | null;
}

/**
 * Tokenize every fragment of a source, in order.
 */
export function tokenizeSource(source: StylesheetSource): Segment[] {
  const segments: Segment[] = [];
  const state: ScanState = {
    depth: 0,
    inValue: false,
    inUrl: false,
    inComment: false,
    quote: null,
  };
  source.fragments.forEach((fragment, index) => {
    tokenizeFragment(fragment, index, state, segments);
  });
  return segments;
}

/**
 * Tokenize a single piece of stylesheet text.
 */
export function tokenize(input: string): Segment[] {
  return tokenizeSource({ fragments: [input] });
}

/** Only the token references of a source. */
export function listTokenReferences(source: StylesheetSource): TokenReference[] {
  return tokenizeSource(source).filter(
    (segment): segment is TokenReference => segment.type === SegmentType.TOKEN,
  );
}

function tokenizeFragment(
  input: string,
  fragment: number,
  state: ScanState,
  segments: Segment[],
): void {
  let pos = 0;
  let line = 1;
  let column = 1;

  let text = "";
  let textLine = 1;
  let textColumn = 1;

  function peekAt(offset: number): string {
    return input.charAt(pos + offset);
  }

  function advance(): string {
    const ch = input.charAt(pos);
    pos++;
    if (ch === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
    return ch;
  }

  function markText(): void {
    if (text === "") {
      textLine = line;
      textColumn = column;
    }
  }

  function consumeText(count: number = 1): void {
    markText();
    for (let i = 0; i < count && pos < input.length; i++) {
      text += advance();
    }
  }

  function flushText(): void {
    if (text === "") return;
    segments.push({
      type: SegmentType.TEXT,
      value: text,
      fragment,
      line: textLine,
      column: textColumn,
    });
    text = "";
  }

  // True when the next structural character is "{", i.e. we are in a selector.
  function selectorAhead(): boolean {
    let quote: string | null = null;
    for (let i = pos; i < input.length; i++) {
      const ch = input.charAt(i);
      if (quote !== null) {
        if (ch === quote) quote = null;
        continue;
      }
      if (ch === '"' || ch === "'") {
        quote = ch;
        continue;
      }
      if (ch === "{") return true;
      if (ch === ";" || ch === "}") return false;
    }
    return false;
  }

  function currentContext(): TokenContext {
    if (state.inComment) return "comment";
    if (state.inUrl) return "url";
    if (state.quote !== null) return state.depth === 0 ? "selector" : "value";
    if (state.depth === 0 || selectorAhead()) return "selector";
    return state.inValue ? "value" : "property";
  }

  function readReference(pattern: RegExp, syntax: TokenSyntax): boolean {
    pattern.lastIndex = pos;
    const match = pattern.exec(input);
    if (!match) return false;

    const raw = match[0];
    const name = match[1] ?? "";
    const token = canonicalTokenName(name);
    // Comments keep unknown names, e.g. "<div>", as text
    if (state.inComment && token === null) return false;

    flushText();
    segments.push({
      type: SegmentType.TOKEN,
      name,
      token,
      raw,
      syntax,
      context: currentContext(),
      fragment,
      line,
      column,
    });
    for (let i = 0; i < raw.length; i++) advance();
    return true;
  }

  // Updates the context scan for the character at pos, then consumes it.
  function consumeStructural(): void {
    const ch = peekAt(0);

    if (state.inComment) {
      if (ch === "*" && peekAt(1) === "/") {
        state.inComment = false;
        consumeText(2);
        return;
      }
      consumeText();
      return;
    }

    if (state.quote !== null) {
      if (ch === state.quote) state.quote = null;
      consumeText();
      return;
    }

    if (ch === "/" && peekAt(1) === "*") {
      state.inComment = true;
      consumeText(2);
      return;
    }

    if (ch === '"' || ch === "'") {
      state.quote = ch;
      consumeText();
      return;
    }

    if (state.inUrl) {
      if (ch === ")") state.inUrl = false;
      consumeText();
      return;
    }

    if ((ch === "u" || ch === "U") && input.slice(pos, pos + 4).toLowerCase() === "url(") {
      state.inUrl = true;
      consumeText(4);
      return;
    }

    switch (ch) {
      case "{":
        state.depth++;
        state.inValue = false;
        break;
      case "}":
        state.depth = Math.max(0, state.depth - 1);
        state.inValue = false;
        break;
      case ";":
        state.inValue = false;
        break;
      case ":":
        if (state.depth > 0 && !state.inValue && !selectorAhead()) {
          state.inValue = true;
        }
        break;
      default:
        break;
    }
    consumeText();
  }

  while (pos < input.length) {
    const ch = peekAt(0);

    // Escapes pass through whole, so "\<" never starts a reference
    if (ch === "\\" && !state.inComment) {
      consumeText(2);
      continue;
    }

    if (ch === "<" && readReference(ANGLE_REFERENCE, "angle")) {
      continue;
    }

    if (ch === "#" && peekAt(1) === "{") {
      if (readReference(INTERPOLATION_REFERENCE, "interpolation")) {
        continue;
      }
      // "#{" is ordinary text in comments and strings
      if (state.inComment || state.quote !== null) {
        consumeStructural();
        continue;
      }
      throw new SourceSyntaxError(
        "Expected '$name}' after '#{'",
        line,
        column,
        fragment,
      );
    }

    consumeStructural();
  }

  flushText();
}
