/**
 * Building StylesheetSource values from text and from files.
 */

import * as fs from "node:fs/promises";
import type { StylesheetSource } from "./parser/types.js";
import { SourceReadError } from "./errors.js";

export function createSource(
  content: string | readonly string[],
  origin?: string,
): StylesheetSource {
  const fragments = typeof content === "string" ? [content] : [...content];
  return Object.freeze({ origin, fragments: Object.freeze(fragments) });
}

/** The full text of a source, fragments concatenated in order. */
export function sourceText(source: StylesheetSource): string {
  return source.fragments.join("");
}

/**
 * Read one or more files into a single source, one fragment per file.
 * The origin is the paths joined with "+".
 */
export async function readSource(paths: readonly string[]): Promise<StylesheetSource> {
  const fragments = await Promise.all(
    paths.map(async (filePath) => {
      try {
        return await fs.readFile(filePath, "utf-8");
      } catch (err) {
        throw new SourceReadError(filePath, err);
      }
    }),
  );
  return createSource(fragments, paths.join("+"));
}
