/**
 * Build configuration: `bidi.config.json`.
 *
 * Two ways to declare outputs, which may be combined:
 * - `targets`: explicit sources and one output per direction
 * - `files`: a `{ outputPath: sourcePath }` map; each output's direction is
 *   read from its file name (`ltr-app.css`, `app.rtl.css`)
 *
 * Sources resolve against the config file's directory, outputs against
 * `outDir` (itself relative to the config file).
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { DIRECTIONS, isDirection } from "./direction.js";
import type { Direction } from "./direction.js";
import type { BuildTarget, WriteMode } from "./builder.js";
import { WRITE_MODES } from "./builder.js";
import { ConfigError, messageOf } from "./errors.js";

export const CONFIG_FILE_NAME = "bidi.config.json";

/** Environment variable overriding `writeMode`. */
export const WRITE_MODE_ENV = "BIDI_CSS_WRITE_MODE";

export interface BidiConfig {
  /** Absolute path of the file this config came from, if any */
  configPath?: string;
  writeMode: WriteMode;
  strict: boolean;
  /** Targets with absolute paths */
  targets: BuildTarget[];
}

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isWriteMode(value: unknown): value is WriteMode {
  return WRITE_MODES.some((mode) => mode === value);
}

/**
 * Infer the direction of an output from its file name. The name must contain
 * exactly one of "ltr" or "rtl" as a separate word.
 */
export function inferDirection(outputPath: string): Direction {
  const words = path
    .basename(outputPath)
    .toLowerCase()
    .split(/[^a-z0-9]+/);
  const found = DIRECTIONS.filter((d) => words.includes(d));
  const [direction] = found;
  if (found.length !== 1 || direction === undefined) {
    throw new ConfigError(
      `Cannot infer direction of '${outputPath}': the file name must contain exactly one of 'ltr' or 'rtl'`,
    );
  }
  return direction;
}

/**
 * Group an `{ outputPath: sourcePath }` map into targets, one per
 * distinct source, in order of first appearance.
 */
export function targetsFromFileMap(files: Record<string, string>): BuildTarget[] {
  const bySource = new Map<string, BuildTarget>();

  for (const [outputPath, sourcePath] of Object.entries(files)) {
    const direction = inferDirection(outputPath);
    let target = bySource.get(sourcePath);
    if (!target) {
      target = { sources: [sourcePath], outputs: {} };
      bySource.set(sourcePath, target);
    }
    const existing = target.outputs[direction];
    if (existing !== undefined) {
      throw new ConfigError(
        `Source '${sourcePath}' has two ${direction} outputs: '${existing}' and '${outputPath}'`,
      );
    }
    target.outputs[direction] = outputPath;
  }

  return [...bySource.values()];
}

function parseTarget(raw: unknown, index: number): BuildTarget {
  const key = `targets[${index}]`;
  if (!isRecord(raw)) {
    throw new ConfigError(`${key} must be an object`);
  }

  const rawSources = raw.sources;
  let sources: string[];
  if (typeof rawSources === "string") {
    sources = [rawSources];
  } else if (
    Array.isArray(rawSources) &&
    rawSources.length > 0 &&
    rawSources.every((s): s is string => typeof s === "string")
  ) {
    sources = rawSources;
  } else {
    throw new ConfigError(`${key}.sources must be a path or a non-empty list of paths`);
  }

  const rawOutputs = raw.outputs;
  if (!isRecord(rawOutputs)) {
    throw new ConfigError(`${key}.outputs must be an object like {"ltr": "...", "rtl": "..."}`);
  }

  const outputs: Partial<Record<Direction, string>> = {};
  for (const [name, value] of Object.entries(rawOutputs)) {
    if (!isDirection(name)) {
      throw new ConfigError(`${key}.outputs.${name} is not a direction (expected 'ltr' or 'rtl')`);
    }
    if (typeof value !== "string" || value === "") {
      throw new ConfigError(`${key}.outputs.${name} must be a path`);
    }
    outputs[name] = value;
  }
  if (Object.keys(outputs).length === 0) {
    throw new ConfigError(`${key}.outputs must name at least one direction`);
  }

  return { sources, outputs };
}

function parseFileMap(raw: unknown): Record<string, string> {
  if (!isRecord(raw)) {
    throw new ConfigError('files must be an object like {"ltr-app.css": "app.css"}');
  }
  const files: Record<string, string> = {};
  for (const [outputPath, sourcePath] of Object.entries(raw)) {
    if (typeof sourcePath !== "string" || sourcePath === "") {
      throw new ConfigError(`files.${outputPath} must be a source path`);
    }
    files[outputPath] = sourcePath;
  }
  return files;
}

function resolveTarget(target: BuildTarget, baseDir: string, outDir: string): BuildTarget {
  const outputs: Partial<Record<Direction, string>> = {};
  for (const direction of DIRECTIONS) {
    const outputPath = target.outputs[direction];
    if (outputPath !== undefined) {
      outputs[direction] = path.resolve(outDir, outputPath);
    }
  }
  return {
    sources: target.sources.map((s) => path.resolve(baseDir, s)),
    outputs,
  };
}

/**
 * Validate a parsed config object and resolve its paths against baseDir.
 */
export function parseConfig(raw: unknown, baseDir: string, env: Env = {}): BidiConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("Config must be a JSON object");
  }

  let outDir = baseDir;
  const rawOutDir = raw.outDir;
  if (rawOutDir !== undefined) {
    if (typeof rawOutDir !== "string") {
      throw new ConfigError("outDir must be a path");
    }
    outDir = path.resolve(baseDir, rawOutDir);
  }

  const envMode = env[WRITE_MODE_ENV];
  const rawMode: unknown = envMode !== undefined && envMode !== "" ? envMode : raw.writeMode;
  let writeMode: WriteMode = "if-changed";
  if (rawMode !== undefined) {
    if (!isWriteMode(rawMode)) {
      throw new ConfigError(
        `writeMode must be one of ${WRITE_MODES.join(", ")}, got '${String(rawMode)}'`,
      );
    }
    writeMode = rawMode;
  }

  let strict = false;
  const rawStrict = raw.strict;
  if (rawStrict !== undefined) {
    if (typeof rawStrict !== "boolean") {
      throw new ConfigError("strict must be true or false");
    }
    strict = rawStrict;
  }

  const targets: BuildTarget[] = [];
  const rawTargets = raw.targets;
  if (rawTargets !== undefined) {
    if (!Array.isArray(rawTargets)) {
      throw new ConfigError("targets must be a list");
    }
    rawTargets.forEach((t: unknown, i: number) => targets.push(parseTarget(t, i)));
  }
  if (raw.files !== undefined) {
    targets.push(...targetsFromFileMap(parseFileMap(raw.files)));
  }
  if (targets.length === 0) {
    throw new ConfigError("Config declares no outputs: add 'targets' or 'files'");
  }

  return {
    writeMode,
    strict,
    targets: targets.map((t) => resolveTarget(t, baseDir, outDir)),
  };
}

/**
 * Read, parse and validate a config file.
 */
export async function loadConfig(configPath: string, env: Env = process.env): Promise<BidiConfig> {
  const absolute = path.resolve(configPath);

  let raw: string;
  try {
    raw = await fs.readFile(absolute, "utf-8");
  } catch (err) {
    throw new ConfigError(`Could not read config file at ${absolute}: ${messageOf(err)}`, {
      cause: err,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON: ${messageOf(err)}`, { cause: err });
  }

  return { ...parseConfig(parsed, path.dirname(absolute), env), configPath: absolute };
}
