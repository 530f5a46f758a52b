/**
 * StylesheetBuilder — turns build targets into one CSS file per direction.
 *
 * Orchestrates: read sources -> check -> generate per direction -> write
 *
 * Directions of a target are generated and written concurrently and fail
 * independently: an output that cannot be written does not stop the other.
 * A source that cannot be read, or that fails the checks, fails the target.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { DIRECTIONS, resolveProfile } from "./direction.js";
import type { Direction } from "./direction.js";
import {
  BidiCssError,
  ConfigError,
  OutputWriteError,
  SourceReadError,
  SourceValidationError,
} from "./errors.js";
import { BuildEventEmitter } from "./events.js";
import type { BuildEvent } from "./events.js";
import { generate } from "./generator.js";
import type { StylesheetSource } from "./parser/types.js";
import { readSource, sourceText } from "./source.js";
import { checkSource, Severity } from "./validator.js";
import type { Diagnostic, LintRule } from "./validator.js";

// ---------- Config Types ----------

export type WriteMode = "always" | "if-changed";

export const WRITE_MODES: readonly WriteMode[] = ["always", "if-changed"];

export interface BuilderConfig {
  /** Event listener callback. */
  onEvent?: (event: BuildEvent) => void;
  /** "if-changed" leaves identical outputs untouched. Default "if-changed". */
  writeMode?: WriteMode;
  /** Base directory for relative paths. Default process.cwd(). */
  cwd?: string;
  /** Treat lint warnings as failures. Default false. */
  strict?: boolean;
  /** Extra lint rules run before generation. */
  extraLintRules?: LintRule[];
}

export interface BuildTarget {
  /** Source files, concatenated in order */
  sources: string[];
  /** Output path per direction */
  outputs: Partial<Record<Direction, string>>;
}

// ---------- Report Types ----------

export type DirectionStatus = "written" | "unchanged" | "failed";

export interface DirectionReport {
  direction: Direction;
  outputPath: string;
  status: DirectionStatus;
  bytes?: number;
  error?: BidiCssError;
}

export interface TargetReport {
  origin: string;
  ok: boolean;
  diagnostics: Diagnostic[];
  directions: DirectionReport[];
  error?: BidiCssError;
}

export interface BuildReport {
  ok: boolean;
  targets: TargetReport[];
  duration: number;
  written: number;
  unchanged: number;
  failed: number;
}

// ---------- StylesheetBuilder ----------

export class StylesheetBuilder {
  private events = new BuildEventEmitter();
  private writeMode: WriteMode;
  private cwd: string;
  private strict: boolean;
  private extraLintRules: LintRule[];

  constructor(config: BuilderConfig = {}) {
    this.writeMode = config.writeMode ?? "if-changed";
    this.cwd = config.cwd ?? process.cwd();
    this.strict = config.strict ?? false;
    this.extraLintRules = config.extraLintRules ?? [];
    if (config.onEvent) {
      this.events.on(config.onEvent);
    }
  }

  /** Get the event emitter (for attaching more listeners). */
  getEvents(): BuildEventEmitter {
    return this.events;
  }

  /**
   * Build every target in order. All targets are checked before anything is
   * read or written.
   *
   * @throws ConfigError for a target without sources or outputs, or an output
   *   path claimed twice anywhere in the build
   */
  async build(targets: BuildTarget[]): Promise<BuildReport> {
    this.checkTargets(targets);

    const startTime = Date.now();
    this.events.emitBuildStarted(targets.length);

    const reports: TargetReport[] = [];
    for (const target of targets) {
      reports.push(await this.buildTarget(target));
    }

    const all = reports.flatMap((r) => r.directions);
    const written = all.filter((d) => d.status === "written").length;
    const unchanged = all.filter((d) => d.status === "unchanged").length;
    const failed = all.filter((d) => d.status === "failed").length;
    const duration = Date.now() - startTime;

    this.events.emitBuildCompleted(duration, written, unchanged, failed);

    return {
      ok: reports.every((r) => r.ok),
      targets: reports,
      duration,
      written,
      unchanged,
      failed,
    };
  }

  /**
   * Build a single target.
   *
   * @throws ConfigError for a target without outputs or with a shared output path
   */
  async buildTarget(target: BuildTarget): Promise<TargetReport> {
    const outputs = this.resolveOutputs(target);
    const sourcePaths = target.sources.map((p) => path.resolve(this.cwd, p));
    const origin = target.sources.join("+");

    let source: StylesheetSource;
    try {
      source = await readSource(sourcePaths);
    } catch (err) {
      if (!(err instanceof SourceReadError)) throw err;
      return this.failTarget(origin, outputs, [], err);
    }
    this.events.emitSourceLoaded(
      origin,
      source.fragments.length,
      Buffer.byteLength(sourceText(source), "utf-8"),
    );

    const diagnostics = checkSource(source, this.extraLintRules);
    for (const diagnostic of diagnostics) {
      this.events.emitDiagnosticReported(origin, diagnostic);
    }

    const blocking = diagnostics.filter(
      (d) =>
        d.severity === Severity.ERROR ||
        (this.strict && d.severity === Severity.WARNING),
    );
    if (blocking.length > 0) {
      return this.failTarget(origin, outputs, diagnostics, new SourceValidationError(blocking));
    }

    const directions = await Promise.all(
      outputs.map(([direction, outputPath]) =>
        this.buildDirection(source, origin, direction, outputPath),
      ),
    );

    return {
      origin,
      ok: directions.every((d) => d.status !== "failed"),
      diagnostics,
      directions,
    };
  }

  private async buildDirection(
    source: StylesheetSource,
    origin: string,
    direction: Direction,
    outputPath: string,
  ): Promise<DirectionReport> {
    let css: string;
    try {
      const stylesheet = generate(source, resolveProfile(direction));
      this.events.emitStylesheetGenerated(
        origin,
        direction,
        stylesheet.substitutions.length,
      );
      css = stylesheet.css;
    } catch (err) {
      if (!(err instanceof BidiCssError)) throw err;
      return this.failDirection(direction, outputPath, err);
    }

    const bytes = Buffer.byteLength(css, "utf-8");
    try {
      const unchanged = await writeOutput(outputPath, css, this.writeMode);
      this.events.emitStylesheetWritten(direction, outputPath, bytes, unchanged);
      return {
        direction,
        outputPath,
        status: unchanged ? "unchanged" : "written",
        bytes,
      };
    } catch (err) {
      return this.failDirection(
        direction,
        outputPath,
        new OutputWriteError(outputPath, direction, err),
      );
    }
  }

  private checkTargets(targets: BuildTarget[]): void {
    const owners = new Map<string, string>();
    for (const target of targets) {
      const origin = target.sources.join("+");
      for (const [direction, outputPath] of this.resolveOutputs(target)) {
        const owner = owners.get(outputPath);
        if (owner !== undefined) {
          throw new ConfigError(
            `Output ${outputPath} is claimed twice: by ${owner} and by ${origin} (${direction})`,
          );
        }
        owners.set(outputPath, `${origin} (${direction})`);
      }
    }
  }

  private resolveOutputs(target: BuildTarget): Array<[Direction, string]> {
    const outputs: Array<[Direction, string]> = [];
    for (const direction of DIRECTIONS) {
      const outputPath = target.outputs[direction];
      if (outputPath !== undefined) {
        outputs.push([direction, path.resolve(this.cwd, outputPath)]);
      }
    }

    if (outputs.length === 0) {
      throw new ConfigError(`Target ${target.sources.join("+")} has no outputs`);
    }

    if (target.sources.length === 0) {
      throw new ConfigError(`Target for ${describeOutputs(outputs)} has no sources`);
    }

    const [first, second] = outputs;
    if (first && second && first[1] === second[1]) {
      throw new ConfigError(
        `Target ${target.sources.join("+")} writes both directions to ${first[1]}`,
      );
    }

    return outputs;
  }

  private failTarget(
    origin: string,
    outputs: Array<[Direction, string]>,
    diagnostics: Diagnostic[],
    error: BidiCssError,
  ): TargetReport {
    this.events.emitTargetFailed(origin, error.message);
    return {
      origin,
      ok: false,
      diagnostics,
      directions: outputs.map(([direction, outputPath]) => ({
        direction,
        outputPath,
        status: "failed",
        error,
      })),
      error,
    };
  }

  private failDirection(
    direction: Direction,
    outputPath: string,
    error: BidiCssError,
  ): DirectionReport {
    this.events.emitDirectionFailed(direction, outputPath, error.message);
    return { direction, outputPath, status: "failed", error };
  }
}

// ---------- File helpers ----------

function describeOutputs(outputs: Array<[Direction, string]>): string {
  return outputs.map(([, p]) => p).join(", ");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
}

/**
 * Write an output file, creating its directory.
 * Returns true when "if-changed" found identical content and skipped the write.
 */
async function writeOutput(
  filePath: string,
  css: string,
  writeMode: WriteMode,
): Promise<boolean> {
  if (writeMode === "if-changed") {
    const existing = await readIfExists(filePath);
    if (existing === css) return true;
  }
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, css, "utf-8");
  return false;
}
