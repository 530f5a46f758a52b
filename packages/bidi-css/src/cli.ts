/**
 * Command-line interface.
 *
 * Exit codes: 0 success, 1 a build/check/render failure, 2 usage or config error.
 */

import * as path from "node:path";
import { StylesheetBuilder } from "./builder.js";
import { CONFIG_FILE_NAME, loadConfig } from "./config.js";
import { DIRECTIONS, TOKEN_NAMES, bindingFor, resolveProfile } from "./direction.js";
import {
  BidiCssError,
  CliUsageError,
  ConfigError,
  InvalidDirectionError,
} from "./errors.js";
import type { BuildEvent } from "./events.js";
import { generate } from "./generator.js";
import { readSource } from "./source.js";
import { checkSource, Severity } from "./validator.js";
import type { Diagnostic } from "./validator.js";
import { VERSION } from "./version.js";

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  cwd: string;
  env: Record<string, string | undefined>;
}

export type ParsedArgs =
  | { command: "build"; configPath?: string; quiet: boolean }
  | { command: "render"; sources: string[]; direction: string }
  | { command: "check"; sources: string[]; strict: boolean }
  | { command: "tokens" }
  | { command: "version" }
  | { command: "help" };

export function usageText(): string {
  return [
    "bidi-css — build left-to-right and right-to-left stylesheets from one source",
    "",
    "Usage:",
    `  bidi-css build  [--config <path>] [--quiet]   (default config: ./${CONFIG_FILE_NAME})`,
    "  bidi-css render <source...> --dir ltr|rtl",
    "  bidi-css check  <source...> [--strict]",
    "  bidi-css tokens",
    "  bidi-css version",
    "",
    "Tokens: <defaultFloat> <oppositeFloat> <defaultDirection> <oppositeDirection>",
    "        (also #{$default-float} and the other kebab-case spellings)",
    "",
    "Exit codes:",
    "  0 = success",
    "  1 = build, check or render failed",
    "  2 = usage or config error",
  ].join("\n");
}

const VALUE_FLAGS = ["--config", "--dir"];

function readFlag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx === -1) return undefined;
  const value = args[idx + 1];
  if (!value || value.startsWith("--")) return undefined;
  return value;
}

function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

function positionals(args: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (VALUE_FLAGS.includes(arg)) {
      i++;
      continue;
    }
    if (arg.startsWith("--")) continue;
    out.push(arg);
  }
  return out;
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  if (hasFlag(argv, "--help") || hasFlag(argv, "-h")) {
    return { command: "help" };
  }
  if (argv.length === 0) {
    throw new CliUsageError(usageText());
  }
  if (argv[0] === "version" || hasFlag(argv, "--version")) {
    return { command: "version" };
  }

  const [command, ...rest] = argv;

  switch (command) {
    case "build":
      return {
        command: "build",
        configPath: readFlag(rest, "--config"),
        quiet: hasFlag(rest, "--quiet"),
      };

    case "render": {
      const sources = positionals(rest);
      const direction = readFlag(rest, "--dir");
      if (sources.length === 0 || direction === undefined) {
        throw new CliUsageError("Usage: bidi-css render <source...> --dir ltr|rtl");
      }
      return { command: "render", sources, direction };
    }

    case "check": {
      const sources = positionals(rest);
      if (sources.length === 0) {
        throw new CliUsageError("Usage: bidi-css check <source...> [--strict]");
      }
      return { command: "check", sources, strict: hasFlag(rest, "--strict") };
    }

    case "tokens":
      return { command: "tokens" };

    default:
      throw new CliUsageError(`Unknown command: ${command ?? ""}\n\n${usageText()}`);
  }
}

// ---------- Output formatting ----------

function formatDiagnostic(origin: string, d: Diagnostic): string {
  const where =
    d.line !== undefined && d.column !== undefined ? `${origin}:${d.line}:${d.column}` : origin;
  return `${where} ${d.severity} [${d.rule}] ${d.message}`;
}

/** One console line per event, or null for events not worth printing. */
export function formatEvent(event: BuildEvent): string | null {
  switch (event.type) {
    case "BuildStarted":
      return `Building ${event.targetCount} target(s)`;
    case "DiagnosticReported":
      if (event.diagnostic.severity === Severity.INFO) return null;
      return `  ${formatDiagnostic(event.origin, event.diagnostic)}`;
    case "StylesheetWritten":
      return event.unchanged
        ? `  ${event.direction} ${event.outputPath} (unchanged)`
        : `  ${event.direction} ${event.outputPath} (${event.bytes} bytes)`;
    case "DirectionFailed":
      return `  ${event.direction} ${event.outputPath} FAILED: ${event.error}`;
    case "TargetFailed":
      return `  ${event.origin} FAILED: ${event.error}`;
    case "BuildCompleted":
      return `Done in ${event.duration}ms: ${event.written} written, ${event.unchanged} unchanged, ${event.failed} failed`;
    default:
      return null;
  }
}

// ---------- Commands ----------

async function runBuild(
  parsed: { configPath?: string; quiet: boolean },
  io: CliIO,
): Promise<number> {
  const configPath = path.resolve(io.cwd, parsed.configPath ?? CONFIG_FILE_NAME);
  const config = await loadConfig(configPath, io.env);

  const builder = new StylesheetBuilder({
    cwd: path.dirname(configPath),
    writeMode: config.writeMode,
    strict: config.strict,
    onEvent: (event) => {
      const line = formatEvent(event);
      if (line === null) return;
      if (parsed.quiet && event.type !== "DirectionFailed" && event.type !== "TargetFailed") {
        return;
      }
      io.stdout(`${line}\n`);
    },
  });

  const report = await builder.build(config.targets);
  return report.ok ? 0 : 1;
}

async function runRender(
  parsed: { sources: string[]; direction: string },
  io: CliIO,
): Promise<number> {
  const profile = resolveProfile(parsed.direction);
  const source = await readSource(parsed.sources.map((s) => path.resolve(io.cwd, s)));
  io.stdout(generate(source, profile).css);
  return 0;
}

async function runCheck(
  parsed: { sources: string[]; strict: boolean },
  io: CliIO,
): Promise<number> {
  const source = await readSource(parsed.sources.map((s) => path.resolve(io.cwd, s)));
  const origin = parsed.sources.join("+");
  const diagnostics = checkSource(source);

  for (const d of diagnostics) {
    io.stdout(`${formatDiagnostic(origin, d)}\n`);
  }

  const failing = diagnostics.filter(
    (d) =>
      d.severity === Severity.ERROR ||
      (parsed.strict && d.severity === Severity.WARNING),
  );
  return failing.length > 0 ? 1 : 0;
}

function runTokens(io: CliIO): number {
  for (const token of TOKEN_NAMES) {
    const values = DIRECTIONS.map(
      (direction) => `${direction}=${bindingFor(resolveProfile(direction), token)}`,
    );
    io.stdout(`${token}: ${values.join(" ")}\n`);
  }
  return 0;
}

function defaultIO(): CliIO {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    cwd: process.cwd(),
    env: process.env,
  };
}

/**
 * Run the CLI and return its exit code. Errors that are not library errors
 * propagate to the caller.
 */
export async function runCli(argv: string[], io: CliIO = defaultIO()): Promise<number> {
  try {
    const parsed = parseCliArgs(argv);
    switch (parsed.command) {
      case "help":
        io.stdout(`${usageText()}\n`);
        return 0;
      case "version":
        io.stdout(`bidi-css ${VERSION}\n`);
        return 0;
      case "tokens":
        return runTokens(io);
      case "build":
        return await runBuild(parsed, io);
      case "render":
        return await runRender(parsed, io);
      case "check":
        return await runCheck(parsed, io);
    }
  } catch (err) {
    if (
      err instanceof CliUsageError ||
      err instanceof ConfigError ||
      err instanceof InvalidDirectionError
    ) {
      io.stderr(`${err.message}\n`);
      return 2;
    }
    if (err instanceof BidiCssError) {
      io.stderr(`error: ${err.message}\n`);
      return 1;
    }
    throw err;
  }
}
