import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { formatEvent, parseCliArgs, runCli, usageText } from "../src/cli.js";
import type { CliIO } from "../src/cli.js";
import { CliUsageError } from "../src/errors.js";

const MEDIA = ".media { float: <defaultFloat>; padding-<oppositeFloat>: 10px; }\n";

function captureIO(cwd: string): { io: CliIO; out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      stdout: (text) => out.push(text),
      stderr: (text) => err.push(text),
      cwd,
      env: {},
    },
    out,
    err,
  };
}

describe("parseCliArgs", () => {
  it("parses build", () => {
    expect(parseCliArgs(["build"])).toEqual({ command: "build", quiet: false });
    expect(parseCliArgs(["build", "--config", "x.json", "--quiet"])).toEqual({
      command: "build",
      configPath: "x.json",
      quiet: true,
    });
  });

  it("parses render with several sources", () => {
    expect(parseCliArgs(["render", "a.css", "--dir", "rtl", "b.css"])).toEqual({
      command: "render",
      sources: ["a.css", "b.css"],
      direction: "rtl",
    });
  });

  it("parses check", () => {
    expect(parseCliArgs(["check", "a.css", "--strict"])).toEqual({
      command: "check",
      sources: ["a.css"],
      strict: true,
    });
  });

  it("recognizes help and version anywhere", () => {
    expect(parseCliArgs(["build", "--help"])).toEqual({ command: "help" });
    expect(parseCliArgs(["-h"])).toEqual({ command: "help" });
    expect(parseCliArgs(["--version"])).toEqual({ command: "version" });
    expect(parseCliArgs(["version"])).toEqual({ command: "version" });
  });

  it("rejects incomplete or unknown commands", () => {
    expect(() => parseCliArgs([])).toThrow(CliUsageError);
    expect(() => parseCliArgs(["render", "a.css"])).toThrow(
      "Usage: bidi-css render <source...> --dir ltr|rtl",
    );
    expect(() => parseCliArgs(["render", "--dir", "ltr"])).toThrow(CliUsageError);
    expect(() => parseCliArgs(["check"])).toThrow("Usage: bidi-css check <source...> [--strict]");
    expect(() => parseCliArgs(["frobnicate"])).toThrow("Unknown command: frobnicate");
  });
});

describe("formatEvent", () => {
  it("formats progress lines", () => {
    expect(formatEvent({ type: "BuildStarted", targetCount: 3, timestamp: "t" })).toBe(
      "Building 3 target(s)",
    );
    expect(
      formatEvent({
        type: "StylesheetWritten",
        direction: "rtl",
        outputPath: "out/rtl.css",
        bytes: 120,
        unchanged: false,
        timestamp: "t",
      }),
    ).toBe("  rtl out/rtl.css (120 bytes)");
    expect(
      formatEvent({
        type: "StylesheetWritten",
        direction: "ltr",
        outputPath: "out/ltr.css",
        bytes: 120,
        unchanged: true,
        timestamp: "t",
      }),
    ).toBe("  ltr out/ltr.css (unchanged)");
    expect(
      formatEvent({
        type: "BuildCompleted",
        duration: 12,
        written: 1,
        unchanged: 2,
        failed: 0,
        timestamp: "t",
      }),
    ).toBe("Done in 12ms: 1 written, 2 unchanged, 0 failed");
  });

  it("formats warnings with their location", () => {
    expect(
      formatEvent({
        type: "DiagnosticReported",
        origin: "app.css",
        diagnostic: {
          rule: "physical_side",
          severity: "warning",
          message: "'float: left' hard-codes a physical side",
          fragment: 0,
          line: 4,
          column: 3,
        },
        timestamp: "t",
      }),
    ).toBe("  app.css:4:3 warning [physical_side] 'float: left' hard-codes a physical side");
  });

  it("skips info diagnostics and quiet events", () => {
    expect(
      formatEvent({
        type: "DiagnosticReported",
        origin: "app.css",
        diagnostic: { rule: "no_tokens", severity: "info", message: "none" },
        timestamp: "t",
      }),
    ).toBeNull();
    expect(
      formatEvent({
        type: "SourceLoaded",
        origin: "app.css",
        fragmentCount: 1,
        bytes: 10,
        timestamp: "t",
      }),
    ).toBeNull();
  });
});

describe("runCli", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "cli-test-"));
    fs.writeFileSync(path.join(tmpDir, "app.css"), MEDIA);
    fs.writeFileSync(path.join(tmpDir, "bad.css"), ".x { color: <fooBar>; }");
    fs.writeFileSync(path.join(tmpDir, "legacy.css"), ".a { float: left; }");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("prints usage and exits 2 without arguments", async () => {
    const { io, out, err } = captureIO(tmpDir);
    expect(await runCli([], io)).toBe(2);
    expect(out).toEqual([]);
    expect(err).toEqual([`${usageText()}\n`]);
  });

  it("prints the version", async () => {
    const { io, out } = captureIO(tmpDir);
    expect(await runCli(["version"], io)).toBe(0);
    expect(out).toEqual(["bidi-css 0.1.0\n"]);
  });

  it("lists token bindings", async () => {
    const { io, out } = captureIO(tmpDir);
    expect(await runCli(["tokens"], io)).toBe(0);
    expect(out).toEqual([
      "defaultFloat: ltr=left rtl=right\n",
      "oppositeFloat: ltr=right rtl=left\n",
      "defaultDirection: ltr=ltr rtl=rtl\n",
      "oppositeDirection: ltr=rtl rtl=ltr\n",
    ]);
  });

  describe("render", () => {
    it("prints the stylesheet for one direction", async () => {
      const { io, out } = captureIO(tmpDir);
      expect(await runCli(["render", "app.css", "--dir", "rtl"], io)).toBe(0);
      expect(out).toEqual([".media { float: right; padding-left: 10px; }\n"]);
    });

    it("exits 2 on an invalid direction", async () => {
      const { io, out, err } = captureIO(tmpDir);
      expect(await runCli(["render", "app.css", "--dir", "up"], io)).toBe(2);
      expect(out).toEqual([]);
      expect(err).toEqual(["Invalid direction: 'up' (expected 'ltr' or 'rtl')\n"]);
    });

    it("exits 1 on an unknown token", async () => {
      const { io, out, err } = captureIO(tmpDir);
      expect(await runCli(["render", "bad.css", "--dir", "ltr"], io)).toBe(1);
      expect(out).toEqual([]);
      expect(err).toEqual(["error: Unknown token '<fooBar>' at 1:13\n"]);
    });

    it("exits 1 when a source is missing", async () => {
      const { io, err } = captureIO(tmpDir);
      expect(await runCli(["render", "missing.css", "--dir", "ltr"], io)).toBe(1);
      expect(err[0]).toMatch(/^error: Could not read source /);
    });
  });

  describe("check", () => {
    it("prints diagnostics and exits 1 on errors", async () => {
      const { io, out } = captureIO(tmpDir);
      expect(await runCli(["check", "bad.css"], io)).toBe(1);
      expect(out).toEqual(["bad.css:1:13 error [unknown_token] Unknown token '<fooBar>'\n"]);
    });

    it("passes warnings unless strict", async () => {
      const expected = [
        "legacy.css:1:6 warning [physical_side] 'float: left' hard-codes a physical side\n",
        "legacy.css info [no_tokens] Source has no token references; both outputs will be identical\n",
      ];

      const lenient = captureIO(tmpDir);
      expect(await runCli(["check", "legacy.css"], lenient.io)).toBe(0);
      expect(lenient.out).toEqual(expected);

      const strict = captureIO(tmpDir);
      expect(await runCli(["check", "legacy.css", "--strict"], strict.io)).toBe(1);
      expect(strict.out).toEqual(expected);
    });

    it("prints nothing for a clean source", async () => {
      const { io, out } = captureIO(tmpDir);
      expect(await runCli(["check", "app.css"], io)).toBe(0);
      expect(out).toEqual([]);
    });
  });

  describe("build", () => {
    beforeEach(() => {
      fs.writeFileSync(
        path.join(tmpDir, "bidi.config.json"),
        JSON.stringify({
          outDir: "dist",
          files: { "ltr-app.css": "app.css", "rtl-app.css": "app.css" },
        }),
      );
    });

    it("builds every output from the config in the working directory", async () => {
      const { io, out } = captureIO(tmpDir);
      expect(await runCli(["build"], io)).toBe(0);

      expect(fs.readFileSync(path.join(tmpDir, "dist", "rtl-app.css"), "utf-8")).toBe(
        ".media { float: right; padding-left: 10px; }\n",
      );
      expect(out[0]).toBe("Building 1 target(s)\n");
      expect(out).toContain(`  ltr ${path.join(tmpDir, "dist", "ltr-app.css")} (45 bytes)\n`);
      expect(out[out.length - 1]).toMatch(/^Done in \d+ms: 2 written, 0 unchanged, 0 failed\n$/);
    });

    it("prints only failures when quiet", async () => {
      await runCli(["build"], captureIO(tmpDir).io);
      const { io, out } = captureIO(tmpDir);
      expect(await runCli(["build", "--quiet"], io)).toBe(0);
      expect(out).toEqual([]);
    });

    it("exits 1 when a target fails", async () => {
      fs.writeFileSync(
        path.join(tmpDir, "bidi.config.json"),
        JSON.stringify({ files: { "bad.rtl.css": "bad.css" } }),
      );
      const { io, out } = captureIO(tmpDir);
      expect(await runCli(["build", "--quiet"], io)).toBe(1);
      expect(out).toEqual([
        `  ${path.join(tmpDir, "bad.css")} FAILED: Source validation failed: [unknown_token] Unknown token '<fooBar>'\n`,
      ]);
    });

    it("exits 2 when the config is missing", async () => {
      const { io, err } = captureIO(tmpDir);
      expect(await runCli(["build", "--config", "nope.json"], io)).toBe(2);
      expect(err).toEqual([
        expect.stringMatching(/^Could not read config file at .*nope\.json: /),
      ]);
    });
  });
});
