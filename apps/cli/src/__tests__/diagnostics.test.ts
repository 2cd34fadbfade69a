import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { Diagnostic } from "@declbind/binder";
import { describe, expect, it } from "vitest";
import { formatCliDiagnostic, type SourceCache } from "../diagnostics.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixturePath = resolve(__dirname, "fixtures/sample.src");
const fixtureSource = readFileSync(fixturePath, "utf8");

const augmentHint =
  "Mark the later declaration with 'augment' to extend the earlier one instead of redeclaring it.";

const duplicatePoint = (): Diagnostic => {
  const first = fixtureSource.indexOf("Point");
  const second = fixtureSource.lastIndexOf("Point");
  return {
    code: "BD0001",
    message: "'Point' is already declared in this scope",
    severity: "error",
    phase: "binder",
    span: { file: fixturePath, start: second, end: second + "Point".length },
    related: [
      {
        code: "BD0001",
        message: "previous declaration of 'Point'",
        severity: "note",
        phase: "binder",
        span: { file: fixturePath, start: first, end: first + "Point".length },
      },
    ],
    hints: [{ message: augmentHint }],
  };
};

describe("formatCliDiagnostic", () => {
  it("renders the location, source line, related notes and hints", () => {
    expect(formatCliDiagnostic(duplicatePoint(), { color: false })).toBe(
      [
        `${fixturePath}:4:7 ERROR [binder] BD0001: 'Point' is already declared in this scope`,
        " |",
        "4 | class Point {}",
        " |       ^^^^^ 'Point' is already declared in this scope",
        `  = note: previous declaration of 'Point' (${fixturePath}:1:7)`,
        `  = help: ${augmentHint}`,
      ].join("\n"),
    );
  });

  it("falls back to offsets when the source file is missing", () => {
    const missing = resolve(__dirname, "does-not-exist.src");
    const diagnostic: Diagnostic = {
      code: "BD0001",
      message: "missing unit",
      severity: "error",
      span: { file: missing, start: 3, end: 7 },
    };

    expect(formatCliDiagnostic(diagnostic, { color: false })).toBe(
      `${missing}:3-7 ERROR BD0001: missing unit`,
    );
  });

  it("does not read sources behind non-file uris", () => {
    const diagnostic: Diagnostic = {
      code: "BD0002",
      message: "member 'Box' has the same name as the enclosing class",
      severity: "warning",
      phase: "binder",
      span: { file: "memory:///lib/box.src", start: 10, end: 13 },
    };

    expect(formatCliDiagnostic(diagnostic, { color: false })).toBe(
      "memory:///lib/box.src:10-13 WARNING [binder] BD0002: member 'Box' has the same name as the enclosing class",
    );
  });

  it("reads sources through the cache", () => {
    const sources: SourceCache = new Map([[resolve("virtual.src"), "abc\ndef\n"]]);
    const diagnostic: Diagnostic = {
      code: "SR0001",
      message: "type 'def' not found",
      severity: "error",
      phase: "scope-resolution",
      span: { file: "virtual.src", start: 4, end: 7 },
    };

    expect(formatCliDiagnostic(diagnostic, { color: false, sources })).toBe(
      [
        "virtual.src:2:1 ERROR [scope-resolution] SR0001: type 'def' not found",
        " |",
        "2 | def",
        " | ^^^ type 'def' not found",
      ].join("\n"),
    );
  });

  it("remembers files it could not read", () => {
    const sources: SourceCache = new Map();
    const missing = resolve(__dirname, "also-missing.src");
    formatCliDiagnostic(
      {
        code: "BD0001",
        message: "missing unit",
        severity: "error",
        span: { file: missing, start: 0, end: 1 },
      },
      { color: false, sources },
    );

    expect(sources.has(missing)).toBe(true);
    expect(sources.get(missing)).toBeUndefined();
  });

  it("colors the severity and code", () => {
    const diagnostic: Diagnostic = {
      code: "BD0001",
      message: "missing unit",
      severity: "error",
      span: { file: "memory:///unit.src", start: 3, end: 7 },
    };

    expect(formatCliDiagnostic(diagnostic)).toBe(
      "memory:///unit.src:3-7 \u001B[1m\u001B[31mERROR\u001B[0m\u001B[0m \u001B[35mBD0001\u001B[0m: missing unit",
    );
  });
});
