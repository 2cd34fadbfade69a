import { describe, expect, it } from "vitest";
import {
  DiagnosticEmitter,
  diagnosticCodes,
  diagnosticFromCode,
  type Diagnostic,
} from "../index.js";

describe("diagnostic utilities", () => {
  it("infers the binder phase from the code prefix", () => {
    const diagnostic = diagnosticFromCode({
      code: "BD0001",
      params: { kind: "duplicated-declaration", name: "Point" },
      span: { file: "unit.src", start: 1, end: 3 },
    });

    expect(diagnostic).toMatchObject({
      code: "BD0001",
      severity: "error",
      phase: "binder",
      message: "'Point' is already declared in this scope",
    });
  });

  it("takes the scope-resolution phase from the registry", () => {
    const diagnostic = diagnosticFromCode({
      code: "SR0002",
      params: { kind: "not-a-type", name: "E", declarationKind: "extension" },
      span: { file: "unit.src", start: 0, end: 1 },
    });

    expect(diagnostic.phase).toBe("scope-resolution");
    expect(diagnostic.message).toBe("'E' is an extension, not a type");
  });

  it("carries registry hints onto diagnostics", () => {
    const diagnostic = diagnosticFromCode({
      code: "BD0001",
      params: { kind: "duplicated-declaration", name: "x" },
      span: { file: "unit.src", start: 0, end: 1 },
    });
    expect(diagnostic.hints?.[0]?.message).toContain("'augment'");
  });

  it("lets callers override severity and hints", () => {
    const note = diagnosticFromCode({
      code: "BD0001",
      params: { kind: "previous-declaration", name: "x" },
      span: { file: "unit.src", start: 0, end: 1 },
      severity: "note",
      hints: [],
    });
    expect(note.severity).toBe("note");
    expect(note.hints).toEqual([]);
  });

  it("reports member name clashes as warnings", () => {
    const diagnostic = diagnosticFromCode({
      code: "BD0002",
      params: {
        kind: "member-shares-declaration-name",
        name: "Box",
        declarationKind: "class",
      },
      span: { file: "unit.src", start: 0, end: 1 },
    });
    expect(diagnostic.severity).toBe("warning");
    expect(diagnostic.message).toBe(
      "member 'Box' has the same name as the enclosing class"
    );
  });

  it("lists every registered code", () => {
    expect(diagnosticCodes()).toEqual([
      "BD0001",
      "BD0002",
      "BD0003",
      "BD0004",
      "BD0005",
      "SR0001",
      "SR0002",
    ]);
  });
});

describe("DiagnosticEmitter", () => {
  it("collects and forwards reported diagnostics", () => {
    const forwarded: Diagnostic[] = [];
    const emitter = new DiagnosticEmitter({
      forwardTo: { report: (diagnostic) => forwarded.push(diagnostic) },
    });

    const reported = emitter.report({
      code: "SR0001",
      message: "type 'Missing' not found",
      span: { file: "unit.src", start: 4, end: 11 },
    });

    expect(reported.severity).toBe("error");
    expect(reported.phase).toBe("scope-resolution");
    expect(emitter.diagnostics).toEqual([reported]);
    expect(forwarded).toEqual([reported]);
    expect(emitter.hasErrors).toBe(true);
  });

  it("does not count warnings as errors", () => {
    const emitter = new DiagnosticEmitter();
    emitter.report(
      diagnosticFromCode({
        code: "BD0002",
        params: {
          kind: "member-shares-declaration-name",
          name: "A",
          declarationKind: "mixin",
        },
        span: { file: "unit.src", start: 0, end: 1 },
      })
    );
    expect(emitter.hasErrors).toBe(false);
  });
});
