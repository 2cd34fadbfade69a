import { describe, expect, it } from "vitest";
import {
  decodeCompilationUnit,
  decodeReferenceData,
  parseJsonDocument,
  UnitFormatError,
} from "../unit-json.js";

const formatErrorFrom = (decode: () => unknown): UnitFormatError => {
  try {
    decode();
  } catch (error) {
    if (error instanceof UnitFormatError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected the input to be rejected");
};

describe("decodeCompilationUnit", () => {
  it("decodes fragments and fills span files from the unit uri", () => {
    const unit = decodeCompilationUnit({
      uri: "memory:///lib/box.src",
      fragments: [
        {
          kind: "class",
          name: "Box",
          span: { start: 0, end: 3 },
          modifiers: { isAbstract: true },
          typeParameters: [{ name: "T", span: { start: 4, end: 5 } }],
          supertype: { name: "Object", span: { start: 6, end: 12 } },
          members: [
            {
              kind: "field",
              name: "value",
              span: { start: 20, end: 25 },
              type: { kind: "named", name: "T", span: { start: 18, end: 19 } },
            },
            { kind: "constructor", span: { start: 30, end: 33 } },
          ],
        },
      ],
    });

    expect(unit).toEqual({
      uri: "memory:///lib/box.src",
      fragments: [
        {
          kind: "class",
          name: "Box",
          span: { file: "memory:///lib/box.src", start: 0, end: 3 },
          modifiers: { isAbstract: true },
          typeParameters: [
            { name: "T", span: { file: "memory:///lib/box.src", start: 4, end: 5 } },
          ],
          supertype: {
            kind: "named",
            name: "Object",
            span: { file: "memory:///lib/box.src", start: 6, end: 12 },
          },
          members: [
            {
              kind: "field",
              name: "value",
              span: { file: "memory:///lib/box.src", start: 20, end: 25 },
              type: {
                kind: "named",
                name: "T",
                span: { file: "memory:///lib/box.src", start: 18, end: 19 },
              },
            },
            {
              kind: "constructor",
              name: "",
              span: { file: "memory:///lib/box.src", start: 30, end: 33 },
            },
          ],
        },
      ],
    });
  });

  it("defaults methods to plain methods and keeps explicit span files", () => {
    const unit = decodeCompilationUnit({
      uri: "memory:///lib/main.src",
      fragments: [
        {
          kind: "method",
          name: "main",
          span: { file: "lib/main.src", start: 1, end: 5 },
        },
        {
          kind: "method",
          name: "size",
          procedureKind: "getter",
          span: { start: 10, end: 14 },
        },
      ],
    });

    expect(
      unit.fragments.map((fragment) =>
        fragment.kind === "method"
          ? [fragment.procedureKind, fragment.span.file]
          : [fragment.kind],
      ),
    ).toEqual([
      ["method", "lib/main.src"],
      ["getter", "memory:///lib/main.src"],
    ]);
  });

  it("gives each part its own uri", () => {
    const unit = decodeCompilationUnit({
      uri: "memory:///lib/main.src",
      fragments: [],
      parts: [
        {
          uri: "memory:///lib/part.src",
          fragments: [
            {
              kind: "typedef",
              name: "Callback",
              span: { start: 0, end: 8 },
              aliasedType: {
                kind: "function",
                span: { start: 11, end: 19 },
                returnType: { kind: "named", name: "void", span: { start: 11, end: 15 } },
              },
            },
          ],
        },
      ],
    });

    const [part] = unit.parts ?? [];
    const [typedef] = part?.fragments ?? [];
    expect(typedef?.span.file).toBe("memory:///lib/part.src");
    expect(typedef?.kind === "typedef" ? typedef.aliasedType.kind : undefined).toBe(
      "function",
    );
  });

  it("reports the path of an unknown fragment kind", () => {
    const error = formatErrorFrom(() =>
      decodeCompilationUnit({
        uri: "memory:///lib/main.src",
        fragments: [
          { kind: "method", name: "main", span: { start: 0, end: 4 } },
          { kind: "struct", name: "Point", span: { start: 5, end: 10 } },
        ],
      }),
    );
    expect(error.path).toBe("$.fragments[1].kind");
    expect(error.message).toBe("$.fragments[1].kind: unknown fragment kind 'struct'");
  });

  it("reports missing and mistyped values", () => {
    expect(formatErrorFrom(() => decodeCompilationUnit({ fragments: [] })).message).toBe(
      "$.uri: missing required value",
    );
    expect(
      formatErrorFrom(() =>
        decodeCompilationUnit({
          uri: "memory:///lib/main.src",
          fragments: [{ kind: "class", name: 3, span: { start: 0, end: 1 } }],
        }),
      ).message,
    ).toBe("$.fragments[0].name: expected a string but found a number");
    expect(formatErrorFrom(() => decodeCompilationUnit([])).message).toBe(
      "$: expected an object but found an array",
    );
  });

  it("rejects inverted spans and unknown modifiers", () => {
    const fragmentWith = (fields: Record<string, unknown>) => () =>
      decodeCompilationUnit({
        uri: "memory:///lib/main.src",
        fragments: [{ kind: "field", name: "x", span: { start: 0, end: 1 }, ...fields }],
      });

    expect(formatErrorFrom(fragmentWith({ span: { start: 9, end: 2 } })).message).toBe(
      "$.fragments[0].span.end: span ends at 2 before it starts at 9",
    );
    expect(
      formatErrorFrom(fragmentWith({ modifiers: { isLazy: true } })).message,
    ).toBe("$.fragments[0].modifiers.isLazy: unknown modifier 'isLazy'");
  });

  it("only accepts member fragments as members", () => {
    const error = formatErrorFrom(() =>
      decodeCompilationUnit({
        uri: "memory:///lib/main.src",
        fragments: [
          {
            kind: "mixin",
            name: "M",
            span: { start: 0, end: 1 },
            members: [{ kind: "enum", name: "E", span: { start: 2, end: 3 }, constants: [] }],
          },
        ],
      }),
    );
    expect(error.message).toBe(
      "$.fragments[0].members[0].kind: 'enum' is not a member fragment (expected one of field, method, constructor, factory)",
    );
  });
});

describe("decodeReferenceData", () => {
  it("decodes unit tables and container indices", () => {
    expect(
      decodeReferenceData({
        getters: { main: "h:main" },
        typedefs: { Callback: "h:Callback" },
        classes: { Box: { handle: "h:Box", fields: { value: "h:Box.value" } } },
      }),
    ).toEqual({
      getters: { main: "h:main" },
      typedefs: { Callback: "h:Callback" },
      classes: { Box: { handle: "h:Box", fields: { value: "h:Box.value" } } },
    });
  });

  it("requires a handle for each container", () => {
    expect(
      formatErrorFrom(() => decodeReferenceData({ extensionTypes: { Id: {} } })).message,
    ).toBe("$.extensionTypes.Id.handle: missing required value");
  });
});

describe("parseJsonDocument", () => {
  it("reports malformed JSON at the document root", () => {
    const error = formatErrorFrom(() => parseJsonDocument("{"));
    expect(error.path).toBe("$");
    expect(error.message.startsWith("$: invalid JSON (")).toBe(true);
  });
});
