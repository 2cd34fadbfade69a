import { describe, expect, it } from "vitest";
import { toReferenceHandle } from "../../ids.js";
import { ReferenceHandleTable } from "../handle-table.js";
import { createReferenceIndex } from "../reference-index.js";

describe("createReferenceIndex", () => {
  const index = createReferenceIndex({
    getters: { main: "h:main", "E|get#size": "h:E.size" },
    setters: { value: "h:value=" },
    typedefs: { Callback: "h:Callback" },
    extensions: { E: "h:E" },
    classes: {
      Box: {
        handle: "h:Box",
        fields: { width: "h:Box.width" },
        constructors: { "": "h:Box.new" },
      },
    },
    extensionTypes: {
      Id: { handle: "h:Id", getters: { "Id|#rep#raw": "h:Id.raw" } },
    },
  });

  it("looks up unit members per bucket", () => {
    expect(index.lookup({ bucket: "getter", text: "main" })).toBe("h:main");
    expect(index.lookup({ bucket: "setter", text: "value" })).toBe("h:value=");
    expect(index.lookup({ bucket: "setter", text: "main" })).toBeUndefined();
  });

  it("resolves container indices by declaration kind", () => {
    const box = index.lookupDeclaration("class", "Box");
    expect(box?.handle).toBe("h:Box");
    expect(box?.lookup({ bucket: "field", text: "width" })).toBe("h:Box.width");
    expect(box?.lookup({ bucket: "constructor", text: "" })).toBe("h:Box.new");
    expect(index.lookupDeclaration("extension-type", "Box")).toBeUndefined();
    expect(
      index
        .lookupDeclaration("extension-type", "Id")
        ?.lookup({ bucket: "getter", text: "Id|#rep#raw" })
    ).toBe("h:Id.raw");
  });

  it("gives typedefs and extensions a handle without member tables", () => {
    const callback = index.lookupDeclaration("typedef", "Callback");
    expect(callback?.handle).toBe("h:Callback");
    expect(callback?.lookup({ bucket: "getter", text: "main" })).toBeUndefined();
    expect(index.lookupDeclaration("extension", "E")?.handle).toBe("h:E");
    expect(index.lookupDeclaration("typedef", "E")).toBeUndefined();
  });

  it("ignores prototype keys", () => {
    const empty = createReferenceIndex({});
    expect(empty.lookup({ bucket: "getter", text: "constructor" })).toBeUndefined();
    expect(empty.lookupDeclaration("class", "toString")).toBeUndefined();
  });
});

describe("ReferenceHandleTable", () => {
  it("keeps the first symbol registered for a handle", () => {
    const table = new ReferenceHandleTable();
    const handle = toReferenceHandle("h:main");

    expect(table.register(handle, 3)).toBe(true);
    expect(table.register(handle, 7)).toBe(false);
    expect(table.get(handle)).toBe(3);
    expect(table.has(toReferenceHandle("h:other"))).toBe(false);
    expect([...table.entries()]).toEqual([["h:main", 3]]);
    expect(table.size).toBe(1);
  });
});
