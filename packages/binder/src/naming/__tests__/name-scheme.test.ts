import { describe, expect, it } from "vitest";
import {
  createNameScheme,
  fieldMemberName,
  memberKeys,
  procedureTearOffName,
  unnamedExtensionName,
  type ContainerName,
} from "../name-scheme.js";

const unit: ContainerName = { kind: "unit", name: "memory:///unit.src" };
const box: ContainerName = { kind: "class-like", name: "Box" };
const ext: ContainerName = { kind: "extension", name: "E" };
const wrapper: ContainerName = { kind: "extension-type", name: "W" };

describe("memberKeys", () => {
  it("names unit and class members by their plain name", () => {
    expect(
      memberKeys({ container: unit, memberKind: "method", isStatic: false, name: "run" })
    ).toEqual({ key: { bucket: "getter", text: "run" }, tearOff: undefined });
    expect(
      memberKeys({ container: box, memberKind: "setter", isStatic: false, name: "size" })
    ).toEqual({ key: { bucket: "setter", text: "size" }, tearOff: undefined });
    expect(
      memberKeys({ container: box, memberKind: "field", isStatic: true, name: "count" })
    ).toEqual({ key: { bucket: "field", text: "count" } });
  });

  it("prefixes extension instance members and adds method tear-offs", () => {
    expect(
      memberKeys({ container: ext, memberKind: "method", isStatic: false, name: "m" })
    ).toEqual({
      key: { bucket: "getter", text: "E|m" },
      tearOff: { bucket: "getter", text: "E|get#m" },
    });
    expect(
      memberKeys({ container: ext, memberKind: "getter", isStatic: false, name: "g" })
    ).toEqual({ key: { bucket: "getter", text: "E|get#g" }, tearOff: undefined });
  });

  it("files lowered extension setters under the getter table", () => {
    expect(
      memberKeys({ container: ext, memberKind: "setter", isStatic: false, name: "s" }).key
    ).toEqual({ bucket: "getter", text: "E|set#s" });
  });

  it("keeps static extension members in their natural tables", () => {
    expect(
      memberKeys({ container: ext, memberKind: "setter", isStatic: true, name: "s" }).key
    ).toEqual({ bucket: "setter", text: "E|s" });
    expect(
      memberKeys({ container: wrapper, memberKind: "method", isStatic: true, name: "of" })
    ).toEqual({ key: { bucket: "getter", text: "W|of" }, tearOff: undefined });
  });

  it("names extension type instance fields as representation fields", () => {
    expect(
      memberKeys({ container: wrapper, memberKind: "field", isStatic: false, name: "raw" }).key
    ).toEqual({ bucket: "field", text: "W|#rep#raw" });
  });

  it("names class constructors and their tear-offs", () => {
    expect(
      memberKeys({ container: box, memberKind: "constructor", isStatic: false, name: "" })
    ).toEqual({
      key: { bucket: "constructor", text: "" },
      tearOff: { bucket: "getter", text: "_#Box#new#tearOff" },
    });
    expect(
      memberKeys({ container: box, memberKind: "factory", isStatic: false, name: "empty" })
        .tearOff
    ).toEqual({ bucket: "getter", text: "_#Box#empty#tearOff" });
  });

  it("names extension type constructors after their container", () => {
    expect(
      memberKeys({ container: wrapper, memberKind: "constructor", isStatic: false, name: "" })
    ).toEqual({
      key: { bucket: "constructor", text: "W|constructor#new" },
      tearOff: { bucket: "getter", text: "W|_#new#tearOff" },
    });
  });
});

describe("fieldMemberName", () => {
  it("hides late-lowered backing fields", () => {
    const scheme = createNameScheme({ container: box, isStatic: false });
    const synthesized = { isSynthesized: true };
    expect(fieldMemberName(scheme, "field", "x", synthesized)).toBe("_#Box#x");
    expect(fieldMemberName(scheme, "is-set-field", "x", synthesized)).toBe(
      "_#Box#x#isSet"
    );
    expect(fieldMemberName(scheme, "getter", "x", synthesized)).toBe("x");
  });

  it("leaves the owner out of unit-level backing fields", () => {
    const scheme = createNameScheme({ container: unit, isStatic: false });
    expect(
      fieldMemberName(scheme, "field", "y", { isSynthesized: true })
    ).toBe("_#y");
  });
});

describe("procedureTearOffName", () => {
  it("only exists for extension instance methods", () => {
    const instance = createNameScheme({ container: wrapper, isStatic: false });
    const staticScheme = createNameScheme({ container: wrapper, isStatic: true });
    expect(procedureTearOffName(instance, "method", "m")).toEqual({
      bucket: "getter",
      text: "W|get#m",
    });
    expect(procedureTearOffName(instance, "operator", "+")).toBeUndefined();
    expect(procedureTearOffName(staticScheme, "method", "m")).toBeUndefined();
  });
});

it("numbers unnamed extensions", () => {
  expect(unnamedExtensionName(0)).toBe("_extension#0");
  expect(unnamedExtensionName(3)).toBe("_extension#3");
});
