import { describe, expect, it } from "vitest";
import { createCodeResolver, identityResolver } from "./codeResolver";

describe("createCodeResolver", () => {
  const resolver = createCodeResolver({
    codeToId: {
      A1: "act-1",
      M1O1A1: "act-1",
      SHARED: ["act-9", "act-2"],
      " ": "ignored",
    },
    idToCodes: {
      "obj-1": ["O1", "M1O1"],
      "mod-2": ["M2", "M2O3"],
    },
  });

  it("returns every candidate id sorted", () => {
    expect(resolver.resolveCode("SHARED")).toEqual(["act-2", "act-9"]);
  });

  it("trims the code before looking it up", () => {
    expect(resolver.resolveCode(" A1 ")).toEqual(["act-1"]);
  });

  it("resolves codes that only appear in the reverse map", () => {
    expect(resolver.resolveCode("O1")).toEqual(["obj-1"]);
  });

  it("accepts a canonical id as its own code", () => {
    expect(resolver.resolveCode("act-1")).toEqual(["act-1"]);
  });

  it("returns no candidates for unknown codes", () => {
    expect(resolver.resolveCode("A404")).toEqual([]);
    expect(resolver.resolveCode("")).toEqual([]);
  });

  it("lists the codes of an id, most specific first", () => {
    expect(resolver.codesFor("act-1")).toEqual(["M1O1A1", "A1"]);
    expect(resolver.codesFor("missing")).toEqual([]);
  });

  it("prefers activity codes over objective and module codes", () => {
    expect(resolver.preferredCode("act-1")).toBe("M1O1A1");
    expect(resolver.preferredCode("obj-1")).toBe("M1O1");
    expect(resolver.preferredCode("mod-2")).toBe("M2O3");
    expect(resolver.preferredCode("missing")).toBeUndefined();
  });
});

describe("identityResolver", () => {
  it("maps each code to itself", () => {
    const resolver = identityResolver(["A1", "O1"]);
    expect(resolver.resolveCode("A1")).toEqual(["A1"]);
    expect(resolver.preferredCode("O1")).toBe("O1");
  });
});
