import { describe, expect, it } from "vitest";
import { UnsupportedModuleError } from "./errors";
import { assertSupportedModule, supportedModules } from "./supportedModules";

describe("supportedModules", () => {
  it("intersects rule and catalog modules in numeric order", () => {
    expect(supportedModules(["M10", "M2", " M1", "M3"], ["M1", "M2", "M10"])).toEqual([
      "M1",
      "M2",
      "M10",
    ]);
  });

  it("narrows to observed modules when any were observed", () => {
    expect(supportedModules(["M1", "M2", "M10"], ["M1", "M2", "M10"], ["M2", "M10", "M7"])).toEqual([
      "M2",
      "M10",
    ]);
  });

  it("ignores an empty observed set", () => {
    expect(supportedModules(["M1", "M2"], ["M2", "M1"], [])).toEqual(["M1", "M2"]);
  });

  it("sorts ids without a module number last", () => {
    expect(supportedModules(["extra", "M1"], ["M1", "extra"])).toEqual(["M1", "extra"]);
  });
});

describe("assertSupportedModule", () => {
  it("accepts supported modules", () => {
    expect(() => assertSupportedModule("M2", ["M1", "M2"])).not.toThrow();
  });

  it("names the supported modules when refusing", () => {
    expect(() => assertSupportedModule("M4", ["M1", "M2"])).toThrow(UnsupportedModuleError);
    expect(() => assertSupportedModule("M4", [])).toThrow(
      'Module "M4" is not covered by every metadata source (supported: none).'
    );
  });
});
