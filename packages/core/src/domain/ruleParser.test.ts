import { describe, expect, it } from "vitest";
import { RulePayloadError, RuleTokenParseError } from "./errors";
import {
  formatRequirement,
  parseModuleRules,
  parseRequirement,
  parseRequirementList,
  parseRulePayload,
} from "./ruleParser";

describe("parseRequirement", () => {
  it("parses a bare code", () => {
    expect(parseRequirement("A1")).toEqual({ sourceCode: "A1" });
  });

  it("parses percentage thresholds as success rates", () => {
    expect(parseRequirement(" M1O1A2@70% ")).toEqual({
      sourceCode: "M1O1A2",
      threshold: { metric: "success_rate", value: 0.7 },
    });
  });

  it("parses level thresholds", () => {
    expect(parseRequirement("A3#2")).toEqual({
      sourceCode: "A3",
      threshold: { metric: "level", value: 2 },
    });
  });

  it("accepts the parenthesised percentage form", () => {
    expect(parseRequirement("A4(75%)")).toEqual({
      sourceCode: "A4",
      threshold: { metric: "success_rate", value: 0.75 },
    });
    expect(parseRequirement("A5 (25 %)")).toEqual({
      sourceCode: "A5",
      threshold: { metric: "success_rate", value: 0.25 },
    });
  });

  it("accepts the percentage bounds", () => {
    expect(parseRequirement("A1@0%").threshold).toEqual({ metric: "success_rate", value: 0 });
    expect(parseRequirement("A1@100%").threshold).toEqual({ metric: "success_rate", value: 1 });
  });

  it.each([
    ["", "empty token"],
    ["@70%", "missing unit code"],
    ["#2", "missing unit code"],
    ["A1@120%", "percentage 120 is outside [0, 100]"],
    ["A1@-5%", 'expected a percentage such as 70%, got "-5%"'],
    ["A1@-0%", 'expected a percentage such as 70%, got "-0%"'],
    ["A1@abc", 'expected a percentage such as 70%, got "abc"'],
    ["A1#1.5", "level 1.5 must be a non-negative integer"],
    ["A1#-1", "level -1 must be a non-negative integer"],
    ["A1#2.0", "level 2.0 must be a non-negative integer"],
    ["A1#", 'expected a level such as #2, got "#"'],
    ["A1%", "unrecognised threshold suffix"],
  ])("rejects %j", (token, reason) => {
    let caught: unknown;
    try {
      parseRequirement(token);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(RuleTokenParseError);
    expect(caught).toMatchObject({ token, reason });
  });

  it("names the token in the error message", () => {
    expect(() => parseRequirement("A1@120%")).toThrow(
      'Cannot parse requirement "A1@120%": percentage 120 is outside [0, 100]'
    );
  });
});

describe("formatRequirement", () => {
  it("writes the canonical token forms", () => {
    expect(formatRequirement({ sourceCode: "A1" })).toBe("A1");
    expect(
      formatRequirement({ sourceCode: "A1", threshold: { metric: "success_rate", value: 0.7 } })
    ).toBe("A1@70%");
    expect(
      formatRequirement({ sourceCode: "A1", threshold: { metric: "level", value: 3 } })
    ).toBe("A1#3");
  });

  it("is read back by parseRequirement", () => {
    const requirement = { sourceCode: "M2O1A4", threshold: { metric: "success_rate" as const, value: 0.85 } };
    expect(parseRequirement(formatRequirement(requirement))).toEqual(requirement);
  });
});

describe("parseRequirementList", () => {
  it("splits delimited strings and drops duplicates", () => {
    const { requirements, errors } = parseRequirementList("A1, A2@50%; A1,,");
    expect(requirements).toEqual([
      { sourceCode: "A1" },
      { sourceCode: "A2", threshold: { metric: "success_rate", value: 0.5 } },
    ]);
    expect(errors).toEqual([]);
  });

  it("keeps distinct thresholds on the same source", () => {
    const { requirements } = parseRequirementList(["A1@50%", "A1@60%"]);
    expect(requirements).toHaveLength(2);
  });

  it("collects bad tokens and keeps the rest", () => {
    const { requirements, errors } = parseRequirementList(["A1", "A1@120%", "A2"]);
    expect(requirements).toEqual([{ sourceCode: "A1" }, { sourceCode: "A2" }]);
    expect(errors.map((error) => error.token)).toEqual(["A1@120%"]);
  });
});

describe("parseRulePayload", () => {
  it("produces one rule per direction", () => {
    const { specs, issues } = parseRulePayload(" O2 ", {
      activation_requirements: ["A1"],
      deactivation_requirements: "A3#1",
      initially_open: true,
      kind: "objective",
    });
    expect(issues).toEqual([]);
    expect(specs).toEqual([
      {
        targetCode: "O2",
        direction: "activation",
        requirements: [{ sourceCode: "A1" }],
        initiallyOpen: true,
        kind: "objective",
      },
      {
        targetCode: "O2",
        direction: "deactivation",
        requirements: [{ sourceCode: "A3", threshold: { metric: "level", value: 1 } }],
        initiallyOpen: true,
        kind: "objective",
      },
    ]);
  });

  it("reports bad tokens with their direction", () => {
    const { specs, issues } = parseRulePayload("A2", {
      deactivation_requirements: ["A1@x%"],
    });
    expect(specs[1].requirements).toEqual([]);
    expect(issues).toHaveLength(1);
    expect(issues[0].direction).toBe("deactivation");
    expect(issues[0].error.token).toBe("A1@x%");
  });

  it("throws on unknown fields", () => {
    expect(() => parseRulePayload("A2", { activation: ["A1"] })).toThrow(RulePayloadError);
  });
});

describe("parseModuleRules", () => {
  it("parses every entry and reports the broken ones", () => {
    const { ruleSpecs, diagnostics } = parseModuleRules({
      O2: { activation_requirements: ["A2@80%", "bad%"] },
      "": {},
      X: 5,
    });

    expect(ruleSpecs.map((spec) => `${spec.targetCode}:${spec.direction}`)).toEqual([
      "O2:activation",
      "O2:deactivation",
    ]);
    expect(ruleSpecs[0].requirements).toEqual([
      { sourceCode: "A2", threshold: { metric: "success_rate", value: 0.8 } },
    ]);
    expect(diagnostics).toEqual([
      {
        kind: "TokenParseError",
        token: "bad%",
        targetCode: "O2",
        direction: "activation",
        message: 'O2: Cannot parse requirement "bad%": unrecognised threshold suffix',
      },
      {
        kind: "MalformedRulePayload",
        targetCode: "",
        message: "Rule entry has an empty target code",
      },
      expect.objectContaining({ kind: "MalformedRulePayload", targetCode: "X" }),
    ]);
  });

  it("rejects payloads that are not objects", () => {
    const { ruleSpecs, diagnostics } = parseModuleRules("O2: A1");
    expect(ruleSpecs).toEqual([]);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]).toMatchObject({ kind: "MalformedRulePayload", targetCode: "" });
  });
});
