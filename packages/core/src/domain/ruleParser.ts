import { PERCENT_MAX, PERCENT_MIN } from "../constants";
import type { Diagnostic } from "./diagnostics";
import { RulePayloadError, RuleTokenParseError } from "./errors";
import type { DependencyKind, Requirement, RuleSpec, Threshold } from "./models";
import { formatZodIssues, moduleRulesSchema, ruleEntrySchema } from "./schemas";

const CODE = "[^@#()%,;\\s]*";
const UNSIGNED_NUMBER = "\\d+(?:\\.\\d+)?";

const PLAIN_TOKEN = new RegExp(`^(${CODE})$`);
const PERCENT_TOKEN = new RegExp(`^(${CODE})@(.*)$`);
const LEVEL_TOKEN = new RegExp(`^(${CODE})#(.*)$`);
// free-text lists in older rule exports write thresholds as CODE(75%)
const LEGACY_PERCENT_TOKEN = new RegExp(`^(${CODE})\\s*\\((.*)\\)$`);
const PERCENT_VALUE = new RegExp(`^(${UNSIGNED_NUMBER})\\s*%$`);
const LEVEL_VALUE = /^\d+$/;

const clamp = (value: number, min: number, max: number) =>
  Math.min(max, Math.max(min, value));

const requireCode = (token: string, code: string): string => {
  if (!code) {
    throw new RuleTokenParseError(token, "missing unit code");
  }
  return code;
};

const parsePercent = (token: string, suffix: string): Threshold => {
  const match = PERCENT_VALUE.exec(suffix.trim());
  if (!match) {
    throw new RuleTokenParseError(
      token,
      `expected a percentage such as 70%, got "${suffix}"`
    );
  }
  const percent = Number(match[1]);
  if (percent < PERCENT_MIN || percent > PERCENT_MAX) {
    throw new RuleTokenParseError(
      token,
      `percentage ${match[1]} is outside [${PERCENT_MIN}, ${PERCENT_MAX}]`
    );
  }
  return { metric: "success_rate", value: clamp(percent / 100, 0, 1) };
};

const parseLevel = (token: string, suffix: string): Threshold => {
  const text = suffix.trim();
  if (!text) {
    throw new RuleTokenParseError(token, `expected a level such as #2, got "#${suffix}"`);
  }
  if (!LEVEL_VALUE.test(text)) {
    throw new RuleTokenParseError(token, `level ${text} must be a non-negative integer`);
  }
  return { metric: "level", value: Number(text) };
};

export const parseRequirement = (token: string): Requirement => {
  const text = token.trim();
  if (!text) {
    throw new RuleTokenParseError(token, "empty token");
  }

  const plain = PLAIN_TOKEN.exec(text);
  if (plain) {
    return { sourceCode: plain[1] };
  }

  const percent = PERCENT_TOKEN.exec(text);
  if (percent) {
    const sourceCode = requireCode(token, percent[1]);
    return { sourceCode, threshold: parsePercent(token, percent[2]) };
  }

  const level = LEVEL_TOKEN.exec(text);
  if (level) {
    const sourceCode = requireCode(token, level[1]);
    return { sourceCode, threshold: parseLevel(token, level[2]) };
  }

  const legacy = LEGACY_PERCENT_TOKEN.exec(text);
  if (legacy) {
    const sourceCode = requireCode(token, legacy[1]);
    return { sourceCode, threshold: parsePercent(token, legacy[2]) };
  }

  throw new RuleTokenParseError(token, "unrecognised threshold suffix");
};

const formatPercent = (value: number): string =>
  String(Number((value * 100).toFixed(4)));

export const formatRequirement = ({ sourceCode, threshold }: Requirement): string => {
  if (!threshold) {
    return sourceCode;
  }
  return threshold.metric === "success_rate"
    ? `${sourceCode}@${formatPercent(threshold.value)}%`
    : `${sourceCode}#${threshold.value}`;
};

const requirementKey = ({ sourceCode, threshold }: Requirement): string =>
  threshold ? `${sourceCode}|${threshold.metric}|${threshold.value}` : sourceCode;

export interface RequirementListResult {
  requirements: Requirement[];
  errors: RuleTokenParseError[];
}

export const parseRequirementList = (
  value: string | readonly string[]
): RequirementListResult => {
  const tokens =
    typeof value === "string"
      ? value.split(/[,;]/).filter((token) => token.trim().length > 0)
      : value;

  const requirements: Requirement[] = [];
  const errors: RuleTokenParseError[] = [];
  const seen = new Set<string>();

  for (const token of tokens) {
    try {
      const requirement = parseRequirement(token);
      const key = requirementKey(requirement);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      requirements.push(requirement);
    } catch (error) {
      if (!(error instanceof RuleTokenParseError)) {
        throw error;
      }
      errors.push(error);
    }
  }

  return { requirements, errors };
};

export interface RuleTokenIssue {
  direction: DependencyKind;
  error: RuleTokenParseError;
}

export interface RulePayloadResult {
  specs: RuleSpec[];
  issues: RuleTokenIssue[];
}

export const parseRulePayload = (targetCode: string, raw: unknown): RulePayloadResult => {
  const parsed = ruleEntrySchema.safeParse(raw);
  if (!parsed.success) {
    throw new RulePayloadError(targetCode, formatZodIssues(parsed.error));
  }
  const entry = parsed.data;
  const initiallyOpen = entry.initially_open ?? false;

  const specs: RuleSpec[] = [];
  const issues: RuleTokenIssue[] = [];
  const directions: Array<[DependencyKind, string | string[] | undefined]> = [
    ["activation", entry.activation_requirements],
    ["deactivation", entry.deactivation_requirements],
  ];

  for (const [direction, list] of directions) {
    const { requirements, errors } = parseRequirementList(list ?? []);
    errors.forEach((error) => issues.push({ direction, error }));
    specs.push({
      targetCode: targetCode.trim(),
      direction,
      requirements,
      initiallyOpen,
      kind: entry.kind,
      label: entry.label,
    });
  }

  return { specs, issues };
};

export interface ModuleRulesResult {
  ruleSpecs: RuleSpec[];
  diagnostics: Diagnostic[];
}

/**
 * Parses every target entry of a module payload. A malformed entry or token is
 * reported and skipped; the rest of the module is still parsed.
 */
export const parseModuleRules = (payload: unknown): ModuleRulesResult => {
  const ruleSpecs: RuleSpec[] = [];
  const diagnostics: Diagnostic[] = [];

  const parsed = moduleRulesSchema.safeParse(payload);
  if (!parsed.success) {
    diagnostics.push({
      kind: "MalformedRulePayload",
      targetCode: "",
      message: `Module rules must map target codes to rule entries: ${formatZodIssues(
        parsed.error
      ).join("; ")}`,
    });
    return { ruleSpecs, diagnostics };
  }

  Object.entries(parsed.data).forEach(([targetCode, raw]) => {
    if (!targetCode.trim()) {
      diagnostics.push({
        kind: "MalformedRulePayload",
        targetCode,
        message: "Rule entry has an empty target code",
      });
      return;
    }
    try {
      const { specs, issues } = parseRulePayload(targetCode, raw);
      ruleSpecs.push(...specs);
      issues.forEach(({ direction, error }) =>
        diagnostics.push({
          kind: "TokenParseError",
          token: error.token,
          targetCode,
          direction,
          message: `${targetCode}: ${error.message}`,
        })
      );
    } catch (error) {
      if (!(error instanceof RulePayloadError)) {
        throw error;
      }
      diagnostics.push({
        kind: "MalformedRulePayload",
        targetCode,
        message: error.message,
      });
    }
  });

  return { ruleSpecs, diagnostics };
};
