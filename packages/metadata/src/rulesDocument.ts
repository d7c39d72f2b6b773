import {
  createCodeResolver,
  formatRequirement,
  type CodeMapValue,
  type CodeResolver,
  type DependencyKind,
  type Requirement,
  type RuleSpec,
  type Threshold,
  type TopologySnapshot,
  type UnitKind,
} from "@unlock-graph/core";
import { z } from "zod";
import { MetadataFormatError } from "./errors";
import {
  rulesDocumentSchema,
  topologyRowsSchema,
  type ModuleRule,
  type RulesDocument,
} from "./schemas";

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);

export const parseRulesDocument = (json: unknown): RulesDocument => {
  const parsed = rulesDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new MetadataFormatError("rules document", formatIssues(parsed.error));
  }
  return parsed.data;
};

const findModuleRule = (doc: RulesDocument, moduleCode: string): ModuleRule | undefined =>
  doc.module_rules.find((row) => row.module_code.trim() === moduleCode.trim());

const invertCodeMap = (codeToId: Record<string, CodeMapValue>): Record<string, string[]> => {
  const idToCodes: Record<string, string[]> = {};
  Object.entries(codeToId).forEach(([code, ids]) => {
    (Array.isArray(ids) ? ids : [ids]).forEach((id) => {
      (idToCodes[id] ??= []).push(code);
    });
  });
  return idToCodes;
};

/** Global code maps, completed by the module's own map when a module is given. */
export const resolverFromRulesDocument = (
  doc: RulesDocument,
  moduleCode?: string
): CodeResolver => {
  const local = moduleCode ? findModuleRule(doc, moduleCode)?.map_id_code : undefined;
  const codeToId: Record<string, string[]> = {};
  const merge = (map: Record<string, CodeMapValue> | undefined) => {
    Object.entries(map ?? {}).forEach(([code, ids]) => {
      const list = (codeToId[code] ??= []);
      (Array.isArray(ids) ? ids : [ids]).forEach((id) => {
        if (!list.includes(id)) list.push(id);
      });
    });
  };
  merge(doc.map_id_code.code_to_id);
  merge(local);
  return createCodeResolver({
    codeToId,
    idToCodes: { ...doc.map_id_code.id_to_codes, ...(local ? invertCodeMap(local) : {}) },
  });
};

// init_ssb marks a unit open when any value inside it is 0
const isInitiallyOpen = (value: unknown): boolean => {
  if (Array.isArray(value)) {
    return value.some(isInitiallyOpen);
  }
  if (value !== null && typeof value === "object") {
    return Object.values(value).some(isInitiallyOpen);
  }
  if (typeof value === "number") {
    return Math.trunc(value) === 0;
  }
  return typeof value === "string" && value.trim() === "0";
};

const firstNumber = (value: unknown): number | undefined => {
  if (Array.isArray(value)) {
    for (const item of value) {
      const found = firstNumber(item);
      if (found !== undefined) return found;
    }
    return undefined;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

const conditionThreshold = (sr: number | undefined, lvl: number | undefined): Threshold | undefined => {
  if (sr !== undefined) return { metric: "success_rate", value: sr };
  if (lvl !== undefined) return { metric: "level", value: Math.round(lvl) };
  return undefined;
};

const readCondition = (condition: unknown): { sr?: number; lvl?: number } => {
  if (condition === null || typeof condition !== "object") {
    return {};
  }
  const record: Record<string, unknown> = { ...condition };
  return { sr: firstNumber(record.sr), lvl: firstNumber(record.lvl) };
};

export interface ModuleRulePayload {
  ruleSpecs: RuleSpec[];
  resolver: CodeResolver;
}

interface TargetRules {
  kind?: UnitKind;
  initiallyOpen: boolean;
  activation: Requirement[];
  deactivation: Requirement[];
}

const conditionEnrichment = (condition: {
  sr?: number;
  lvl?: number;
}): Record<string, number> | undefined => {
  const annotations: Record<string, number> = {};
  if (condition.lvl !== undefined) annotations.enrich_lvl = Math.round(condition.lvl);
  if (condition.sr !== undefined) annotations.enrich_sr = condition.sr;
  return Object.keys(annotations).length ? annotations : undefined;
};

/**
 * Rewrites a module's id-keyed requirement maps as rule specs keyed by code.
 * Each requirement keeps the sr/lvl annotations of its own condition. Ids
 * without a known code are kept verbatim so the graph shows them as ghosts.
 */
export const modulePayloadFromRulesDocument = (
  doc: RulesDocument,
  moduleCode: string
): ModuleRulePayload => {
  const moduleRule = findModuleRule(doc, moduleCode);
  if (!moduleRule) {
    throw new MetadataFormatError("rules document", [
      `module "${moduleCode}" not found in module_rules`,
    ]);
  }
  const resolver = resolverFromRulesDocument(doc, moduleCode);
  const codeForId = (id: string): string => resolver.preferredCode(id) ?? id.trim();

  const targets = new Map<string, TargetRules>();
  const targetFor = (code: string): TargetRules => {
    const existing = targets.get(code);
    if (existing) return existing;
    const created: TargetRules = { initiallyOpen: false, activation: [], deactivation: [] };
    targets.set(code, created);
    return created;
  };
  const push = (
    direction: DependencyKind,
    targetCode: string,
    sourceCode: string,
    condition: { sr?: number; lvl?: number }
  ) => {
    if (!sourceCode) return;
    const requirements = targetFor(targetCode)[direction];
    const requirement: Requirement = {
      sourceCode,
      threshold: conditionThreshold(condition.sr, condition.lvl),
    };
    const token = formatRequirement(requirement);
    if (requirements.some((listed) => formatRequirement(listed) === token)) return;
    const enrichment = conditionEnrichment(condition);
    requirements.push(enrichment ? { ...requirement, enrichment } : requirement);
  };

  moduleRule.node_rules.forEach((node) => {
    const code = node.code?.trim() || (node.id ? resolver.preferredCode(node.id) : undefined);
    if (!code) return;

    const target = targetFor(code);
    if (node.type === "activity" || node.type === "objective") target.kind = node.type;
    const nodeRules = node.rules;
    if (!nodeRules) return;
    if (isInitiallyOpen(nodeRules.init_ssb)) target.initiallyOpen = true;

    const requirementMap = nodeRules.requirements?.[0] ?? {};
    Object.entries(requirementMap).forEach(([targetId, sources]) => {
      if (sources === null || typeof sources !== "object" || Array.isArray(sources)) return;
      const targetCode = resolver.preferredCode(targetId) ?? code;
      Object.entries(sources).forEach(([sourceId, condition]) => {
        push("activation", targetCode, codeForId(sourceId), readCondition(condition));
      });
    });

    const deactivationMap = nodeRules.deact_requirements?.[0] ?? {};
    Object.entries(deactivationMap).forEach(([targetId, conditions]) => {
      const targetCode = resolver.preferredCode(targetId) ?? code;
      (Array.isArray(conditions) ? conditions : [conditions]).forEach((condition) => {
        push("deactivation", targetCode, codeForId(condition.dim), readCondition(condition));
      });
    });
  });

  const ruleSpecs: RuleSpec[] = [];
  targets.forEach((target, targetCode) => {
    const directions: DependencyKind[] = ["activation", "deactivation"];
    directions.forEach((direction) =>
      ruleSpecs.push({
        targetCode,
        direction,
        requirements: target[direction],
        initiallyOpen: target.initiallyOpen,
        ...(target.kind ? { kind: target.kind } : {}),
      })
    );
  });
  return { ruleSpecs, resolver };
};

const hasRows = (value: unknown): boolean => {
  if (value === null || typeof value !== "object") return false;
  const record: Record<string, unknown> = { ...value };
  const nodes = Array.isArray(record.nodes) ? record.nodes : [];
  const edges = Array.isArray(record.edges) ? record.edges : [];
  return nodes.length > 0 || edges.length > 0;
};

/**
 * The module's shipped topology, if any. Accepts the engine's own node/edge
 * shape or the exported table rows keyed by node code.
 */
export const topologySnapshotFromRulesDocument = (
  doc: RulesDocument,
  moduleCode: string
): unknown => {
  const entry = doc.dependency_topology?.[moduleCode];
  if (!hasRows(entry)) {
    return undefined;
  }
  const rows = topologyRowsSchema.safeParse(entry);
  return rows.success ? snapshotFromRows(rows.data) : entry;
};

const snapshotFromRows = (rows: z.infer<typeof topologyRowsSchema>): TopologySnapshot => {
  const idForCode = new Map<string, string>();
  rows.nodes.forEach((row) => idForCode.set(row.node_code, row.node_id || row.node_code));
  const toId = (code: string) => idForCode.get(code) ?? code;

  return {
    nodes: rows.nodes.map((row) => ({
      id: toId(row.node_code),
      kind: row.node_type,
      code: row.node_code,
      label: row.label ?? undefined,
      objectiveId: row.objective_code ? toId(row.objective_code) : undefined,
      initiallyOpen: row.init_open ?? false,
      isGhost: row.is_ghost ?? false,
    })),
    edges: rows.edges.map((row) => {
      const threshold: Threshold | undefined =
        row.threshold_type === "success_rate" && typeof row.threshold_value === "number"
          ? { metric: "success_rate", value: row.threshold_value }
          : row.threshold_type === "level" && typeof row.threshold_value === "number"
            ? { metric: "level", value: row.threshold_value }
            : undefined;
      const enrichment: Record<string, number> = {};
      if (typeof row.enrich_lvl === "number") enrichment.enrich_lvl = row.enrich_lvl;
      if (typeof row.enrich_sr === "number") enrichment.enrich_sr = row.enrich_sr;
      return {
        id: row.edge_id,
        fromId: toId(row.from_node_code),
        toId: toId(row.to_node_code),
        kind: row.edge_type,
        threshold,
        sourceCode: row.from_node_code,
        enrichment: Object.keys(enrichment).length ? enrichment : undefined,
      };
    }),
  };
};

/** Module codes with rules, restricted to `links_to_catalog.rule_module_ids` when listed. */
export const ruleModuleCodes = (doc: RulesDocument): string[] => {
  const codes = doc.module_rules.map((row) => row.module_code.trim()).filter(Boolean);
  const allowed = new Set(
    (doc.links_to_catalog?.rule_module_ids ?? []).map((id) => id.trim()).filter(Boolean)
  );
  if (allowed.size === 0) {
    return codes;
  }
  const resolver = resolverFromRulesDocument(doc);
  return codes.filter(
    (code) => allowed.has(code) || resolver.resolveCode(code).some((id) => allowed.has(id))
  );
};
