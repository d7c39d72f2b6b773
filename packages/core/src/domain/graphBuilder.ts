import {
  ACTIVITY_CODE_PATTERN,
  DEFAULT_BUILD_OPTIONS,
  OBJECTIVE_CODE_PATTERN,
  THRESHOLD_EPSILON,
} from "../constants";
import type { CodeResolver } from "./codeResolver";
import { cycleWarning, type Diagnostic } from "./diagnostics";
import { GraphBuildError } from "./errors";
import { detectCycles } from "./graphQueries";
import type {
  CatalogUnit,
  Dependency,
  DependencyKind,
  EdgeEnrichment,
  RuleGraph,
  RuleSpec,
  Strictness,
  Threshold,
  Unit,
  UnitKind,
} from "./models";
import { parseModuleRules } from "./ruleParser";
import { freezeGraph } from "./ruleGraph";
import {
  formatZodIssues,
  topologySnapshotSchema,
  type ParsedTopologySnapshot,
} from "./schemas";

export interface BuildRuleGraphInput {
  moduleId: string;
  resolver: CodeResolver;
  /** Raw module payload: target code -> rule entry. */
  rules?: unknown;
  ruleSpecs?: RuleSpec[];
  catalog?: CatalogUnit[];
  /** Pre-resolved nodes and edges; authoritative when valid. */
  topologySnapshot?: unknown;
  enrichment?: EdgeEnrichment;
  strictness?: Strictness;
}

export interface BuildResult {
  graph: RuleGraph;
  diagnostics: Diagnostic[];
}

interface CodeShape {
  kind?: UnitKind;
  objectiveCode?: string;
}

export const classifyCode = (code: string): CodeShape => {
  const activity = ACTIVITY_CODE_PATTERN.exec(code);
  if (activity) {
    return { kind: "activity", objectiveCode: activity[1] };
  }
  if (OBJECTIVE_CODE_PATTERN.test(code)) {
    return { kind: "objective", objectiveCode: code };
  }
  return {};
};

/** Returns -1, 0 or 1 as `a` is a weaker, equal or stricter bar than `b`; null when incomparable. */
export const compareThresholds = (
  a: Threshold | undefined,
  b: Threshold | undefined
): number | null => {
  if (!a && !b) return 0;
  if (!a) return -1;
  if (!b) return 1;
  if (a.metric !== b.metric) return null;
  const delta = a.value - b.value;
  if (Math.abs(delta) < THRESHOLD_EPSILON) return 0;
  return delta > 0 ? 1 : -1;
};

const describeThreshold = (threshold: Threshold | undefined): string => {
  if (!threshold) return "none";
  return threshold.metric === "success_rate"
    ? `success_rate ${threshold.value}`
    : `level ${threshold.value}`;
};

interface PendingEdge {
  fromId: string;
  toId: string;
  kind: DependencyKind;
  threshold?: Threshold;
  sourceCode?: string;
  id?: string;
  enrichment?: Record<string, number>;
}

/** Deduplicates edges by (from, to, kind), keeping the stricter threshold. */
class EdgeCollector {
  private readonly edges = new Map<string, PendingEdge>();

  constructor(private readonly diagnostics: Diagnostic[]) {}

  add(edge: PendingEdge, origin: string): void {
    if (edge.fromId === edge.toId) {
      this.diagnostics.push({
        kind: "SelfLoopRejected",
        unitId: edge.fromId,
        targetCode: origin,
        message: `Dropped ${edge.kind} edge from "${edge.fromId}" to itself (${origin})`,
      });
      return;
    }

    const key = `${edge.fromId}\u0000${edge.toId}\u0000${edge.kind}`;
    const existing = this.edges.get(key);
    if (!existing) {
      this.edges.set(key, edge);
      return;
    }

    const order = compareThresholds(edge.threshold, existing.threshold);
    if (order === 0) {
      return;
    }
    const keepIncoming = order === 1;
    const kept = keepIncoming ? edge.threshold : existing.threshold;
    const dropped = keepIncoming ? existing.threshold : edge.threshold;
    if (keepIncoming) {
      this.edges.set(key, {
        ...existing,
        threshold: edge.threshold,
        sourceCode: edge.sourceCode,
        enrichment: edge.enrichment,
      });
    }
    this.diagnostics.push({
      kind: "GraphIntegrityWarning",
      reason: "conflicting-threshold",
      fromId: edge.fromId,
      toId: edge.toId,
      edgeKind: edge.kind,
      kept,
      dropped,
      message: `Duplicate ${edge.kind} edge ${edge.fromId} -> ${edge.toId}: kept ${describeThreshold(
        kept
      )}, dropped ${describeThreshold(dropped)}${order === null ? " (incomparable metrics)" : ""}`,
    });
  }

  values(): PendingEdge[] {
    return Array.from(this.edges.values());
  }
}

interface Resolution {
  id: string;
  resolved: boolean;
}

const applyEnrichment = (
  nodes: Map<string, Unit>,
  edges: PendingEdge[],
  enrichment: EdgeEnrichment | undefined,
  diagnostics: Diagnostic[]
): PendingEdge[] => {
  if (!enrichment) {
    return edges;
  }
  const used = new Set<string>();
  const enriched = edges.map((edge) => {
    const code = edge.sourceCode ?? nodes.get(edge.fromId)?.code;
    const annotations = code === undefined ? undefined : enrichment[code];
    if (code === undefined || !annotations) {
      return edge;
    }
    used.add(code);
    return { ...edge, enrichment: { ...annotations, ...edge.enrichment } };
  });
  Object.keys(enrichment)
    .filter((code) => !used.has(code))
    .sort()
    .forEach((code) =>
      diagnostics.push({
        kind: "UnusedEnrichment",
        code,
        message: `Enrichment for "${code}" matched no edge source`,
      })
    );
  return enriched;
};

const finalize = (
  moduleId: string,
  nodes: Map<string, Unit>,
  pending: PendingEdge[],
  enrichment: EdgeEnrichment | undefined,
  diagnostics: Diagnostic[]
): BuildResult => {
  const edges: Dependency[] = applyEnrichment(nodes, pending, enrichment, diagnostics).map(
    (edge, index) => ({
      id: edge.id ?? `${moduleId}:${edge.kind}:${edge.fromId}->${edge.toId}:${index + 1}`,
      fromId: edge.fromId,
      toId: edge.toId,
      kind: edge.kind,
      ...(edge.threshold ? { threshold: { ...edge.threshold } } : {}),
      ...(edge.sourceCode !== undefined ? { sourceCode: edge.sourceCode } : {}),
      ...(edge.enrichment ? { enrichment: edge.enrichment } : {}),
      isInferred: false,
    })
  );

  const graph = freezeGraph(moduleId, nodes, edges);
  detectCycles(graph).forEach((path) => diagnostics.push(cycleWarning(path)));
  return { graph, diagnostics };
};

const buildFromSnapshot = (
  input: BuildRuleGraphInput,
  snapshot: ParsedTopologySnapshot,
  strictness: Strictness,
  diagnostics: Diagnostic[]
): BuildResult => {
  const { moduleId } = input;
  const nodes = new Map<string, Unit>();
  snapshot.nodes.forEach((node) => {
    if (nodes.has(node.id)) {
      return;
    }
    nodes.set(node.id, {
      id: node.id,
      kind: node.kind,
      moduleId,
      code: node.code,
      label: node.label,
      objectiveId: node.kind === "objective" ? node.id : node.objectiveId,
      initiallyOpen: node.initiallyOpen,
      isGhost: node.isGhost,
    });
  });

  const collector = new EdgeCollector(diagnostics);
  const missing = new Set<string>();
  snapshot.edges.forEach((edge) => {
    if (edge.fromId !== edge.toId) {
      [edge.fromId, edge.toId].forEach((id) => {
        if (!nodes.has(id)) missing.add(id);
      });
    }
    collector.add(
      {
        id: edge.id,
        fromId: edge.fromId,
        toId: edge.toId,
        kind: edge.kind,
        threshold: edge.threshold,
        sourceCode: edge.sourceCode,
        enrichment: edge.enrichment,
      },
      edge.id
    );
  });

  Array.from(missing)
    .sort()
    .forEach((id) => {
      const shape = classifyCode(id);
      diagnostics.push({
        kind: "UnresolvedReference",
        code: id,
        message: `Topology edge references unknown unit "${id}"; created a ghost node`,
      });
      if (strictness === "strict") {
        throw new GraphBuildError(moduleId, diagnostics);
      }
      nodes.set(id, {
        id,
        kind: shape.kind ?? "activity",
        moduleId,
        code: id,
        objectiveId:
          shape.kind === "objective"
            ? id
            : shape.objectiveCode &&
              (input.resolver.resolveCode(shape.objectiveCode)[0] ?? shape.objectiveCode),
        initiallyOpen: false,
        isGhost: true,
      });
    });

  return finalize(moduleId, nodes, collector.values(), input.enrichment, diagnostics);
};

export const buildRuleGraph = (input: BuildRuleGraphInput): BuildResult => {
  const { moduleId, resolver } = input;
  const strictness = input.strictness ?? DEFAULT_BUILD_OPTIONS.strictness;
  const diagnostics: Diagnostic[] = [];

  const abort = (): never => {
    throw new GraphBuildError(moduleId, diagnostics);
  };

  if (input.topologySnapshot !== undefined) {
    const parsed = topologySnapshotSchema.safeParse(input.topologySnapshot);
    if (parsed.success) {
      return buildFromSnapshot(input, parsed.data, strictness, diagnostics);
    }
    diagnostics.push({
      kind: "MalformedRulePayload",
      targetCode: "",
      message: `Ignored invalid topology snapshot: ${formatZodIssues(parsed.error).join("; ")}`,
    });
    if (strictness === "strict") abort();
  }

  const ruleSpecs = [...(input.ruleSpecs ?? [])];
  if (input.rules !== undefined) {
    const parsed = parseModuleRules(input.rules);
    ruleSpecs.push(...parsed.ruleSpecs);
    diagnostics.push(...parsed.diagnostics);
    if (strictness === "strict" && parsed.diagnostics.length > 0) abort();
  }

  const catalog = input.catalog ?? [];
  const catalogById = new Map<string, CatalogUnit>();
  const catalogByCode = new Map<string, CatalogUnit>();
  catalog.forEach((unit) => {
    catalogById.set(unit.id, unit);
    if (unit.code) catalogByCode.set(unit.code, unit);
  });

  const lookup = (code: string): string[] => {
    const candidates = resolver.resolveCode(code);
    if (candidates.length > 0) return candidates;
    const fromCatalog = catalogByCode.get(code) ?? catalogById.get(code);
    return fromCatalog ? [fromCatalog.id] : [];
  };

  const resolutions = new Map<string, Resolution>();
  const resolve = (code: string): Resolution => {
    const cached = resolutions.get(code);
    if (cached) return cached;

    const candidates = lookup(code);
    let resolution: Resolution;
    if (candidates.length === 0) {
      resolution = { id: code, resolved: false };
      diagnostics.push({
        kind: "UnresolvedReference",
        code,
        message: `Code "${code}" does not resolve to any known unit; created a ghost node`,
      });
    } else {
      resolution = { id: candidates[0], resolved: true };
      if (candidates.length > 1) {
        diagnostics.push({
          kind: "AmbiguousCodeResolution",
          code,
          candidates,
          chosenId: candidates[0],
          message: `Code "${code}" matches ${candidates.length} ids (${candidates.join(
            ", "
          )}); using "${candidates[0]}"`,
        });
      }
    }
    resolutions.set(code, resolution);
    if (!resolution.resolved && strictness === "strict") abort();
    return resolution;
  };

  // parent objective lookups must not surface diagnostics of their own
  const objectiveIdForCode = (objectiveCode: string | undefined): string | undefined => {
    if (!objectiveCode) return undefined;
    return lookup(objectiveCode)[0] ?? objectiveCode;
  };

  const nodes = new Map<string, Unit>();
  const ghostHints = new Map<string, { kind?: UnitKind; label?: string }>();
  const openTargets = new Set<string>();

  catalog.forEach((unit) => {
    if (nodes.has(unit.id)) return;
    const code = unit.code ?? resolver.preferredCode(unit.id);
    nodes.set(unit.id, {
      id: unit.id,
      kind: unit.kind,
      moduleId,
      code,
      label: unit.label,
      objectiveId:
        unit.kind === "objective"
          ? unit.id
          : unit.objectiveId ?? objectiveIdForCode(code && classifyCode(code).objectiveCode),
      initiallyOpen: false,
      isGhost: false,
    });
  });

  const registerNode = (
    code: string,
    resolution: Resolution,
    hint: { kind?: UnitKind; label?: string } = {}
  ) => {
    if (!resolution.resolved) {
      const previous = ghostHints.get(resolution.id) ?? {};
      ghostHints.set(resolution.id, {
        kind: previous.kind ?? hint.kind,
        label: previous.label ?? hint.label,
      });
      return;
    }
    const existing = nodes.get(resolution.id);
    if (existing) {
      if (!existing.label && hint.label) existing.label = hint.label;
      return;
    }
    const displayCode = resolver.preferredCode(resolution.id) ?? code;
    const shape = classifyCode(displayCode);
    const kind = hint.kind ?? shape.kind ?? "activity";
    nodes.set(resolution.id, {
      id: resolution.id,
      kind,
      moduleId,
      code: displayCode,
      label: hint.label,
      objectiveId:
        kind === "objective" ? resolution.id : objectiveIdForCode(shape.objectiveCode),
      initiallyOpen: false,
      isGhost: false,
    });
  };

  const collector = new EdgeCollector(diagnostics);
  ruleSpecs.forEach((spec) => {
    const target = resolve(spec.targetCode);
    registerNode(spec.targetCode, target, { kind: spec.kind, label: spec.label });
    if (spec.initiallyOpen) openTargets.add(target.id);

    spec.requirements.forEach((requirement) => {
      const source = resolve(requirement.sourceCode);
      registerNode(requirement.sourceCode, source);
      collector.add(
        {
          fromId: source.id,
          toId: target.id,
          kind: spec.direction,
          threshold: requirement.threshold,
          sourceCode: requirement.sourceCode,
          enrichment: requirement.enrichment,
        },
        spec.targetCode
      );
    });
  });

  ghostHints.forEach((hint, id) => {
    if (nodes.has(id)) return;
    const shape = classifyCode(id);
    const kind = hint.kind ?? shape.kind ?? "activity";
    nodes.set(id, {
      id,
      kind,
      moduleId,
      code: id,
      label: hint.label,
      objectiveId: kind === "objective" ? id : objectiveIdForCode(shape.objectiveCode),
      initiallyOpen: false,
      isGhost: true,
    });
  });

  const pending = collector.values();
  const activationTargets = new Set(
    pending.filter((edge) => edge.kind === "activation").map((edge) => edge.toId)
  );
  nodes.forEach((node) => {
    if (node.isGhost) return;
    node.initiallyOpen = openTargets.has(node.id) || !activationTargets.has(node.id);
  });

  return finalize(moduleId, nodes, pending, input.enrichment, diagnostics);
};
