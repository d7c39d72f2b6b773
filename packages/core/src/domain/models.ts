export type UnitKind = "activity" | "objective";

export type DependencyKind = "activation" | "deactivation";

export type ThresholdMetric = "success_rate" | "level";

export interface Threshold {
  metric: ThresholdMetric;
  value: number; // success_rate in [0,1], level a non-negative integer
}

export interface OverlayMetrics {
  attempts: number;
  successRate: number | null;
  repeatAttemptRate: number | null;
}

export interface Unit {
  id: string;
  kind: UnitKind;
  moduleId: string;
  code?: string;
  label?: string;
  objectiveId?: string; // owning objective; an objective owns itself
  initiallyOpen: boolean;
  isGhost: boolean;
  overlay?: OverlayMetrics;
}

export interface Dependency {
  id: string;
  fromId: string;
  toId: string;
  kind: DependencyKind;
  threshold?: Threshold;
  sourceCode?: string;
  enrichment?: Record<string, number>;
  isInferred: boolean;
}

export interface Requirement {
  sourceCode: string;
  threshold?: Threshold;
  // annotations carried onto this requirement's edge only
  enrichment?: Record<string, number>;
}

export interface RuleSpec {
  targetCode: string;
  direction: DependencyKind;
  requirements: Requirement[];
  initiallyOpen: boolean;
  kind?: UnitKind;
  label?: string;
}

export interface RuleGraph {
  readonly moduleId: string;
  readonly nodes: ReadonlyMap<string, Unit>;
  readonly edges: readonly Dependency[];
}

export interface CatalogUnit {
  id: string;
  code?: string;
  kind: UnitKind;
  objectiveId?: string;
  label?: string;
}

export interface TopologySnapshot {
  nodes: Array<Omit<Unit, "moduleId" | "overlay"> & { moduleId?: string }>;
  edges: Array<Omit<Dependency, "isInferred"> & { isInferred?: boolean }>;
}

/** Per-code auxiliary annotations matched against edge source codes. */
export type EdgeEnrichment = Record<string, Record<string, number>>;

export type Strictness = "lenient" | "strict";
