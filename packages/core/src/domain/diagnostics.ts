import type { DependencyKind, Threshold } from "./models";

export interface TokenParseDiagnostic {
  kind: "TokenParseError";
  token: string;
  targetCode: string;
  direction: DependencyKind;
  message: string;
}

export interface MalformedRulePayloadDiagnostic {
  kind: "MalformedRulePayload";
  targetCode: string;
  message: string;
}

export interface AmbiguousCodeDiagnostic {
  kind: "AmbiguousCodeResolution";
  code: string;
  candidates: string[];
  chosenId: string;
  message: string;
}

export interface UnresolvedReferenceDiagnostic {
  kind: "UnresolvedReference";
  code: string;
  message: string;
}

export interface CycleWarning {
  kind: "GraphIntegrityWarning";
  reason: "cycle";
  path: string[];
  message: string;
}

export interface ConflictingThresholdWarning {
  kind: "GraphIntegrityWarning";
  reason: "conflicting-threshold";
  fromId: string;
  toId: string;
  edgeKind: DependencyKind;
  kept?: Threshold;
  dropped?: Threshold;
  message: string;
}

export type GraphIntegrityWarning = CycleWarning | ConflictingThresholdWarning;

export interface SelfLoopDiagnostic {
  kind: "SelfLoopRejected";
  unitId: string;
  targetCode: string;
  message: string;
}

export interface UnusedEnrichmentDiagnostic {
  kind: "UnusedEnrichment";
  code: string;
  message: string;
}

export interface UnknownUnitDiagnostic {
  kind: "UnknownUnit";
  unitId: string;
  message: string;
}

export type Diagnostic =
  | TokenParseDiagnostic
  | MalformedRulePayloadDiagnostic
  | AmbiguousCodeDiagnostic
  | UnresolvedReferenceDiagnostic
  | GraphIntegrityWarning
  | SelfLoopDiagnostic
  | UnusedEnrichmentDiagnostic
  | UnknownUnitDiagnostic;

export type DiagnosticKind = Diagnostic["kind"];

export const diagnosticsOfKind = <K extends DiagnosticKind>(
  diagnostics: readonly Diagnostic[],
  kind: K
): Array<Extract<Diagnostic, { kind: K }>> =>
  diagnostics.filter(
    (diagnostic): diagnostic is Extract<Diagnostic, { kind: K }> =>
      diagnostic.kind === kind
  );

export const cycleWarning = (path: string[]): CycleWarning => ({
  kind: "GraphIntegrityWarning",
  reason: "cycle",
  path,
  message: `Activation cycle detected: ${path.join(" -> ")}`,
});
