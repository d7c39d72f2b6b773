export * from "./domain/models";
export * from "./domain/diagnostics";
export * from "./domain/errors";
export * from "./constants";
export {
  type CodeMaps,
  type CodeMapValue,
  type CodeResolver,
  createCodeResolver,
  identityResolver
} from "./domain/codeResolver";
export {
  type ModuleRulesResult,
  type RequirementListResult,
  type RulePayloadResult,
  type RuleTokenIssue,
  formatRequirement,
  parseModuleRules,
  parseRequirement,
  parseRequirementList,
  parseRulePayload
} from "./domain/ruleParser";
export {
  type BuildResult,
  type BuildRuleGraphInput,
  buildRuleGraph,
  classifyCode,
  compareThresholds
} from "./domain/graphBuilder";
export {
  type FocusNeighborhood,
  type TraversalResult,
  ancestors,
  descendants,
  detectCycles,
  filterByObjectives,
  focusNeighborhood,
  topologicalOrder
} from "./domain/graphQueries";
export { owningObjectiveId } from "./domain/ruleGraph";
export { assertSupportedModule, supportedModules } from "./domain/supportedModules";
export {
  topologySnapshotSchema,
  ruleEntrySchema,
  type RuleEntry
} from "./domain/schemas";
export { aggregateOverlayMetrics, mergeOverlays } from "./analytics/overlay";
export type {
  ActivityDailyRow,
  OverlayLookup,
  OverlayWindow
} from "./analytics/overlay";
