export * from "./schemas";
export { MetadataFormatError } from "./errors";
export {
  type ModuleRulePayload,
  modulePayloadFromRulesDocument,
  parseRulesDocument,
  resolverFromRulesDocument,
  ruleModuleCodes,
  topologySnapshotFromRulesDocument,
} from "./rulesDocument";
export { catalogModuleCodes, catalogUnitsForModule, parseLearningCatalog } from "./catalog";
export {
  type ActivityCsvResult,
  observedModuleCodes,
  parseActivityDailyCsv,
} from "./activityCsv";
export {
  type LoadModuleGraphOptions,
  loadModuleGraph,
  supportedModulesFromMetadata,
} from "./loadModuleGraph";
