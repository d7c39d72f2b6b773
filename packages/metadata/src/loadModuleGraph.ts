import {
  assertSupportedModule,
  buildRuleGraph,
  supportedModules,
  type BuildResult,
  type EdgeEnrichment,
  type Strictness,
} from "@unlock-graph/core";
import { catalogModuleCodes, catalogUnitsForModule } from "./catalog";
import {
  modulePayloadFromRulesDocument,
  resolverFromRulesDocument,
  ruleModuleCodes,
  topologySnapshotFromRulesDocument,
} from "./rulesDocument";
import type { LearningCatalog, RulesDocument } from "./schemas";

export const supportedModulesFromMetadata = (
  rules: RulesDocument,
  catalog: LearningCatalog,
  observedModuleCodes?: Iterable<string>
): string[] =>
  supportedModules(ruleModuleCodes(rules), catalogModuleCodes(catalog), observedModuleCodes);

export interface LoadModuleGraphOptions {
  rules: RulesDocument;
  catalog: LearningCatalog;
  moduleCode: string;
  observedModuleCodes?: Iterable<string>;
  enrichment?: EdgeEnrichment;
  strictness?: Strictness;
}

/**
 * Builds one module's graph from the metadata documents. A shipped topology
 * wins over the module's rules; modules missing from any source are refused.
 */
export const loadModuleGraph = (options: LoadModuleGraphOptions): BuildResult => {
  const { rules, catalog, moduleCode } = options;
  assertSupportedModule(
    moduleCode,
    supportedModulesFromMetadata(rules, catalog, options.observedModuleCodes)
  );

  const topologySnapshot = topologySnapshotFromRulesDocument(rules, moduleCode);
  if (topologySnapshot !== undefined) {
    return buildRuleGraph({
      moduleId: moduleCode,
      resolver: resolverFromRulesDocument(rules, moduleCode),
      topologySnapshot,
      enrichment: options.enrichment,
      strictness: options.strictness,
    });
  }

  const payload = modulePayloadFromRulesDocument(rules, moduleCode);
  return buildRuleGraph({
    moduleId: moduleCode,
    resolver: payload.resolver,
    ruleSpecs: payload.ruleSpecs,
    catalog: catalogUnitsForModule(catalog, moduleCode, payload.resolver),
    enrichment: options.enrichment,
    strictness: options.strictness,
  });
};
