import { readFileSync } from 'node:fs';
import chalk from 'chalk';
import {
  aggregateOverlayMetrics,
  descendants,
  focusNeighborhood,
  mergeOverlays,
  topologicalOrder,
  type Diagnostic,
  type RuleGraph,
} from '@unlock-graph/core';
import {
  loadModuleGraph,
  observedModuleCodes,
  parseActivityDailyCsv,
  parseLearningCatalog,
  parseRulesDocument,
  resolverFromRulesDocument,
  supportedModulesFromMetadata,
} from '@unlock-graph/metadata';
import { Env } from './config/env';

const readJson = (path: string): unknown => JSON.parse(readFileSync(path, 'utf8'));

const printDiagnostics = (title: string, diagnostics: Diagnostic[]) => {
  if (!diagnostics.length) return;
  console.log(chalk.yellow(`\n${title} (${diagnostics.length})`));
  diagnostics.forEach((diagnostic) => console.log(chalk.yellow(`  [${diagnostic.kind}] ${diagnostic.message}`)));
};

const describeUnit = (graph: RuleGraph, id: string) => {
  const unit = graph.nodes.get(id);
  if (!unit) return id;
  const name = unit.code ?? id;
  const label = unit.label ? ` "${unit.label}"` : '';
  const ghost = unit.isGhost ? chalk.red(' (ghost)') : '';
  const overlay = unit.overlay
    ? chalk.gray(
        ` attempts=${unit.overlay.attempts} success=${unit.overlay.successRate?.toFixed(2) ?? '-'}`
      )
    : '';
  return `${name}${label}${ghost}${overlay}`;
};

(async () => {
  const rules = parseRulesDocument(readJson(Env.rulesPath));
  const catalog = parseLearningCatalog(readJson(Env.catalogPath));
  const activity = parseActivityDailyCsv(readFileSync(Env.activityCsvPath, 'utf8'));
  activity.issues.forEach((issue) => console.log(chalk.yellow(`activity CSV ${issue}`)));

  const observed = observedModuleCodes(activity.rows);
  console.log(chalk.bold(`\n[BOOT] unlock-graph demo node=${process.version}`));
  console.log(chalk.cyan(`supported modules: ${supportedModulesFromMetadata(rules, catalog, observed).join(', ')}`));
  console.log(chalk.cyan(`module=${Env.moduleCode} focus=${Env.focusCode} strict=${Env.strict}`));

  const { graph, diagnostics } = loadModuleGraph({
    rules,
    catalog,
    moduleCode: Env.moduleCode,
    observedModuleCodes: observed,
    strictness: Env.strict ? 'strict' : 'lenient',
  });
  console.log(`\nUnits: ${graph.nodes.size}, dependencies: ${graph.edges.length}`);
  printDiagnostics('Build diagnostics', diagnostics);

  const dates = activity.rows.map((row) => row.date).sort();
  const withOverlay =
    dates.length > 0
      ? mergeOverlays(
          graph,
          aggregateOverlayMetrics(activity.rows, {
            moduleId: Env.moduleCode,
            start: dates[0],
            end: dates[dates.length - 1],
          })
        )
      : graph;

  console.log(chalk.bold('\nUnlock order'));
  topologicalOrder(withOverlay).forEach((id, index) =>
    console.log(`  ${index + 1}. ${describeUnit(withOverlay, id)}`)
  );

  const resolver = resolverFromRulesDocument(rules, Env.moduleCode);
  const focusId = resolver.resolveCode(Env.focusCode)[0] ?? Env.focusCode;
  const focus = focusNeighborhood(withOverlay, focusId);
  console.log(chalk.bold(`\nFocus ${describeUnit(withOverlay, focusId)}`));
  focus.nodeIds.forEach((id) => {
    if (id !== focusId) console.log(`  - ${describeUnit(withOverlay, id)}`);
  });
  focus.inferredEdges.forEach((edge) =>
    console.log(chalk.gray(`  bridge ${edge.fromId} -> ${edge.toId}`))
  );
  console.log(`  unlocks: ${Array.from(descendants(withOverlay, focusId).ids).join(', ') || 'nothing'}`);
  printDiagnostics('Focus diagnostics', focus.diagnostics);

  console.log('\nDone');
})().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? `${error.name}: ${error.message}` : String(error)));
  process.exitCode = 1;
});
