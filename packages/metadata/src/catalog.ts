import type { CatalogUnit, CodeResolver } from "@unlock-graph/core";
import { MetadataFormatError } from "./errors";
import { learningCatalogSchema, type CatalogTitle, type LearningCatalog } from "./schemas";

export const parseLearningCatalog = (json: unknown): LearningCatalog => {
  const parsed = learningCatalogSchema.safeParse(json);
  if (!parsed.success) {
    throw new MetadataFormatError(
      "learning catalog",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return parsed.data;
};

const titleOf = (title: CatalogTitle | undefined): string | undefined =>
  title?.short?.trim() || title?.long?.trim() || undefined;

export const catalogModuleCodes = (catalog: LearningCatalog): string[] =>
  catalog.modules.map((entry) => entry.code.trim()).filter(Boolean);

/**
 * Objectives and activities of one module as real graph units. Entries without
 * an id take the resolver's id for their code, or the code itself.
 */
export const catalogUnitsForModule = (
  catalog: LearningCatalog,
  moduleCode: string,
  resolver?: CodeResolver
): CatalogUnit[] => {
  const moduleEntry = catalog.modules.find((entry) => entry.code.trim() === moduleCode.trim());
  if (!moduleEntry) {
    return [];
  }
  const idFor = (id: string | undefined, code: string) =>
    id?.trim() || resolver?.resolveCode(code)[0] || code;

  const units: CatalogUnit[] = [];
  moduleEntry.objectives.forEach((objective) => {
    const objectiveCode = objective.code.trim();
    if (!objectiveCode) return;
    const objectiveId = idFor(objective.id, objectiveCode);
    units.push({
      id: objectiveId,
      code: objectiveCode,
      kind: "objective",
      label: titleOf(objective.title),
    });
    objective.activities.forEach((activity) => {
      const activityCode = activity.code.trim();
      if (!activityCode) return;
      units.push({
        id: idFor(activity.id, activityCode),
        code: activityCode,
        kind: "activity",
        objectiveId,
        label: titleOf(activity.title),
      });
    });
  });
  return units;
};
