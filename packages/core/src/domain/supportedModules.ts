import { UnsupportedModuleError } from "./errors";

const MODULE_NUMBER = /^M(\d+)$/;

const moduleOrder = (moduleId: string): number => {
  const match = MODULE_NUMBER.exec(moduleId);
  return match ? Number(match[1]) : Number.MAX_SAFE_INTEGER;
};

const cleanIds = (ids: Iterable<string>): Set<string> =>
  new Set(Array.from(ids, (id) => id.trim()).filter((id) => id.length > 0));

/**
 * Modules every metadata source covers. Observed module ids narrow the set
 * only when at least one was observed.
 */
export const supportedModules = (
  ruleModuleIds: Iterable<string>,
  catalogModuleIds: Iterable<string>,
  observedModuleIds?: Iterable<string>
): string[] => {
  const catalog = cleanIds(catalogModuleIds);
  const observed = observedModuleIds ? cleanIds(observedModuleIds) : undefined;

  return Array.from(cleanIds(ruleModuleIds))
    .filter((id) => catalog.has(id))
    .filter((id) => !observed || observed.size === 0 || observed.has(id))
    .sort((a, b) => moduleOrder(a) - moduleOrder(b) || (a < b ? -1 : a > b ? 1 : 0));
};

export const assertSupportedModule = (
  moduleId: string,
  supported: readonly string[]
): void => {
  if (!supported.includes(moduleId)) {
    throw new UnsupportedModuleError(moduleId, supported);
  }
};
