import {
  ACTIVITY_CODE_PATTERN,
  MODULE_CODE_PATTERN,
  OBJECTIVE_CODE_PATTERN,
} from "../constants";

export type CodeMapValue = string | string[];

export interface CodeMaps {
  codeToId: Record<string, CodeMapValue>;
  idToCodes?: Record<string, CodeMapValue>;
}

export interface CodeResolver {
  resolveCode(code: string): string[];
  codesFor(id: string): string[];
  preferredCode(id: string): string | undefined;
}

const toList = (value: CodeMapValue | undefined): string[] => {
  if (value === undefined) {
    return [];
  }
  const list = Array.isArray(value) ? value : [value];
  return list.map((item) => item.trim()).filter((item) => item.length > 0);
};

const addToIndex = (index: Map<string, Set<string>>, key: string, value: string) => {
  const set = index.get(key) ?? new Set<string>();
  set.add(value);
  index.set(key, set);
};

const codeShapeRank = (code: string): number => {
  if (ACTIVITY_CODE_PATTERN.test(code)) return 0;
  if (OBJECTIVE_CODE_PATTERN.test(code)) return 1;
  if (MODULE_CODE_PATTERN.test(code)) return 2;
  return 3;
};

const compareCodes = (a: string, b: string): number =>
  codeShapeRank(a) - codeShapeRank(b) ||
  b.length - a.length ||
  (a < b ? -1 : a > b ? 1 : 0);

const sortedStrings = (values: Iterable<string>): string[] =>
  Array.from(values).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

export const createCodeResolver = (maps: CodeMaps): CodeResolver => {
  const codeToIds = new Map<string, Set<string>>();
  const idToCodes = new Map<string, Set<string>>();

  Object.entries(maps.codeToId).forEach(([rawCode, ids]) => {
    const code = rawCode.trim();
    if (!code) {
      return;
    }
    toList(ids).forEach((id) => {
      addToIndex(codeToIds, code, id);
      addToIndex(idToCodes, id, code);
    });
  });

  Object.entries(maps.idToCodes ?? {}).forEach(([rawId, codes]) => {
    const id = rawId.trim();
    if (!id) {
      return;
    }
    toList(codes).forEach((code) => {
      addToIndex(idToCodes, id, code);
      addToIndex(codeToIds, code, id);
    });
  });

  const frozenCodeToIds = new Map<string, readonly string[]>();
  codeToIds.forEach((ids, code) => frozenCodeToIds.set(code, sortedStrings(ids)));
  const frozenIdToCodes = new Map<string, readonly string[]>();
  idToCodes.forEach((codes, id) =>
    frozenIdToCodes.set(id, Array.from(codes).sort(compareCodes))
  );

  return {
    resolveCode(code: string): string[] {
      const key = code.trim();
      const ids = frozenCodeToIds.get(key);
      if (ids) {
        return [...ids];
      }
      return frozenIdToCodes.has(key) ? [key] : [];
    },
    codesFor(id: string): string[] {
      return [...(frozenIdToCodes.get(id.trim()) ?? [])];
    },
    preferredCode(id: string): string | undefined {
      return frozenIdToCodes.get(id.trim())?.[0];
    },
  };
};

/** Resolver for rule sets whose codes are already the canonical ids. */
export const identityResolver = (codes: Iterable<string>): CodeResolver => {
  const codeToId: Record<string, string> = {};
  for (const code of codes) {
    codeToId[code] = code;
  }
  return createCodeResolver({ codeToId });
};
