import { endOfDay, isValid, isWithinInterval, parseISO, startOfDay } from "date-fns";
import type { OverlayMetrics, RuleGraph, Unit } from "../domain/models";
import { freezeGraph } from "../domain/ruleGraph";

export interface ActivityDailyRow {
  date: string; // yyyy-MM-dd
  moduleId: string;
  objectiveId: string;
  activityId: string;
  attempts: number;
  successRate: number | null;
  repeatAttemptRate: number | null;
}

export interface OverlayWindow {
  moduleId: string;
  start: Date | string;
  end: Date | string;
}

export type OverlayLookup =
  | ReadonlyMap<string, OverlayMetrics>
  | Readonly<Record<string, OverlayMetrics>>;

const isMap = (
  lookup: OverlayLookup
): lookup is ReadonlyMap<string, OverlayMetrics> => lookup instanceof Map;

const lookupMetrics = (lookup: OverlayLookup, id: string): OverlayMetrics | undefined => {
  if (isMap(lookup)) {
    return lookup.get(id);
  }
  return Object.prototype.hasOwnProperty.call(lookup, id) ? lookup[id] : undefined;
};

/**
 * Derived graph with overlays taken from `metrics`. Units without an entry lose
 * any previous overlay; ghost units never carry one.
 */
export const mergeOverlays = (graph: RuleGraph, metrics: OverlayLookup): RuleGraph => {
  const nodes = new Map<string, Unit>();
  graph.nodes.forEach((unit, id) => {
    const { overlay: _previous, ...rest } = unit;
    const overlay = unit.isGhost ? undefined : lookupMetrics(metrics, id);
    nodes.set(id, overlay ? { ...rest, overlay: { ...overlay } } : rest);
  });
  return freezeGraph(graph.moduleId, nodes, [...graph.edges]);
};

interface Accumulator {
  attempts: number;
  successWeight: number;
  successSum: number;
  repeatWeight: number;
  repeatSum: number;
}

const emptyAccumulator = (): Accumulator => ({
  attempts: 0,
  successWeight: 0,
  successSum: 0,
  repeatWeight: 0,
  repeatSum: 0,
});

const accumulate = (totals: Map<string, Accumulator>, id: string, row: ActivityDailyRow) => {
  if (!id) {
    return;
  }
  const current = totals.get(id) ?? emptyAccumulator();
  current.attempts += row.attempts;
  if (row.successRate !== null) {
    current.successWeight += row.attempts;
    current.successSum += row.successRate * row.attempts;
  }
  if (row.repeatAttemptRate !== null) {
    current.repeatWeight += row.attempts;
    current.repeatSum += row.repeatAttemptRate * row.attempts;
  }
  totals.set(id, current);
};

const toMetrics = (totals: Accumulator): OverlayMetrics => ({
  attempts: totals.attempts,
  successRate: totals.successWeight > 0 ? totals.successSum / totals.successWeight : null,
  repeatAttemptRate: totals.repeatWeight > 0 ? totals.repeatSum / totals.repeatWeight : null,
});

const toDate = (value: Date | string): Date =>
  typeof value === "string" ? parseISO(value) : value;

/**
 * Attempt-weighted rates per activity and per objective over an inclusive
 * date window.
 */
export const aggregateOverlayMetrics = (
  rows: readonly ActivityDailyRow[],
  window: OverlayWindow
): Map<string, OverlayMetrics> => {
  const start = toDate(window.start);
  const end = toDate(window.end);
  if (!isValid(start) || !isValid(end) || start > end) {
    throw new RangeError(
      `Invalid overlay window ${String(window.start)} .. ${String(window.end)}`
    );
  }
  // rows are whole days, so the window is too
  const interval = { start: startOfDay(start), end: endOfDay(end) };

  const activities = new Map<string, Accumulator>();
  const objectives = new Map<string, Accumulator>();
  rows.forEach((row) => {
    if (row.moduleId !== window.moduleId) {
      return;
    }
    const day = parseISO(row.date);
    if (!isValid(day) || !isWithinInterval(day, interval)) {
      return;
    }
    accumulate(activities, row.activityId, row);
    accumulate(objectives, row.objectiveId, row);
  });

  const metrics = new Map<string, OverlayMetrics>();
  activities.forEach((totals, id) => metrics.set(id, toMetrics(totals)));
  objectives.forEach((totals, id) => {
    if (!metrics.has(id)) {
      metrics.set(id, toMetrics(totals));
    }
  });
  return metrics;
};
