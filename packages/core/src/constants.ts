import type { Strictness } from "./domain/models";

export interface BuildDefaults {
  strictness: Strictness;
}

export const DEFAULT_BUILD_OPTIONS: BuildDefaults = {
  strictness: "lenient",
};

export const MODULE_CODE_PATTERN = /^M\d+$/;
export const OBJECTIVE_CODE_PATTERN = /^(?:M\d+)?O\d+$/;
// group 1 is the owning objective code when the activity code carries one
export const ACTIVITY_CODE_PATTERN = /^((?:M\d+)?O\d+)?A(\d+)$/;

export const PERCENT_MIN = 0;
export const PERCENT_MAX = 100;

// Thresholds closer than this are treated as identical when deduplicating edges.
export const THRESHOLD_EPSILON = 1e-6;
