import Papa from "papaparse";
import type { ActivityDailyRow } from "@unlock-graph/core";
import { MetadataFormatError } from "./errors";
import { ACTIVITY_DAILY_COLUMNS, activityDailyCsvRowSchema } from "./schemas";

export interface ActivityCsvResult {
  rows: ActivityDailyRow[];
  issues: string[];
}

/**
 * Reads the daily activity aggregate export. Rows that fail validation are
 * skipped and reported by line; a missing column rejects the whole file.
 */
export const parseActivityDailyCsv = (text: string): ActivityCsvResult => {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim(),
  });

  const columns = parsed.meta.fields ?? [];
  const missing = ACTIVITY_DAILY_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw new MetadataFormatError("activity CSV", [`missing columns: ${missing.join(", ")}`]);
  }

  const issues = parsed.errors.map(
    (error) => `line ${error.row === undefined ? "?" : error.row + 2}: ${error.message}`
  );
  const rows: ActivityDailyRow[] = [];

  parsed.data.forEach((record, index) => {
    const row = activityDailyCsvRowSchema.safeParse(record);
    if (!row.success) {
      const detail = row.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      // header is line 1
      issues.push(`line ${index + 2}: ${detail}`);
      return;
    }
    rows.push({
      date: row.data.date_utc.slice(0, 10),
      moduleId: row.data.module_code,
      objectiveId: row.data.objective_id,
      activityId: row.data.activity_id,
      attempts: row.data.attempts,
      successRate: row.data.success_rate,
      repeatAttemptRate: row.data.repeat_attempt_rate,
    });
  });

  return { rows, issues };
};

export const observedModuleCodes = (rows: readonly ActivityDailyRow[]): string[] =>
  Array.from(new Set(rows.map((row) => row.moduleId)));
