import { z } from "zod";

const codeMapSchema = z.record(z.string(), z.union([z.string(), z.array(z.string())]));

const numericLike = z.union([
  z.number(),
  z.string(),
  z.null(),
  z.array(z.union([z.number(), z.string(), z.null()])),
]);

const deactConditionSchema = z
  .object({
    dim: z.string(),
    sr: numericLike.optional(),
    lvl: numericLike.optional(),
  })
  .passthrough();

export const nodeRuleSchema = z
  .object({
    code: z.string().optional(),
    id: z.string().optional(),
    type: z.string().optional(),
    rules: z
      .object({
        init_ssb: z.unknown().optional(),
        // [{ targetId: { sourceId: { sr, lvl } } }]
        requirements: z.array(z.record(z.string(), z.unknown())).optional(),
        // [{ targetId: { dim, sr, lvl } | [{ dim, sr, lvl }] }]
        deact_requirements: z
          .array(
            z.record(
              z.string(),
              z.union([deactConditionSchema, z.array(deactConditionSchema)])
            )
          )
          .optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const moduleRuleSchema = z
  .object({
    module_code: z.string(),
    map_id_code: codeMapSchema.optional(),
    node_rules: z.array(nodeRuleSchema).default([]),
  })
  .passthrough();

export const rulesDocumentSchema = z
  .object({
    map_id_code: z.object({
      code_to_id: codeMapSchema,
      id_to_codes: codeMapSchema,
    }),
    module_rules: z.array(moduleRuleSchema).default([]),
    dependency_topology: z.record(z.string(), z.unknown()).optional(),
    links_to_catalog: z
      .object({
        rule_module_ids: z.array(z.string()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type NodeRule = z.infer<typeof nodeRuleSchema>;
export type ModuleRule = z.infer<typeof moduleRuleSchema>;
export type RulesDocument = z.infer<typeof rulesDocumentSchema>;

const titleSchema = z
  .object({
    short: z.string().optional(),
    long: z.string().optional(),
  })
  .passthrough();

const catalogActivitySchema = z
  .object({
    id: z.string().optional(),
    code: z.string(),
    title: titleSchema.optional(),
  })
  .passthrough();

const catalogObjectiveSchema = z
  .object({
    id: z.string().optional(),
    code: z.string(),
    title: titleSchema.optional(),
    activities: z.array(catalogActivitySchema).default([]),
  })
  .passthrough();

const catalogModuleSchema = z
  .object({
    id: z.string().optional(),
    code: z.string(),
    title: titleSchema.optional(),
    objectives: z.array(catalogObjectiveSchema).default([]),
  })
  .passthrough();

export const learningCatalogSchema = z
  .object({
    modules: z.array(catalogModuleSchema).default([]),
  })
  .passthrough();

export type CatalogTitle = z.infer<typeof titleSchema>;
export type LearningCatalog = z.infer<typeof learningCatalogSchema>;

// Rows of a pre-resolved topology as exported by the analytics tables.
export const topologyNodeRowSchema = z
  .object({
    node_id: z.string().nullish(),
    node_code: z.string(),
    node_type: z.enum(["activity", "objective"]),
    label: z.string().nullish(),
    objective_code: z.string().nullish(),
    init_open: z.boolean().nullish(),
    is_ghost: z.boolean().nullish(),
  })
  .passthrough();

export const topologyEdgeRowSchema = z
  .object({
    edge_id: z.string(),
    edge_type: z.enum(["activation", "deactivation"]),
    from_node_code: z.string(),
    to_node_code: z.string(),
    threshold_type: z.string().nullish(),
    threshold_value: z.number().nullish(),
    enrich_lvl: z.number().nullish(),
    enrich_sr: z.number().nullish(),
  })
  .passthrough();

export const topologyRowsSchema = z.object({
  nodes: z.array(topologyNodeRowSchema),
  edges: z.array(topologyEdgeRowSchema),
});

const optionalRate = z.preprocess(
  (value) =>
    value === undefined || value === null || (typeof value === "string" && !value.trim())
      ? null
      : Number(value),
  z.number().min(0).max(1).nullable()
);

export const activityDailyCsvRowSchema = z.object({
  date_utc: z.string().regex(/^\d{4}-\d{2}-\d{2}/, "expected a yyyy-MM-dd date"),
  module_code: z.string().trim().min(1),
  objective_id: z.string().trim().default(""),
  activity_id: z.string().trim().default(""),
  attempts: z.coerce.number().int().nonnegative(),
  success_rate: optionalRate,
  repeat_attempt_rate: optionalRate,
});

export const ACTIVITY_DAILY_COLUMNS = [
  "date_utc",
  "module_code",
  "objective_id",
  "activity_id",
  "attempts",
  "success_rate",
  "repeat_attempt_rate",
] as const;
