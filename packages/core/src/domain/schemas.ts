import { z } from "zod";

export const unitKindSchema = z.enum(["activity", "objective"]);
export const dependencyKindSchema = z.enum(["activation", "deactivation"]);

export const requirementListSchema = z.union([z.array(z.string()), z.string()]);

export const ruleEntrySchema = z
  .object({
    activation_requirements: requirementListSchema.optional(),
    deactivation_requirements: requirementListSchema.optional(),
    initially_open: z.boolean().optional(),
    kind: unitKindSchema.optional(),
    label: z.string().optional(),
  })
  .strict();

export type RuleEntry = z.infer<typeof ruleEntrySchema>;

export const moduleRulesSchema = z.record(z.string(), z.unknown());

export const thresholdSchema = z.object({
  metric: z.enum(["success_rate", "level"]),
  value: z.number().finite().nonnegative(),
});

export const snapshotNodeSchema = z.object({
  id: z.string().min(1),
  kind: unitKindSchema,
  moduleId: z.string().optional(),
  code: z.string().optional(),
  label: z.string().optional(),
  objectiveId: z.string().optional(),
  initiallyOpen: z.boolean().default(false),
  isGhost: z.boolean().default(false),
});

export const snapshotEdgeSchema = z.object({
  id: z.string().min(1),
  fromId: z.string().min(1),
  toId: z.string().min(1),
  kind: dependencyKindSchema,
  threshold: thresholdSchema.optional(),
  sourceCode: z.string().optional(),
  enrichment: z.record(z.string(), z.number()).optional(),
});

export const topologySnapshotSchema = z.object({
  nodes: z.array(snapshotNodeSchema),
  edges: z.array(snapshotEdgeSchema),
});

export type ParsedTopologySnapshot = z.infer<typeof topologySnapshotSchema>;

export const formatZodIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) =>
    issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
