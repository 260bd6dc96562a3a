/**
 * Intake Schemas
 * Zod schemas for inbound submissions
 */

import { z } from "zod";
import { ValidationError } from "@tipboard/core";
import { EdgeKindSchema, LocationSchema, type EdgeKind } from "@tipboard/graph";

/**
 * Parse with a schema, raising ValidationError on the first issue
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const [issue] = result.error.issues;
    const field = issue?.path.join(".") || undefined;
    throw new ValidationError(issue ? `${field ?? "input"}: ${issue.message}` : "Invalid input", {
      field,
      context: { issues: result.error.issues.length },
    });
  }
  return result.data;
}

export const ReportInputSchema = z.object({
  text_body: z.string().trim().min(1, "text_body is required"),
  location: LocationSchema.nullish(),
  timestamp: z.string().datetime({ offset: true }).nullish(),
  media_url: z.string().min(1).nullish(),
  anonymous: z.boolean().default(true),
  contact: z.string().nullish(),
});

export type ReportInput = z.input<typeof ReportInputSchema>;

export const EvidenceInputSchema = z.object({
  id: z.string().min(1).optional(),
  /** photo, text, video, ... */
  type: z.string().default("text"),
  content: z.string().default(""),
  url: z.string().nullish(),
  timestamp: z.string().nullish(),
});

export type EvidenceInput = z.input<typeof EvidenceInputSchema>;

export const EdgeInputSchema = z.object({
  sourceId: z.string().min(1),
  targetId: z.string().min(1),
  /** An edge kind, or an operator label such as "supports" or "contradicts" */
  relation: z.string().default("suspected_link"),
  note: z.string().nullish(),
});

export type EdgeInput = z.input<typeof EdgeInputSchema>;

const RELATION_KINDS: Record<string, EdgeKind> = {
  supports: "similar_to",
  related: "similar_to",
  suspected_link: "similar_to",
  contradicts: "debunked_by",
};

/**
 * Map an operator relation label to an edge kind; unknown labels link as similar_to
 */
export function relationToEdgeKind(relation: string): EdgeKind {
  const normalized = relation.trim().toLowerCase();
  const direct = EdgeKindSchema.safeParse(normalized);
  if (direct.success) return direct.data;
  return RELATION_KINDS[normalized] ?? "similar_to";
}
