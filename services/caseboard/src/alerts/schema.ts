/**
 * Alert Schemas
 */

import { z } from "zod";

export const AlertStatusSchema = z.enum(["Confirmed", "Investigating", "All Clear"]);

export type AlertStatus = z.infer<typeof AlertStatusSchema>;

export const AlertDraftInputSchema = z.object({
  case_id: z.string().trim().min(1, "case_id is required"),
  officer_notes: z.string().trim().min(1).optional(),
});

export type AlertDraftInput = z.input<typeof AlertDraftInputSchema>;

export const AlertApproveInputSchema = z.object({
  case_id: z.string().trim().min(1, "case_id is required"),
  final_text: z.string().trim().min(1, "final_text is required"),
  status: AlertStatusSchema.default("Confirmed"),
});

export type AlertApproveInput = z.input<typeof AlertApproveInputSchema>;
