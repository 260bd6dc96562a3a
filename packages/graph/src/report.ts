/**
 * Report attribute accessors
 * Agents read report attributes through these schemas; malformed values read as absent.
 */

import { z } from "zod";
import type { GraphNode } from "./types.js";

// ============================================================
// SCHEMAS
// ============================================================

export const LocationSchema = z.object({
  lat: z.number(),
  lng: z.number(),
  building: z.string().optional(),
});

export type Location = z.infer<typeof LocationSchema>;

export const ClaimSchema = z
  .object({
    statement: z.string(),
  })
  .passthrough();

export type Claim = z.infer<typeof ClaimSchema>;

const ClaimsSchema = z.array(ClaimSchema);

// ============================================================
// ACCESSORS
// ============================================================

function readString(node: GraphNode, key: string): string | undefined {
  const value = node.attributes[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

export function reportText(node: GraphNode): string {
  return readString(node, "text_body") ?? "";
}

export function reportLocation(node: GraphNode): Location | undefined {
  const parsed = LocationSchema.safeParse(node.attributes.location);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Building name from a structured location, or a free-text location string
 */
export function reportBuilding(node: GraphNode): string | undefined {
  const raw = node.attributes.location;
  if (typeof raw === "string" && raw.length > 0) return raw;
  if (raw !== null && typeof raw === "object" && !Array.isArray(raw)) {
    const building = raw.building;
    if (typeof building === "string" && building.length > 0) return building;
  }
  return undefined;
}

export function reportMediaUrl(node: GraphNode): string | undefined {
  return readString(node, "media_url");
}

export function reportPhash(node: GraphNode): string | undefined {
  return readString(node, "phash");
}

export function reportClaims(node: GraphNode): Claim[] {
  const parsed = ClaimsSchema.safeParse(node.attributes.claims);
  return parsed.success ? parsed.data : [];
}

export function reportUrgency(node: GraphNode): number | undefined {
  const value = node.attributes.urgency;
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string") {
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Reported time in epoch ms: `timestamp`, then `created_at`, then the node's createdAt
 */
export function reportTime(node: GraphNode): number | undefined {
  for (const candidate of [
    readString(node, "timestamp"),
    readString(node, "created_at"),
    node.createdAt,
  ]) {
    if (candidate === undefined) continue;
    const ms = Date.parse(candidate);
    if (!Number.isNaN(ms)) return ms;
  }
  return undefined;
}
