/**
 * Similarity signals between two reports
 */

import {
  reportLocation,
  reportText,
  reportTime,
  type GraphNode,
  type Location,
} from "@tipboard/graph";

export const EARTH_RADIUS_M = 6_371_000;

export const WEIGHTS = {
  temporal: 0.3,
  geo: 0.3,
  semantic: 0.4,
} as const;

export const SIMILARITY_THRESHOLD = 0.4;

export interface SimilarityScores {
  temporal: number;
  geo: number;
  semantic: number;
  combined: number;
}

// ============================================
// SIGNALS
// ============================================

/**
 * Full score within 30 minutes, then linear decay to zero at one hour
 */
export function temporalScore(a: number | undefined, b: number | undefined): number {
  if (a === undefined || b === undefined) return 0;
  const deltaSeconds = Math.abs(a - b) / 1000;
  if (deltaSeconds <= 1800) return 1;
  return Math.max(0, 1 - deltaSeconds / 3600);
}

export function haversineMeters(a: Location, b: Location): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = toRad(b.lat - a.lat);
  const dLng = toRad(b.lng - a.lng);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLng / 2) ** 2;
  return 2 * EARTH_RADIUS_M * Math.asin(Math.min(1, Math.sqrt(h)));
}

/**
 * Full score within 200 m, then linear decay to zero at 1 km
 */
export function geoScore(a: Location | undefined, b: Location | undefined): number {
  if (!a || !b) return 0;
  const distance = haversineMeters(a, b);
  if (distance <= 200) return 1;
  return Math.max(0, 1 - distance / 1000);
}

function tokens(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/\s+/)
      .filter((token) => token.length > 3)
  );
}

/**
 * Doubled Jaccard overlap of significant words, capped at 1
 */
export function semanticScore(a: string, b: string): number {
  const left = tokens(a);
  const right = tokens(b);
  let intersection = 0;
  for (const token of left) {
    if (right.has(token)) intersection++;
  }
  const union = left.size + right.size - intersection;
  return Math.min(1, (2 * intersection) / Math.max(1, union));
}

// ============================================
// COMBINED
// ============================================

export function scoreReports(a: GraphNode, b: GraphNode): SimilarityScores {
  const temporal = temporalScore(reportTime(a), reportTime(b));
  const geo = geoScore(reportLocation(a), reportLocation(b));
  const semantic = semanticScore(reportText(a), reportText(b));

  return {
    temporal,
    geo,
    semantic,
    combined: WEIGHTS.temporal * temporal + WEIGHTS.geo * geo + WEIGHTS.semantic * semantic,
  };
}
