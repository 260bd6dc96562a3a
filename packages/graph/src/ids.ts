/**
 * Identifier generation for cases, reports, nodes and edges
 */

import { randomUUID } from "crypto";
import type { NodeKind } from "./types.js";

const ADJECTIVES = [
  "Crimson", "Midnight", "Silent", "Shadow", "Obsidian", "Velvet",
  "Phantom", "Smoke", "Iron", "Steel", "Cold", "Deep", "Dark",
] as const;

const NOUNS = [
  "Alibi", "Cipher", "Code", "Whisper", "Echo", "Ghost",
  "Dossier", "Agent", "Drop", "Signal", "Trace", "Wire",
] as const;

function pick<T>(values: readonly T[], random: () => number): T {
  const value = values[Math.floor(random() * values.length) % values.length];
  if (value === undefined) {
    throw new Error("Cannot pick from an empty list");
  }
  return value;
}

function shortHex(): string {
  return randomUUID().replace(/-/g, "").slice(0, 12).toUpperCase();
}

/**
 * CASE-{Adjective}-{Noun}-{4 digits}
 */
export function generateCaseId(random: () => number = Math.random): string {
  const adjective = pick(ADJECTIVES, random);
  const noun = pick(NOUNS, random);
  const digits = 1000 + Math.floor(random() * 9000);
  return `CASE-${adjective}-${noun}-${digits}`;
}

export function generateReportId(): string {
  return `RPT-${shortHex()}`;
}

/**
 * Node ids are prefixed with the first letter of their kind (R, E, F, M)
 */
export function generateNodeId(kind: NodeKind): string {
  return `${kind.charAt(0).toUpperCase()}-${shortHex()}`;
}

export function generateEdgeId(): string {
  return `E-${shortHex()}`;
}

export function generateAlertId(): string {
  return `ALT-${shortHex()}`;
}
