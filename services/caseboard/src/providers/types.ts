/**
 * Provider Contracts
 * External collaborators the analysis agents call. Only the result shapes matter
 * to the agents; every provider is optional and agents fall back without one.
 */

import type { Attributes, Location } from "@tipboard/graph";

// ============================================
// CLAIMS
// ============================================

export interface ExtractedClaim {
  statement: string;
  category?: string;
  confidence?: number;
}

export interface ClaimExtractionInput {
  caseId: string;
  text: string;
  location?: Location;
  timestamp?: string;
}

export interface ClaimExtraction {
  claims: ExtractedClaim[];
  /** 0..1 */
  urgency: number;
  misinformationFlags: string[];
  suggestedVerifications: string[];
}

export interface ClaimAnalyst {
  extractClaims(input: ClaimExtractionInput): Promise<ClaimExtraction>;
  generateSearchQueries(claims: ExtractedClaim[]): Promise<string[]>;
}

// ============================================
// CASE NARRATIVE
// ============================================

export interface CaseSynthesis {
  narrative: string;
  originAnalysis: string;
  spreadMap: string;
  confidenceScore: number | null;
  recommendedAction: string;
}

export interface CaseNarrator {
  /** undefined when nothing useful came back */
  synthesizeCase(caseId: string, context: string): Promise<CaseSynthesis | undefined>;
}

export interface AlertComposer {
  /** Public alert text for a case; undefined when nothing useful came back */
  composeAlert(caseId: string, context: string, officerNotes?: string): Promise<string | undefined>;
}

// ============================================
// FACT CHECKS
// ============================================

export interface FactCheckReview {
  /** Claim text as the reviewer recorded it */
  text: string;
  rating: string;
  reviewer: string;
  url: string;
}

export interface FactChecker {
  searchClaims(statement: string): Promise<FactCheckReview[]>;
}

// ============================================
// MEDIA
// ============================================

export interface MediaSource {
  fetch(url: string): Promise<Buffer>;
}

export interface ImageHasher {
  /** 64-bit perceptual hash as 16 hex characters */
  hash(image: Buffer): Promise<string>;
}

export interface ImageInspection {
  /** make, model, datetime, datetimeoriginal and gps, when present */
  exif: Attributes;
  /** An error level map could be computed */
  elaAvailable: boolean;
}

export interface ImageInspector {
  inspect(image: Buffer): Promise<ImageInspection>;
}

export interface ImageForensicsScores {
  authenticityScore: number;
  manipulationProbability: number;
  qualityScore: number;
  manipulationIndicators: string[];
}

export interface ImageForensics {
  analyze(mediaUrl: string, evidence: Attributes): Promise<ImageForensicsScores>;
}

export interface VideoAnalysis {
  summary?: string;
  deepfakeProbability: number;
  manipulationProbability: number;
  qualityScore: number;
  authenticityScore: number;
  indicators: string[];
}

export interface VideoHit {
  url: string;
  /** Index or site the hit came from */
  platform?: string;
  score?: number;
}

export interface VideoAnalyst {
  analyze(mediaUrl: string, evidence: Attributes): Promise<VideoAnalysis>;
  search(query: string): Promise<VideoHit[]>;
}

/**
 * Everything an agent may call out to
 */
export interface Providers {
  claimAnalyst?: ClaimAnalyst;
  caseNarrator?: CaseNarrator;
  alertComposer?: AlertComposer;
  factChecker?: FactChecker;
  mediaSource?: MediaSource;
  imageHasher?: ImageHasher;
  imageInspector?: ImageInspector;
  imageForensics?: ImageForensics;
  videoAnalyst?: VideoAnalyst;
}
