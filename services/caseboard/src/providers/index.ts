/**
 * Providers
 */

export type {
  ExtractedClaim,
  ClaimExtractionInput,
  ClaimExtraction,
  ClaimAnalyst,
  CaseSynthesis,
  CaseNarrator,
  AlertComposer,
  FactCheckReview,
  FactChecker,
  MediaSource,
  ImageHasher,
  ImageInspection,
  ImageInspector,
  ImageForensicsScores,
  ImageForensics,
  VideoAnalysis,
  VideoHit,
  VideoAnalyst,
  Providers,
} from "./types.js";

export { FactCheckClient, toReviews, type FactCheckClientOptions } from "./factcheck.js";
export { HttpMediaSource, type HttpMediaSourceOptions } from "./media.js";
export { DctImageHasher } from "./image-hasher.js";
export {
  SharpImageInspector,
  ELA_QUALITY,
  computeEla,
  summarizeExif,
} from "./image-inspector.js";
export { SAMPLE_SIZE, HASH_SIZE, phashFromPixels, hammingDistance } from "./phash.js";
export { ClaudeCaseAnalyst, extractJson } from "./analyst/index.js";
