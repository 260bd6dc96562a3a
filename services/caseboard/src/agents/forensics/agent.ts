/**
 * Forensics Agent
 * Perceptual-hash repost/mutation detection for images, deepfake scoring for video
 */

import { logger, withRetry, type ChildLogger, type RetryOptions } from "@tipboard/core";
import {
  reportClaims,
  reportMediaUrl,
  reportPhash,
  type AttributeValue,
  type Attributes,
  type GraphNode,
} from "@tipboard/graph";
import type { BlackboardEvent } from "../../blackboard/types.js";
import { hammingDistance } from "../../providers/phash.js";
import type {
  ImageForensicsScores,
  ImageInspection,
  VideoAnalysis,
} from "../../providers/types.js";
import { eventReport, type Agent, type AgentDependencies } from "../types.js";

// ============================================
// CONSTANTS
// ============================================

export const VIDEO_EXTENSIONS = [".mp4", ".mov", ".webm", ".avi", ".mkv"] as const;

/** Inclusive Hamming bands */
export const REPOST_MAX_DISTANCE = 5;
export const MUTATION_MAX_DISTANCE = 15;

export const IMAGE_FALLBACK: ImageForensicsScores = {
  authenticityScore: 65,
  manipulationProbability: 25,
  qualityScore: 70,
  manipulationIndicators: ["Image forensics unavailable - manual review required"],
};

export const VIDEO_FALLBACK: VideoAnalysis = {
  deepfakeProbability: 20,
  manipulationProbability: 25,
  qualityScore: 65,
  authenticityScore: 60,
  indicators: ["Video analysis unavailable - manual review required"],
};

const NO_INSPECTION: ImageInspection = { exif: {}, elaAvailable: false };

export function isVideoUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return VIDEO_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

export interface ForensicsOptions {
  /** Provider retries; every failure is retried */
  retry?: Omit<RetryOptions, "log" | "retryAll">;
}

// ============================================
// FORENSICS AGENT
// ============================================

export class ForensicsAgent implements Agent {
  readonly name = "forensics";

  private readonly deps: AgentDependencies;
  private readonly retry: Omit<RetryOptions, "log" | "retryAll">;
  private readonly now: () => Date;
  private readonly log: ChildLogger;

  constructor(deps: AgentDependencies, options: ForensicsOptions = {}) {
    this.deps = deps;
    this.retry = options.retry ?? {};
    this.now = deps.now ?? (() => new Date());
    this.log = logger.child({ source: this.name });
  }

  async run(event: BlackboardEvent): Promise<void> {
    const subject = eventReport(event);
    const report = subject && this.deps.store.getNode(subject.id);
    const mediaUrl = report && reportMediaUrl(report);
    if (!report || !mediaUrl) return;

    if (isVideoUrl(mediaUrl)) {
      await this.processVideo(report, mediaUrl);
    } else {
      await this.processImage(report, mediaUrl);
    }
  }

  // ============================================
  // IMAGE
  // ============================================

  private async processImage(report: GraphNode, mediaUrl: string): Promise<void> {
    const media = await this.fetchMedia(report, mediaUrl);
    const phash = media && (await this.hashMedia(report, media));
    const inspection = media ? await this.inspectMedia(report, media) : NO_INSPECTION;
    const scores = await this.imageScores(report, mediaUrl);

    const distances: AttributeValue[] = [];
    if (phash) {
      for (const other of this.deps.store.getReportsWithHash(report.id)) {
        const distance = hammingDistance(phash, reportPhash(other));
        if (distance < 0) continue;
        distances.push({ node_id: other.id, distance });

        const kind =
          distance <= REPOST_MAX_DISTANCE
            ? "repost_of"
            : distance <= MUTATION_MAX_DISTANCE
              ? "mutation_of"
              : undefined;
        if (!kind) continue;

        const edge = this.deps.store.createEdge(kind, report.id, other.id, report.caseId, {
          hamming: distance,
        });
        this.log.info(`Detected ${kind}`, {
          caseId: report.caseId,
          nodeId: report.id,
          otherId: other.id,
          distance,
        });
        await this.deps.broadcaster.publish({ action: "add_edge", edge });
      }
    }

    const updated = this.deps.store.updateNode(report.id, {
      phash: phash ?? null,
      exif: { ...inspection.exif },
      ela_available: inspection.elaAvailable,
      media_url: mediaUrl,
      hamming_distances: distances,
      authenticity_score: scores.authenticityScore,
      manipulation_probability: scores.manipulationProbability,
      quality_score: scores.qualityScore,
      manipulation_indicators: scores.manipulationIndicators,
      indicators: scores.manipulationIndicators,
      analyzed_at: this.now().toISOString(),
    });
    await this.deps.broadcaster.publish({ action: "update_node", node: updated });
  }

  private async fetchMedia(report: GraphNode, mediaUrl: string): Promise<Buffer | undefined> {
    const { mediaSource } = this.deps.providers;
    if (!mediaSource) return undefined;

    try {
      return await mediaSource.fetch(mediaUrl);
    } catch (error) {
      this.log.warn("Could not fetch media", {
        caseId: report.caseId,
        nodeId: report.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  /**
   * Hash of the media, or undefined when it cannot be decoded
   */
  private async hashMedia(report: GraphNode, media: Buffer): Promise<string | undefined> {
    const { imageHasher } = this.deps.providers;
    if (!imageHasher) return undefined;

    try {
      return await imageHasher.hash(media);
    } catch (error) {
      this.log.warn("Could not hash media", {
        caseId: report.caseId,
        nodeId: report.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  private async inspectMedia(report: GraphNode, media: Buffer): Promise<ImageInspection> {
    const { imageInspector } = this.deps.providers;
    if (!imageInspector) return NO_INSPECTION;

    try {
      return await imageInspector.inspect(media);
    } catch (error) {
      this.log.warn("Could not inspect media", {
        caseId: report.caseId,
        nodeId: report.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return NO_INSPECTION;
    }
  }

  private async imageScores(report: GraphNode, mediaUrl: string): Promise<ImageForensicsScores> {
    const forensics = this.deps.providers.imageForensics;
    if (!forensics) return IMAGE_FALLBACK;

    try {
      return await withRetry(() => forensics.analyze(mediaUrl, evidenceContext(report)), {
        ...this.retry,
        retryAll: true,
        log: this.log,
      });
    } catch (error) {
      this.log.warn("Image forensics failed, using fallback scores", {
        caseId: report.caseId,
        nodeId: report.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return IMAGE_FALLBACK;
    }
  }

  // ============================================
  // VIDEO
  // ============================================

  private async processVideo(report: GraphNode, mediaUrl: string): Promise<void> {
    const analysis = await this.videoAnalysis(report, mediaUrl);

    const updated = this.deps.store.updateNode(report.id, {
      media_url: mediaUrl,
      media_type: "video",
      summary: analysis.summary ?? null,
      deepfake_probability: analysis.deepfakeProbability,
      manipulation_probability: analysis.manipulationProbability,
      quality_score: analysis.qualityScore,
      authenticity_score: analysis.authenticityScore,
      indicators: analysis.indicators,
      manipulation_indicators: analysis.indicators,
      analyzed_at: this.now().toISOString(),
    });
    await this.deps.broadcaster.publish({ action: "update_node", node: updated });
  }

  private async videoAnalysis(report: GraphNode, mediaUrl: string): Promise<VideoAnalysis> {
    const analyst = this.deps.providers.videoAnalyst;
    if (!analyst) return VIDEO_FALLBACK;

    try {
      return await withRetry(() => analyst.analyze(mediaUrl, evidenceContext(report)), {
        ...this.retry,
        retryAll: true,
        log: this.log,
      });
    } catch (error) {
      this.log.warn("Video analysis failed, using fallback scores", {
        caseId: report.caseId,
        nodeId: report.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return VIDEO_FALLBACK;
    }
  }
}

/**
 * What the report already says, handed to forensic providers as context
 */
function evidenceContext(report: GraphNode): Attributes {
  return {
    claims: reportClaims(report).map((claim) => claim.statement),
    location: report.attributes.location ?? null,
    semantic_role: report.attributes.semantic_role ?? null,
    timestamp: report.attributes.timestamp ?? null,
  };
}
