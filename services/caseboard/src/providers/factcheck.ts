/**
 * Fact Check Client
 * Google Fact Check Tools claims:search
 */

import { z } from "zod";
import {
  NetworkError,
  ProviderError,
  getConfig,
  logger,
  withRetry,
  type ChildLogger,
} from "@tipboard/core";
import type { FactChecker, FactCheckReview } from "./types.js";

const FACTCHECK_BASE_URL = "https://factchecktools.googleapis.com/v1alpha1";
const MAX_QUERY_LENGTH = 500;

const ClaimReviewSchema = z.object({
  publisher: z.object({ name: z.string().optional() }).partial().optional(),
  url: z.string().optional(),
  textualRating: z.string().optional(),
});

const ClaimSearchResponseSchema = z.object({
  claims: z
    .array(
      z.object({
        text: z.string().optional(),
        claimReview: z.array(ClaimReviewSchema).optional(),
      })
    )
    .default([]),
});

export type ClaimSearchResponse = z.infer<typeof ClaimSearchResponseSchema>;

export interface FactCheckClientOptions {
  apiKey?: string;
  timeoutMs?: number;
  baseUrl?: string;
  /** Injected for tests */
  fetch?: typeof fetch;
  retry?: { attempts?: number; backoffMs?: number };
}

/**
 * Flatten a search response into one review per claim (first review wins)
 */
export function toReviews(response: ClaimSearchResponse, statement: string): FactCheckReview[] {
  return response.claims.map((claim) => {
    const review = claim.claimReview?.[0];
    return {
      text: claim.text || statement,
      rating: review?.textualRating ?? "unknown",
      reviewer: review?.publisher?.name ?? "unknown",
      url: review?.url ?? "",
    };
  });
}

export class FactCheckClient implements FactChecker {
  private readonly apiKey?: string;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly retry: { attempts?: number; backoffMs?: number };
  private readonly log: ChildLogger;

  constructor(options: FactCheckClientOptions = {}) {
    const config = getConfig();
    this.apiKey = options.apiKey ?? config.providers.factCheckApiKey;
    this.timeoutMs = options.timeoutMs ?? config.media.fetchTimeoutMs;
    this.baseUrl = options.baseUrl ?? FACTCHECK_BASE_URL;
    this.fetchImpl = options.fetch ?? fetch;
    this.retry = options.retry ?? {};
    this.log = logger.child({ component: "factcheck" });
  }

  /**
   * Reviews for a claim statement. Without an API key, or when the service
   * keeps failing, returns an empty list.
   */
  async searchClaims(statement: string): Promise<FactCheckReview[]> {
    if (!this.apiKey) return [];

    try {
      const response = await withRetry(() => this.request(statement), {
        ...this.retry,
        log: this.log,
      });
      return toReviews(response, statement);
    } catch (error) {
      this.log.warn("Fact check search failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  private async request(statement: string): Promise<ClaimSearchResponse> {
    const url = new URL(`${this.baseUrl}/claims:search`);
    url.searchParams.set("query", statement.slice(0, MAX_QUERY_LENGTH));
    url.searchParams.set("key", this.apiKey ?? "");

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new NetworkError(
        `Failed to reach fact check API: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    if (!response.ok) {
      throw new ProviderError(`Fact check API error: ${response.status}`, "factcheck", {
        statusCode: response.status,
      });
    }

    const parsed = ClaimSearchResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError("Unexpected fact check response", "factcheck", {
        context: { issues: parsed.error.issues.length },
      });
    }
    return parsed.data;
  }
}
