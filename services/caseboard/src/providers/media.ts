/**
 * HTTP Media Source
 * Loads media bytes from file:// URLs, the local upload directory, or over HTTP
 */

import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { NetworkError, ProviderError, getConfig } from "@tipboard/core";
import type { MediaSource } from "./types.js";

const UPLOAD_PREFIX = "/api/upload/";

export interface HttpMediaSourceOptions {
  uploadDir?: string;
  timeoutMs?: number;
  /** Injected for tests */
  fetch?: typeof fetch;
}

export class HttpMediaSource implements MediaSource {
  private readonly uploadDir: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpMediaSourceOptions = {}) {
    const config = getConfig();
    this.uploadDir = options.uploadDir ?? config.media.uploadDir;
    this.timeoutMs = options.timeoutMs ?? config.media.fetchTimeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async fetch(url: string): Promise<Buffer> {
    if (url.startsWith("file://")) {
      return this.readFile(fileURLToPath(url));
    }

    const upload = this.uploadPath(url);
    if (upload) {
      return this.readFile(upload);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      throw new NetworkError(
        `Failed to fetch media ${url}: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    if (!response.ok) {
      throw new ProviderError(`Media fetch failed: ${response.status}`, "media", {
        statusCode: response.status,
        context: { url },
      });
    }
    return Buffer.from(await response.arrayBuffer());
  }

  /**
   * Uploaded files are served from the upload directory by basename
   */
  private uploadPath(url: string): string | undefined {
    const pathname = url.startsWith("/") ? url : URL.canParse(url) ? new URL(url).pathname : "";
    if (!pathname.startsWith(UPLOAD_PREFIX)) return undefined;
    return path.join(this.uploadDir, path.basename(pathname));
  }

  private async readFile(filePath: string): Promise<Buffer> {
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      throw new ProviderError(`Media file ${filePath} could not be read`, "media", {
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
}
