/**
 * DCT image hasher
 * Decodes with sharp, downsamples to 32x32 grayscale and hashes the pixels
 */

import sharp from "sharp";
import { ProviderError } from "@tipboard/core";
import { SAMPLE_SIZE, phashFromPixels } from "./phash.js";
import type { ImageHasher } from "./types.js";

export class DctImageHasher implements ImageHasher {
  async hash(image: Buffer): Promise<string> {
    let decoded: { data: Buffer; info: sharp.OutputInfo };
    try {
      decoded = await sharp(image)
        .removeAlpha()
        .greyscale()
        .resize(SAMPLE_SIZE, SAMPLE_SIZE, { fit: "fill" })
        .raw()
        .toBuffer({ resolveWithObject: true });
    } catch (error) {
      throw new ProviderError("Image could not be decoded", "image-hasher", {
        cause: error instanceof Error ? error : undefined,
      });
    }

    const { data, info } = decoded;
    const pixels: number[] = [];
    for (let i = 0; i < SAMPLE_SIZE * SAMPLE_SIZE; i++) {
      pixels.push(data[i * info.channels] ?? 0);
    }
    return phashFromPixels(pixels, SAMPLE_SIZE);
  }
}
