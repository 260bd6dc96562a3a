import { describe, it } from "node:test";
import assert from "node:assert/strict";
import sharp from "sharp";
import { ProviderError } from "@tipboard/core";
import { DctImageHasher } from "./image-hasher.js";
import { hammingDistance } from "./phash.js";

const SIDE = 128;
const CELLS = 8;

/**
 * Grayscale PNG of an 8x8 grid of flat cells with pseudo-random levels
 */
async function blockImage(seed: number): Promise<Buffer> {
  let state = seed;
  const levels: number[] = [];
  for (let i = 0; i < CELLS * CELLS; i++) {
    state = (state * 16807) % 2147483647;
    levels.push(state % 256);
  }

  const cell = SIDE / CELLS;
  const pixels = Buffer.alloc(SIDE * SIDE);
  for (let y = 0; y < SIDE; y++) {
    for (let x = 0; x < SIDE; x++) {
      pixels[y * SIDE + x] = levels[Math.floor(y / cell) * CELLS + Math.floor(x / cell)] ?? 0;
    }
  }
  return sharp(pixels, { raw: { width: SIDE, height: SIDE, channels: 1 } }).png().toBuffer();
}

describe("DctImageHasher", () => {
  const hasher = new DctImageHasher();

  it("hashes decoded images to 16 hex characters", async () => {
    assert.match(await hasher.hash(await blockImage(3)), /^[0-9a-f]{16}$/);
  });

  it("keeps a recompressed copy within repost distance", async () => {
    const png = await blockImage(3);
    const jpeg = await sharp(png).jpeg({ quality: 90 }).toBuffer();

    const distance = hammingDistance(await hasher.hash(png), await hasher.hash(jpeg));

    assert.ok(distance >= 0 && distance <= 5, `distance ${distance}`);
  });

  it("raises ProviderError for bytes that are not an image", async () => {
    await assert.rejects(hasher.hash(Buffer.from("not an image")), ProviderError);
  });
});
