/**
 * Perceptual hash
 * 64-bit DCT hash over a 32x32 grayscale image, compared by Hamming distance
 */

export const SAMPLE_SIZE = 32;
export const HASH_SIZE = 8;

/**
 * First `count` unnormalized DCT-II coefficients of a signal
 */
function dct(signal: readonly number[], count: number): number[] {
  const n = signal.length;
  const out: number[] = [];
  for (let k = 0; k < count; k++) {
    let sum = 0;
    for (let i = 0; i < n; i++) {
      sum += (signal[i] ?? 0) * Math.cos((Math.PI * k * (2 * i + 1)) / (2 * n));
    }
    out.push(2 * sum);
  }
  return out;
}

function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = sorted.length >> 1;
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? 0) + upper) / 2;
}

/**
 * Hash row-major grayscale pixels of a size x size image. Bits are the
 * low-frequency 8x8 DCT block thresholded at its median, most significant first.
 */
export function phashFromPixels(pixels: ArrayLike<number>, size: number = SAMPLE_SIZE): string {
  if (pixels.length !== size * size) {
    throw new RangeError(`Expected ${size * size} pixels, got ${pixels.length}`);
  }

  // Rows first, keeping only the low frequencies
  const rows: number[][] = [];
  for (let y = 0; y < size; y++) {
    const row: number[] = [];
    for (let x = 0; x < size; x++) {
      row.push(pixels[y * size + x] ?? 0);
    }
    rows.push(dct(row, HASH_SIZE));
  }

  // Then columns; block[v][u] with v the vertical frequency
  const block: number[][] = Array.from({ length: HASH_SIZE }, () => []);
  for (let u = 0; u < HASH_SIZE; u++) {
    const column = rows.map((row) => row[u] ?? 0);
    dct(column, HASH_SIZE).forEach((value, v) => {
      block[v]?.push(value);
    });
  }

  const coefficients = block.flat();
  const threshold = median(coefficients);

  let hex = "";
  for (let i = 0; i < coefficients.length; i += 4) {
    let nibble = 0;
    for (let bit = 0; bit < 4; bit++) {
      nibble = (nibble << 1) | ((coefficients[i + bit] ?? 0) > threshold ? 1 : 0);
    }
    hex += nibble.toString(16);
  }
  return hex;
}

const HEX_PATTERN = /^[0-9a-f]+$/i;

/**
 * Bits that differ between two hex hashes; -1 when either is missing or malformed
 */
export function hammingDistance(a: string | undefined, b: string | undefined): number {
  if (!a || !b || a.length !== b.length) return -1;
  if (!HEX_PATTERN.test(a) || !HEX_PATTERN.test(b)) return -1;

  let distance = 0;
  for (let i = 0; i < a.length; i++) {
    let diff = Number.parseInt(a.charAt(i), 16) ^ Number.parseInt(b.charAt(i), 16);
    while (diff > 0) {
      distance += diff & 1;
      diff >>= 1;
    }
  }
  return distance;
}
