/**
 * Image Inspector
 * EXIF summary (device, capture time, GPS) and error level analysis with sharp
 */

import exifReader from "exif-reader";
import sharp from "sharp";
import { z } from "zod";
import { ProviderError, logger, type ChildLogger } from "@tipboard/core";
import type { Attributes } from "@tipboard/graph";
import type { ImageInspection, ImageInspector } from "./types.js";

/** JPEG quality of the resave the original is diffed against */
export const ELA_QUALITY = 90;

// ============================================
// EXIF
// ============================================

const ExifText = z
  .string()
  .transform((value) => value.replace(/\0+$/, "").trim())
  .optional()
  .catch(undefined);

const ExifDate = z
  .union([z.string(), z.date()])
  .transform((value) =>
    value instanceof Date ? value.toISOString() : value.replace(/\0+$/, "").trim()
  )
  .optional()
  .catch(undefined);

const Degrees = z.array(z.number()).length(3).optional().catch(undefined);

const ExifSchema = z.object({
  Image: z
    .object({ Make: ExifText, Model: ExifText, DateTime: ExifDate })
    .optional()
    .catch(undefined),
  Photo: z.object({ DateTimeOriginal: ExifDate }).optional().catch(undefined),
  GPSInfo: z
    .object({
      GPSLatitudeRef: ExifText,
      GPSLatitude: Degrees,
      GPSLongitudeRef: ExifText,
      GPSLongitude: Degrees,
    })
    .optional()
    .catch(undefined),
});

function toDecimal(dms: number[] | undefined, ref: string | undefined): number | undefined {
  if (!dms) return undefined;
  const [degrees = 0, minutes = 0, seconds = 0] = dms;
  const decimal = degrees + minutes / 60 + seconds / 3600;
  return ref === "S" || ref === "W" ? -decimal : decimal;
}

/**
 * Reduce parsed EXIF tags to the fields reports keep. Unknown shapes yield {}.
 */
export function summarizeExif(tags: unknown): Attributes {
  const parsed = ExifSchema.safeParse(tags);
  if (!parsed.success) return {};

  const { Image: image, Photo: photo, GPSInfo: gps } = parsed.data;
  const summary: Attributes = {};

  if (image?.Make) summary.make = image.Make;
  if (image?.Model) summary.model = image.Model;
  if (image?.DateTime) summary.datetime = image.DateTime;
  if (photo?.DateTimeOriginal) summary.datetimeoriginal = photo.DateTimeOriginal;

  const lat = toDecimal(gps?.GPSLatitude, gps?.GPSLatitudeRef);
  const lng = toDecimal(gps?.GPSLongitude, gps?.GPSLongitudeRef);
  if (lat !== undefined && lng !== undefined) {
    summary.gps = { lat, lng };
  }

  return summary;
}

// ============================================
// ERROR LEVEL ANALYSIS
// ============================================

/**
 * Grayscale PNG of the per-pixel difference between the image and a JPEG
 * resave at `quality`; undefined when either side cannot be decoded.
 */
export async function computeEla(
  image: Buffer,
  quality: number = ELA_QUALITY
): Promise<Buffer | undefined> {
  const original = await sharp(image)
    .removeAlpha()
    .toColourspace("srgb")
    .raw()
    .toBuffer({ resolveWithObject: true });
  const resaved = await sharp(image).removeAlpha().jpeg({ quality }).toBuffer();
  const recompressed = await sharp(resaved)
    .toColourspace("srgb")
    .raw()
    .toBuffer({ resolveWithObject: true });

  const { width, height, channels } = original.info;
  if (recompressed.data.length !== original.data.length || channels < 1) {
    return undefined;
  }

  const diff = Buffer.alloc(width * height);
  for (let pixel = 0; pixel < diff.length; pixel++) {
    let total = 0;
    for (let c = 0; c < channels; c++) {
      const i = pixel * channels + c;
      total += Math.abs((original.data[i] ?? 0) - (recompressed.data[i] ?? 0));
    }
    diff[pixel] = Math.round(total / channels);
  }

  return sharp(diff, { raw: { width, height, channels: 1 } }).png().toBuffer();
}

// ============================================
// INSPECTOR
// ============================================

export class SharpImageInspector implements ImageInspector {
  private readonly log: ChildLogger;

  constructor() {
    this.log = logger.child({ component: "image-inspector" });
  }

  async inspect(image: Buffer): Promise<ImageInspection> {
    let exif: Buffer | undefined;
    try {
      ({ exif } = await sharp(image).metadata());
    } catch (error) {
      throw new ProviderError("Image could not be decoded", "image-inspector", {
        cause: error instanceof Error ? error : undefined,
      });
    }

    return {
      exif: exif ? this.readExif(exif) : {},
      elaAvailable: await this.elaAvailable(image),
    };
  }

  private readExif(raw: Buffer): Attributes {
    try {
      return summarizeExif(exifReader(raw));
    } catch (error) {
      this.log.warn("EXIF extraction failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }
  }

  private async elaAvailable(image: Buffer): Promise<boolean> {
    try {
      return (await computeEla(image)) !== undefined;
    } catch (error) {
      this.log.warn("ELA computation failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
