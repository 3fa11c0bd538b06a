import { Logger } from "@nestjs/common";
import sharp from "sharp";

import { InputError, errorMessage } from "../errors.js";
import type { ImageMediaType, ImageSample, RgbRaster } from "../types.js";

const logger = new Logger("ImageDecoder");

const MEDIA_TYPES: Record<string, ImageMediaType> = {
  jpeg: "image/jpeg",
  png: "image/png",
  gif: "image/gif",
  webp: "image/webp",
};

async function decodeRaster(bytes: Buffer): Promise<RgbRaster | null> {
  try {
    const { data, info } = await sharp(bytes)
      .toColourspace("srgb")
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
    if (info.channels !== 3) {
      logger.warn(`unexpected channel count ${info.channels}; skipping pixel analysis`);
      return null;
    }
    return { width: info.width, height: info.height, data: new Uint8Array(data) };
  } catch (error) {
    logger.warn(`pixel decode failed: ${errorMessage(error)}`);
    return null;
  }
}

/**
 * Validates encoded bytes and builds a sample. Formats the vision backends
 * do not take are re-encoded as PNG; a failed pixel decode leaves `raster`
 * null rather than failing the inspection.
 */
export async function decodeImage(ref: string, bytes: Buffer): Promise<ImageSample> {
  if (bytes.length === 0) {
    throw new InputError("not_an_image", `image ${ref} is empty`);
  }

  let format: string | undefined;
  try {
    format = (await sharp(bytes).metadata()).format;
  } catch (error) {
    throw new InputError("not_an_image", `image ${ref} could not be read: ${errorMessage(error)}`);
  }
  if (!format) {
    throw new InputError("not_an_image", `image ${ref} has no recognisable format`);
  }

  let encoded = bytes;
  let mediaType: ImageMediaType | undefined = MEDIA_TYPES[format];
  if (!mediaType) {
    try {
      encoded = await sharp(bytes).png().toBuffer();
    } catch (error) {
      throw new InputError("not_an_image", `image ${ref} (${format}) could not be converted: ${errorMessage(error)}`);
    }
    mediaType = "image/png";
  }

  return {
    ref,
    raster: await decodeRaster(bytes),
    encoded,
    mediaType,
    format,
  };
}
