import sharp from 'sharp';
import fs from 'fs/promises';
import path from 'path';

import { TileDecodeError } from './errors';
import type { Offset, RgbaImage } from './types';

const CHANNELS = 4;

export const OUTPUT_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp', '.tif', '.tiff'] as const;

// ==========================================
// CANVAS
// ==========================================

export type Placement = {
  image: RgbaImage;
  offset: Offset;
};

/**
 * Composite images onto a transparent width x height canvas, in order.
 * Where placements overlap the later item wins; callers keep
 * stride >= item size to avoid that.
 */
export async function composeImage(
  width: number,
  height: number,
  items: Iterable<Placement>
): Promise<RgbaImage> {
  const overlays: sharp.OverlayOptions[] = Array.from(items, ({ image, offset }) => ({
    input: image.data,
    raw: { width: image.width, height: image.height, channels: CHANNELS },
    left: offset.x,
    top: offset.y,
  }));

  const { data, info } = await sharp({
    create: { width, height, channels: CHANNELS, background: { r: 0, g: 0, b: 0, alpha: 0 } },
  })
    .composite(overlays)
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { width: info.width, height: info.height, data };
}

// ==========================================
// DECODE / ENCODE
// ==========================================

/**
 * Decode a tile to RGBA and force it to tileSize x tileSize.
 * Mismatched sizes are resampled nearest-neighbour, no smoothing.
 */
export async function loadTile(filePath: string, tileSize: number): Promise<RgbaImage> {
  try {
    let pipeline = sharp(filePath);
    const metadata = await pipeline.metadata();

    if (metadata.width !== tileSize || metadata.height !== tileSize) {
      pipeline = pipeline.resize(tileSize, tileSize, { kernel: 'nearest', fit: 'fill' });
    }

    const { data, info } = await pipeline
      .ensureAlpha()
      .toColourspace('srgb')
      .raw({ depth: 'uchar' })
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== CHANNELS || info.width !== tileSize || info.height !== tileSize) {
      throw new Error(
        `Unexpected decoded layout ${info.width}x${info.height}x${info.channels}`
      );
    }

    return { width: info.width, height: info.height, data };
  } catch (error) {
    throw new TileDecodeError(filePath, error);
  }
}

function applyOutputFormat(pipeline: sharp.Sharp, outputPath: string): sharp.Sharp {
  const ext = path.extname(outputPath).toLowerCase();
  if (ext === '.jpg' || ext === '.jpeg') return pipeline.jpeg();
  if (ext === '.webp') return pipeline.webp();
  if (ext === '.tif' || ext === '.tiff') return pipeline.tiff();
  return pipeline.png();
}

/** Encode by file extension, creating parent directories first. */
export async function writeImage(image: RgbaImage, outputPath: string): Promise<void> {
  const outDir = path.dirname(outputPath);
  if (outDir) {
    await fs.mkdir(outDir, { recursive: true });
  }

  const pipeline = sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: CHANNELS },
  });
  await applyOutputFormat(pipeline, outputPath).toFile(outputPath);
}
