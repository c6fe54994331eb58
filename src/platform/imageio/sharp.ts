/**
 * Sharp-based ImageIO adapter
 *
 * Decodes files into raw 8-bit rasters and back. Pipeline stages work on
 * raw buffers so every intermediate has exact, known dimensions.
 */

import sharp, { Sharp } from 'sharp';
import { promises as fs } from 'fs';
import path from 'path';

export type ChannelCount = 1 | 2 | 3 | 4;

// Platform-agnostic image interface
export interface RasterImage {
  data: Buffer;
  width: number;
  height: number;
  channels: ChannelCount;
}

export interface ImageIO {
  read(imagePath: string): Promise<RasterImage>;
  write(outputPath: string, image: RasterImage): Promise<void>;
}

export function toSharp(image: RasterImage): Sharp {
  return sharp(image.data, {
    raw: {
      width: image.width,
      height: image.height,
      channels: image.channels,
    },
  });
}

export async function toRaster(pipeline: Sharp): Promise<RasterImage> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });

  return {
    data,
    width: info.width,
    height: info.height,
    channels: info.channels,
  };
}

export function hasAlpha(image: RasterImage): boolean {
  return image.channels === 2 || image.channels === 4;
}

export class SharpImageIO implements ImageIO {
  constructor(private readonly jpegQuality: number = 95) {}

  /**
   * Decode to sRGB with an alpha channel, whatever the file holds.
   */
  async read(imagePath: string): Promise<RasterImage> {
    await fs.access(imagePath);

    try {
      const image = await toRaster(sharp(imagePath).toColorspace('srgb').ensureAlpha());

      if (image.width < 1 || image.height < 1) {
        throw new Error(`Invalid image dimensions: ${image.width}x${image.height}`);
      }

      return image;
    } catch (error) {
      throw new Error(`Failed to read image ${imagePath}: ${error}`, { cause: error });
    }
  }

  async write(outputPath: string, image: RasterImage): Promise<void> {
    let pipeline = toSharp(image);
    if (hasAlpha(image)) {
      pipeline = pipeline.removeAlpha();
    }

    const extension = path.extname(outputPath).toLowerCase();
    if (extension === '.jpg' || extension === '.jpeg') {
      pipeline = pipeline.jpeg({ quality: this.jpegQuality });
    }

    try {
      await pipeline.toFile(outputPath);
    } catch (error) {
      throw new Error(`Failed to write image ${outputPath}: ${error}`, { cause: error });
    }
  }
}
