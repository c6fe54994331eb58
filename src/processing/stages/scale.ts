import sharp from 'sharp';
import { Size } from '../../types';
import { RasterImage, toRaster, toSharp } from '../../platform/imageio/sharp';
import { PipelineError } from '../../utils/errors';

/**
 * Best-fit ratio of the image inside the frame, adjusted by the configured
 * multiplier. One factor for both axes keeps the aspect ratio.
 */
export function computeScaleFactor(image: Size, frame: Size, multiplier: number): number {
  return multiplier * Math.min(frame.width / image.width, frame.height / image.height);
}

export function computeScaledSize(image: Size, frame: Size, multiplier: number): Size {
  const factor = computeScaleFactor(image, frame, multiplier);

  return {
    width: Math.floor(image.width * factor),
    height: Math.floor(image.height * factor),
  };
}

export async function scaleImage(
  image: RasterImage,
  frame: Size,
  multiplier: number
): Promise<RasterImage> {
  const { width, height } = computeScaledSize(image, frame, multiplier);

  if (width < 1 || height < 1) {
    throw new PipelineError(`Scaled image has no pixels: ${width}x${height}`, {
      multiplier,
      source: { width: image.width, height: image.height },
      frame: { width: frame.width, height: frame.height },
    });
  }

  return toRaster(
    toSharp(image).resize(width, height, {
      fit: 'fill',
      kernel: sharp.kernel.lanczos3,
      fastShrinkOnLoad: false,
    })
  );
}
