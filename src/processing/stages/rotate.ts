import { Orientation } from '../../types';
import { RasterImage, toRaster, toSharp } from '../../platform/imageio/sharp';

// sharp rotates clockwise; 270 turns the image a quarter counter-clockwise
const QUARTER_TURN_CCW = 270;

export function shouldRotate(sourceOrientation: Orientation, rotateToLandscape: boolean): boolean {
  return rotateToLandscape && sourceOrientation === 'portrait';
}

export async function rotateImage(image: RasterImage): Promise<RasterImage> {
  return toRaster(toSharp(image).rotate(QUARTER_TURN_CCW));
}

export async function maybeRotate(
  image: RasterImage,
  sourceOrientation: Orientation,
  rotateToLandscape: boolean
): Promise<{ image: RasterImage; rotated: boolean }> {
  if (!shouldRotate(sourceOrientation, rotateToLandscape)) {
    return { image, rotated: false };
  }
  return { image: await rotateImage(image), rotated: true };
}
