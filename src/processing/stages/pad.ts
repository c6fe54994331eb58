import { RgbaColor, Size } from '../../types';
import { RasterImage, toRaster, toSharp } from '../../platform/imageio/sharp';

export interface Padding {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export const DEBUG_FILL: RgbaColor = { r: 255, g: 0, b: 0, alpha: 1 };
export const BACKGROUND_FILL: RgbaColor = { r: 255, g: 255, b: 255, alpha: 1 };

export function paddingColor(debug: boolean): RgbaColor {
  return debug ? DEBUG_FILL : BACKGROUND_FILL;
}

/**
 * Centre the image on the frame. Odd remainders go to the right and bottom
 * edges. Negative values mean the image overhangs the frame on that axis.
 */
export function computePadding(image: Size, frame: Size): Padding {
  const left = Math.floor((frame.width - image.width) / 2);
  const top = Math.floor((frame.height - image.height) / 2);

  return {
    left,
    top,
    right: frame.width - image.width - left,
    bottom: frame.height - image.height - top,
  };
}

export async function padImage(
  image: RasterImage,
  frame: Size,
  fill: RgbaColor
): Promise<RasterImage> {
  const padding = computePadding(image, frame);

  // An overscaled image is trimmed to the frame around its centre
  const trim = {
    left: Math.max(0, -padding.left),
    top: Math.max(0, -padding.top),
    right: Math.max(0, -padding.right),
    bottom: Math.max(0, -padding.bottom),
  };
  const trimmed =
    trim.left + trim.top + trim.right + trim.bottom > 0
      ? await toRaster(
          toSharp(image).extract({
            left: trim.left,
            top: trim.top,
            width: image.width - trim.left - trim.right,
            height: image.height - trim.top - trim.bottom,
          })
        )
      : image;

  const extend = {
    left: Math.max(0, padding.left),
    top: Math.max(0, padding.top),
    right: Math.max(0, padding.right),
    bottom: Math.max(0, padding.bottom),
  };
  if (extend.left + extend.top + extend.right + extend.bottom === 0) {
    return trimmed === image ? { ...image, data: Buffer.from(image.data) } : trimmed;
  }

  return toRaster(toSharp(trimmed).extend({ ...extend, background: fill }));
}
