import { RgbaColor, Size } from '../../types';
import { RasterImage, toRaster, toSharp } from '../../platform/imageio/sharp';
import { PipelineError } from '../../utils/errors';

const FLATTEN_BACKGROUND: RgbaColor = { r: 255, g: 255, b: 255, alpha: 1 };

export function frameOffset(canvas: Size, frame: Size): { left: number; top: number } {
  return {
    left: Math.floor((canvas.width - frame.width) / 2),
    top: Math.floor((canvas.height - frame.height) / 2),
  };
}

/**
 * Lay the frame over the padded canvas using the frame's own alpha, then
 * drop transparency. The result always has three channels.
 */
export async function compositeFrame(canvas: RasterImage, frame: RasterImage): Promise<RasterImage> {
  const { left, top } = frameOffset(canvas, frame);

  if (left < 0 || top < 0) {
    throw new PipelineError(
      `Frame ${frame.width}x${frame.height} does not fit canvas ${canvas.width}x${canvas.height}`,
      { frame: { width: frame.width, height: frame.height }, canvas: { width: canvas.width, height: canvas.height } }
    );
  }

  const blended = await toRaster(
    toSharp(canvas).composite([
      {
        input: frame.data,
        raw: { width: frame.width, height: frame.height, channels: frame.channels },
        left,
        top,
      },
    ])
  );

  // flatten() runs before composite() inside one sharp pipeline, hence two passes
  return toRaster(toSharp(blended).flatten({ background: FLATTEN_BACKGROUND }));
}
