import { Margins, Size } from '../../types';
import { RasterImage, toRaster, toSharp } from '../../platform/imageio/sharp';
import { PipelineError } from '../../utils/errors';

export function croppedSize(image: Size, margins: Margins): Size {
  return {
    width: image.width - margins.left - margins.right,
    height: image.height - margins.top - margins.bottom,
  };
}

export async function cropImage(image: RasterImage, margins: Margins): Promise<RasterImage> {
  const { width, height } = croppedSize(image, margins);

  if (width <= 0 || height <= 0) {
    throw new PipelineError(
      `Crop margins leave no image: ${image.width}x${image.height} cropped to ${width}x${height}`,
      { margins, width: image.width, height: image.height }
    );
  }

  return toRaster(
    toSharp(image).extract({ left: margins.left, top: margins.top, width, height })
  );
}
