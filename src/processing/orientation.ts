import { Orientation, Size, SupportedOrientation } from '../types';
import { ClassificationError } from '../utils/errors';

export function classifyOrientation(image: Size): Orientation {
  if (image.width > image.height) {
    return 'landscape';
  }
  if (image.width < image.height) {
    return 'portrait';
  }
  return 'square';
}

/**
 * Square sources have no frame to go with, so they stop the run.
 */
export function requireSupportedOrientation(image: Size, source?: string): SupportedOrientation {
  const orientation = classifyOrientation(image);
  if (orientation === 'square') {
    const where = source ? ` ${source}` : '';
    throw new ClassificationError(
      `Can't process square image${where} (${image.width}x${image.height})`,
      image.width,
      image.height
    );
  }
  return orientation;
}
