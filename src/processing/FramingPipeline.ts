import { OrientationParameters } from '../types';
import { RasterImage } from '../platform/imageio/sharp';
import { createLogger } from '../utils/logger';
import { cropImage } from './stages/crop';
import { scaleImage } from './stages/scale';
import { padImage, paddingColor } from './stages/pad';
import { compositeFrame } from './stages/composite';
import { maybeRotate } from './stages/rotate';

const logger = createLogger('framing-pipeline');

/**
 * Ordinal of each debug snapshot. The value is written into the filename so
 * the files sort in pipeline order.
 */
export enum DebugStage {
  ORIGINAL = 0,
  CROPPED = 1,
  SCALED = 2,
  PADDED = 3,
  FRAMED = 4,
}

const STAGE_LABELS: Record<DebugStage, string> = {
  [DebugStage.ORIGINAL]: 'original',
  [DebugStage.CROPPED]: 'cropped',
  [DebugStage.SCALED]: 'scaled',
  [DebugStage.PADDED]: 'padded',
  [DebugStage.FRAMED]: 'framed',
};

export function stageLabel(stage: DebugStage): string {
  return STAGE_LABELS[stage];
}

export interface StageSnapshot {
  stage: DebugStage;
  image: RasterImage;
}

export type SnapshotSink = (snapshot: StageSnapshot) => Promise<void>;

export interface PipelineOptions {
  debug: boolean;
  rotateToLandscape: boolean;
  /** Receives every intermediate in debug mode, in stage order. */
  onSnapshot?: SnapshotSink;
}

export interface PipelineResult {
  image: RasterImage;
  rotated: boolean;
  snapshotStages: DebugStage[];
}

function sizeOf(image: RasterImage): string {
  return `${image.width}x${image.height}`;
}

export class FramingPipeline {
  /**
   * crop → scale → pad → composite → rotate, each stage producing a new image.
   */
  async run(
    source: RasterImage,
    frame: RasterImage,
    params: OrientationParameters,
    options: PipelineOptions
  ): Promise<PipelineResult> {
    const snapshotStages: DebugStage[] = [];
    const snapshot = async (stage: DebugStage, image: RasterImage): Promise<void> => {
      if (!options.debug || !options.onSnapshot) {
        return;
      }
      await options.onSnapshot({ stage, image });
      snapshotStages.push(stage);
    };

    await snapshot(DebugStage.ORIGINAL, source);

    const cropped = await cropImage(source, params.margins);
    logger.debug(`Image cropped to size ${sizeOf(cropped)}`);
    await snapshot(DebugStage.CROPPED, cropped);

    const scaled = await scaleImage(cropped, frame, params.scaleFactor);
    logger.debug(`Image scaled to size ${sizeOf(scaled)}`, { scaleFactor: params.scaleFactor });
    await snapshot(DebugStage.SCALED, scaled);

    const padded = await padImage(scaled, frame, paddingColor(options.debug));
    logger.debug(`Image padded to size ${sizeOf(padded)}`);
    await snapshot(DebugStage.PADDED, padded);

    const framed = await compositeFrame(padded, frame);
    logger.debug('Image framed successfully');

    const { image, rotated } = await maybeRotate(framed, params.orientation, options.rotateToLandscape);
    if (rotated) {
      logger.debug(`Image rotated to size ${sizeOf(image)}`);
    }

    return { image, rotated, snapshotStages };
  }
}
