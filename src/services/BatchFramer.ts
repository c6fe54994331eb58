import { promises as fs } from 'fs';
import { GlobalSettings, SupportedOrientation } from '../types';
import { ImageIO, RasterImage, SharpImageIO } from '../platform/imageio/sharp';
import { DEFAULT_SOURCE_PATTERN, listSourceImages, sourcePath } from '../platform/source/folder';
import { classifyOrientation, requireSupportedOrientation } from '../processing/orientation';
import { resolveParameters } from '../processing/parameters';
import { FramingPipeline, StageSnapshot } from '../processing/FramingPipeline';
import { finalSuffix, outputPath, snapshotSuffix } from '../utils/filenames';
import { DirectoryError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('batch-framer');

export interface FramedFile {
  source: string;
  output: string;
  orientation: SupportedOrientation;
  rotated: boolean;
  snapshots: string[];
}

export interface BatchSummary {
  processed: FramedFile[];
  skipped: string[];
}

export interface BatchFramerOptions {
  io?: ImageIO;
  pipeline?: FramingPipeline;
  filePattern?: RegExp;
}

function sizeOf(image: RasterImage): string {
  return `${image.width}x${image.height}`;
}

async function isDirectory(directory: string): Promise<boolean> {
  try {
    return (await fs.stat(directory)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Frames every photograph in the input directory, one at a time. The first
 * failure stops the batch.
 */
export class BatchFramer {
  private readonly io: ImageIO;
  private readonly pipeline: FramingPipeline;
  private readonly filePattern: RegExp;

  constructor(private readonly settings: GlobalSettings, options: BatchFramerOptions = {}) {
    this.io = options.io ?? new SharpImageIO();
    this.pipeline = options.pipeline ?? new FramingPipeline();
    this.filePattern = options.filePattern ?? DEFAULT_SOURCE_PATTERN;
  }

  async verifyDirectories(): Promise<void> {
    if (!(await isDirectory(this.settings.inputPath))) {
      throw new DirectoryError(
        `Input directory ${this.settings.inputPath} does not exist`,
        this.settings.inputPath
      );
    }
    if (!(await isDirectory(this.settings.outputPath))) {
      throw new DirectoryError(
        `Output directory ${this.settings.outputPath} does not exist`,
        this.settings.outputPath
      );
    }
  }

  async processAll(): Promise<BatchSummary> {
    const { accepted, skipped } = await listSourceImages(this.settings.inputPath, this.filePattern);
    const processed: FramedFile[] = [];

    for (const filename of accepted) {
      processed.push(await this.processFile(filename));
    }

    return { processed, skipped };
  }

  async processFile(filename: string): Promise<FramedFile> {
    const { settings } = this;
    const imagePath = sourcePath(settings.inputPath, filename);
    logger.info(`file ${imagePath} status: processing...`);

    const original = await this.io.read(imagePath);
    logger.debug('Image loaded successfully');
    logger.debug(`Image size: ${sizeOf(original)}`);
    logger.debug(`Image orientation: ${classifyOrientation(original)}`);

    const orientation = requireSupportedOrientation(original, imagePath);
    const params = resolveParameters(orientation, settings);

    const frame = await this.io.read(params.framePath);
    logger.debug('Frame loaded successfully', { framePath: params.framePath });
    logger.debug(`Frame size: ${sizeOf(frame)}`);
    logger.debug(`Frame orientation: ${classifyOrientation(frame)}`);

    const snapshots: string[] = [];
    const saveSnapshot = async ({ stage, image }: StageSnapshot): Promise<void> => {
      const target = outputPath(settings.outputPath, filename, snapshotSuffix(stage));
      logger.debug(`generated output filename: ${target}`);
      await this.io.write(target, image);
      snapshots.push(target);
    };

    const result = await this.pipeline.run(original, frame, params, {
      debug: settings.debug,
      rotateToLandscape: settings.rotateToLandscape,
      onSnapshot: saveSnapshot,
    });

    const output = outputPath(settings.outputPath, filename, finalSuffix(settings.debug));
    logger.debug(`generated output filename: ${output}`);
    await this.io.write(output, result.image);

    logger.info(`file ${imagePath} status: done`);

    return {
      source: imagePath,
      output,
      orientation,
      rotated: result.rotated,
      snapshots,
    };
  }
}
